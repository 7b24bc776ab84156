/**
 * Diagnosis Session Store
 *
 * Holds raw survey answers between `start` and `complete`. Sessions are
 * addressed by an opaque diagnosis id and expire after a fixed TTL. Storage
 * is in-process and not crash-safe: a lost session means the client redoes
 * the survey.
 *
 * Expiry is evaluated on access and by sweepExpired(); the store never holds
 * a timer.
 */

import { randomUUID } from 'crypto';
import { AnswerMap, RawAnswer } from '../types/diagnosis';

const LOG_PREFIX = '[Diagnosis-Sessions]';

export interface DiagnosisSession {
  diagnosis_id: string;
  client_id: string;
  answers: AnswerMap;
  created_at: number;
  expires_at: number;
}

export interface DiagnosisSessionStoreOptions {
  ttlMs: number;
  now?: () => number;
  generateId?: () => string;
}

export class DiagnosisSessionStore {
  private readonly sessions = new Map<string, DiagnosisSession>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: DiagnosisSessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  open(clientId: string): DiagnosisSession {
    const createdAt = this.now();
    const session: DiagnosisSession = {
      diagnosis_id: this.generateId(),
      client_id: clientId,
      answers: {},
      created_at: createdAt,
      expires_at: createdAt + this.ttlMs
    };
    this.sessions.set(session.diagnosis_id, session);
    console.log(`${LOG_PREFIX} Opened ${session.diagnosis_id} for client ${clientId}`);
    return session;
  }

  /**
   * Live session for an id, or null when unknown or expired
   */
  get(diagnosisId: string): DiagnosisSession | null {
    const session = this.sessions.get(diagnosisId);
    if (!session) {
      return null;
    }
    if (session.expires_at <= this.now()) {
      this.sessions.delete(diagnosisId);
      console.log(`${LOG_PREFIX} Session expired: ${diagnosisId}`);
      return null;
    }
    return session;
  }

  recordAnswer(diagnosisId: string, questionId: string, answer: RawAnswer): boolean {
    const session = this.get(diagnosisId);
    if (!session) {
      return false;
    }
    session.answers[questionId] = answer;
    return true;
  }

  close(diagnosisId: string): void {
    this.sessions.delete(diagnosisId);
  }

  sweepExpired(): string[] {
    const now = this.now();
    const expired: string[] = [];
    for (const [id, session] of this.sessions.entries()) {
      if (session.expires_at <= now) {
        this.sessions.delete(id);
        expired.push(id);
      }
    }
    if (expired.length > 0) {
      console.log(`${LOG_PREFIX} Swept ${expired.length} expired session(s)`);
    }
    return expired;
  }

  size(): number {
    return this.sessions.size;
  }
}
