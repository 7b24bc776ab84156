/**
 * Diagnosis Service
 *
 * Runs the survey lifecycle: open a session, collect raw answers, aggregate
 * into the Health Index on completion and seed the quest sequence from it.
 */

import {
  AxisScores,
  HealthIndexSnapshot,
  QuestionBattery,
  RawAnswer
} from '../types/diagnosis';
import { EngineResult, failure } from '../types/engine-result';
import { ClientDirectory } from './client-directory';
import { aggregateDiagnosis } from './diagnosis-aggregator';
import { DiagnosisSessionStore } from './diagnosis-session-store';
import { HealthIndexStore, PersistenceTier } from './health-index-store';
import { findQuestion } from './question-battery';
import { QuestService } from './quest-service';

const LOG_PREFIX = '[Diagnosis-Service]';

export interface DiagnosisServiceDeps {
  battery: QuestionBattery;
  sessions: DiagnosisSessionStore;
  directory: ClientDirectory;
  healthIndex: HealthIndexStore;
  quests: QuestService;
}

export interface DiagnosisOutcome {
  diagnosis_id: string;
  client_id: string;
  scores: AxisScores;
  overall_score: number;
  persisted_tier: PersistenceTier;
  quests_initialized: boolean;
}

export class DiagnosisService {
  constructor(private readonly deps: DiagnosisServiceDeps) {}

  get battery(): QuestionBattery {
    return this.deps.battery;
  }

  async start(clientId: string): Promise<EngineResult<{ diagnosis_id: string; expires_at: string }>> {
    const client = await this.deps.directory.getClient(clientId);
    if (!client) {
      return failure('NOT_FOUND', `Client not found: ${clientId}`);
    }

    this.deps.sessions.sweepExpired();
    const session = this.deps.sessions.open(clientId);
    return {
      ok: true,
      diagnosis_id: session.diagnosis_id,
      expires_at: new Date(session.expires_at).toISOString()
    };
  }

  answer(diagnosisId: string, questionId: string, answer: RawAnswer): EngineResult<{ answered: number }> {
    if (!findQuestion(this.deps.battery, questionId)) {
      return failure('UNKNOWN_QUESTION', `Unknown question id: ${questionId}`);
    }
    if (!this.deps.sessions.recordAnswer(diagnosisId, questionId, answer)) {
      return failure('SESSION_EXPIRED', `Diagnosis session not found or expired: ${diagnosisId}`);
    }

    const session = this.deps.sessions.get(diagnosisId);
    return { ok: true, answered: session ? Object.keys(session.answers).length : 0 };
  }

  async complete(diagnosisId: string): Promise<EngineResult<DiagnosisOutcome>> {
    const session = this.deps.sessions.get(diagnosisId);
    if (!session) {
      return failure('SESSION_EXPIRED', `Diagnosis session not found or expired: ${diagnosisId}`);
    }

    const clientId = session.client_id;
    const client = await this.deps.directory.getClient(clientId);
    if (!client) {
      return failure('NOT_FOUND', `Client not found: ${clientId}`);
    }

    const result = aggregateDiagnosis(this.deps.battery, session.answers);
    const saved = await this.deps.healthIndex.upsert(clientId, result, client.agent_id);
    if (!saved.ok) {
      // Session stays open so the same answers can be resubmitted
      return saved;
    }

    const quests = await this.deps.quests.initialize(clientId, result.scores);
    if (!quests.ok) {
      console.warn(`${LOG_PREFIX} Quest initialization skipped for client ${clientId}: ${quests.message}`);
    }

    this.deps.sessions.close(diagnosisId);
    console.log(
      `${LOG_PREFIX} Diagnosis ${diagnosisId} completed for client ${clientId}: ` +
      `overall=${result.overall_score}, tier=${saved.tier}`
    );

    return {
      ok: true,
      diagnosis_id: diagnosisId,
      client_id: clientId,
      scores: result.scores,
      overall_score: result.overall_score,
      persisted_tier: saved.tier,
      quests_initialized: quests.ok
    };
  }

  healthIndex(clientId: string): Promise<HealthIndexSnapshot> {
    return this.deps.healthIndex.getLatest(clientId);
  }
}
