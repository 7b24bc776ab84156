/**
 * Diagnosis Question Battery
 *
 * The battery is configuration: it is read from JSON at startup so a new
 * version can ship without touching the scoring code. DIAGNOSIS_QUESTIONS_PATH
 * points at a replacement file; otherwise the bundled file is used.
 */

import { readFileSync, existsSync } from 'fs';
import bundledBattery from '../../config/diagnosis-questions.json';
import {
  QuestionBattery,
  QuestionBatterySchema,
  DiagnosisQuestion
} from '../types/diagnosis';

const LOG_PREFIX = '[Question-Battery]';

/**
 * Parse and validate a battery document. Throws on malformed input; a
 * gateway with a broken battery must not start.
 */
export function parseQuestionBattery(raw: unknown): QuestionBattery {
  const parsed = QuestionBatterySchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`${LOG_PREFIX} Invalid question battery: ${details}`);
  }

  const seen = new Set<string>();
  for (const question of parsed.data.questions) {
    if (seen.has(question.id)) {
      throw new Error(`${LOG_PREFIX} Duplicate question id: ${question.id}`);
    }
    seen.add(question.id);
  }

  return {
    version: parsed.data.version,
    questions: [...parsed.data.questions].sort((a, b) => a.order - b.order)
  };
}

/**
 * @param path - battery file to read; the bundled battery when omitted
 */
export function loadQuestionBattery(path?: string): QuestionBattery {
  if (path && !existsSync(path)) {
    throw new Error(`${LOG_PREFIX} Battery file not found: ${path}`);
  }
  const raw: unknown = path ? JSON.parse(readFileSync(path, 'utf-8')) : bundledBattery;
  const battery = parseQuestionBattery(raw);
  console.log(`${LOG_PREFIX} Loaded battery v${battery.version} (${battery.questions.length} questions) from ${path ?? 'bundle'}`);
  return battery;
}

export function findQuestion(battery: QuestionBattery, questionId: string): DiagnosisQuestion | undefined {
  return battery.questions.find(q => q.id === questionId);
}
