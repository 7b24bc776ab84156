/**
 * Diagnosis & Health Index Types
 *
 * Two label namespaces exist for the same six dimensions:
 * - Battery categories (`asset`, `time`, ...) tag the 20 survey questions.
 * - Health axes (`asset_stability`, `time_independence`, ...) name the
 *   persisted Health Index columns and the quest categories.
 *
 * BATTERY_CATEGORY_TO_AXIS is the only place the two are translated.
 */

import { z } from 'zod';

// =============================================================================
// Categories & Axes
// =============================================================================

export const BATTERY_CATEGORIES = [
  'asset',
  'time',
  'body',
  'emotion',
  'network',
  'system'
] as const;

export type BatteryCategory = typeof BATTERY_CATEGORIES[number];

/**
 * Health axes in declaration order. This order is also the tie-break
 * priority used when quests are sequenced.
 */
export const HEALTH_AXES = [
  'asset_stability',
  'time_independence',
  'physical_condition',
  'emotional_balance',
  'network_power',
  'system_leverage'
] as const;

export type HealthAxis = typeof HEALTH_AXES[number];

export const BATTERY_CATEGORY_TO_AXIS = {
  asset: 'asset_stability',
  time: 'time_independence',
  body: 'physical_condition',
  emotion: 'emotional_balance',
  network: 'network_power',
  system: 'system_leverage'
} as const satisfies Record<BatteryCategory, HealthAxis>;

export function toHealthAxis(category: BatteryCategory): HealthAxis {
  return BATTERY_CATEGORY_TO_AXIS[category];
}

export type AxisScores = Record<HealthAxis, number>;

export const NEUTRAL_SCORE = 50;

export function neutralAxisScores(): AxisScores {
  return {
    asset_stability: NEUTRAL_SCORE,
    time_independence: NEUTRAL_SCORE,
    physical_condition: NEUTRAL_SCORE,
    emotional_balance: NEUTRAL_SCORE,
    network_power: NEUTRAL_SCORE,
    system_leverage: NEUTRAL_SCORE
  };
}

// =============================================================================
// Question Battery
// =============================================================================

export const ANSWER_TYPES = ['single-choice', 'scalar-slider', 'multi-select'] as const;
export type AnswerType = typeof ANSWER_TYPES[number];

/** Default "none of the above" label for multi-select questions */
export const NONE_OF_THE_ABOVE = 'None';

export const DiagnosisQuestionSchema = z.object({
  id: z.string().min(1),
  category: z.enum(BATTERY_CATEGORIES),
  prompt: z.string().min(1),
  answer_type: z.enum(ANSWER_TYPES),
  choices: z.array(z.string()).default([]),
  /** Sentinel label for multi-select; falls back to NONE_OF_THE_ABOVE */
  none_choice: z.string().optional(),
  order: z.number().int()
});

export type DiagnosisQuestion = z.infer<typeof DiagnosisQuestionSchema>;

export const QuestionBatterySchema = z.object({
  version: z.string(),
  questions: z.array(DiagnosisQuestionSchema).min(1)
});

export type QuestionBattery = z.infer<typeof QuestionBatterySchema>;

/**
 * Raw submitted answer: a choice label, a 1-10 rating, or a set of labels.
 * Anything else is still accepted and scored as neutral.
 */
export type RawAnswer = string | number | string[] | null | undefined;

export type AnswerMap = Record<string, RawAnswer>;

// =============================================================================
// Health Index
// =============================================================================

export interface HealthIndexSnapshot {
  client_id: string;
  scores: AxisScores;
  overall_score: number;
  updated_at: string | null;
  /** True when no row exists and the neutral default was returned */
  is_default: boolean;
}

export interface DiagnosisResult {
  scores: AxisScores;
  overall_score: number;
}

// =============================================================================
// API Request Schemas
// =============================================================================

export const DiagnosisStartRequestSchema = z.object({
  client_id: z.string().min(1)
});

export type DiagnosisStartRequest = z.infer<typeof DiagnosisStartRequestSchema>;

export const RawAnswerSchema = z.union([
  z.string(),
  z.number(),
  z.array(z.string()),
  z.null()
]);

export const DiagnosisAnswerRequestSchema = z.object({
  diagnosis_id: z.string().min(1),
  question_id: z.string().min(1),
  answer: RawAnswerSchema
});

export type DiagnosisAnswerRequest = z.infer<typeof DiagnosisAnswerRequestSchema>;

export const DiagnosisCompleteRequestSchema = z.object({
  diagnosis_id: z.string().min(1)
});

export type DiagnosisCompleteRequest = z.infer<typeof DiagnosisCompleteRequestSchema>;
