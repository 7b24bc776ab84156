/**
 * Quest Progression Types
 *
 * A client owns exactly six quests, one per health axis, ordered weakest
 * axis first. Only the lowest-ordered incomplete quest is unlocked.
 */

import { z } from 'zod';
import { HealthAxis } from './diagnosis';

// =============================================================================
// Status & Lifecycle
// =============================================================================

export const QUEST_STATUSES = ['pending', 'completed'] as const;
export type QuestStatus = typeof QUEST_STATUSES[number];

/**
 * Lifecycle states derived from (is_locked, status)
 */
export type QuestLifecycleState = 'locked' | 'active' | 'completed';

/** Nominal pass bar handed to the oracle when evaluating a checklist */
export const DEFAULT_MIN_CHECKS = 3;

// =============================================================================
// Checklist & Evaluation
// =============================================================================

export interface QuestChecklist {
  intro: string;
  subtitle: string;
  checklist: string[];
  min_checks: number;
}

/**
 * Evaluation outcome. `score`/`total` are counted locally; `passed` is the
 * oracle's verdict and is never derived from the score.
 */
export interface QuestEvaluation {
  passed: boolean;
  score: number;
  total: number;
  message: string;
  next_step: string;
}

export interface QuestRecord {
  id: string;
  client_id: string;
  agent_id: string | null;
  title: string;
  category: HealthAxis;
  quest_order: number;
  is_locked: boolean;
  status: QuestStatus;
  checklist: QuestChecklist | null;
  user_answers: number[] | null;
  checked_count: number;
  ai_evaluation: QuestEvaluation | null;
  completed_at: string | null;
  created_at: string;
}

/** Fields written when a quest row is first created */
export type NewQuest = Pick<
  QuestRecord,
  'id' | 'client_id' | 'agent_id' | 'title' | 'category' | 'quest_order' | 'is_locked' | 'status'
>;

export interface EvaluationAttempt {
  user_answers: number[];
  checked_count: number;
  ai_evaluation: QuestEvaluation;
}

// =============================================================================
// Machine Types
// =============================================================================

export interface QuestMachineContext {
  questId: string;
  questOrder: number;
}

export type QuestMachineEvent =
  | { type: 'UNLOCK' }
  | { type: 'PASS' }
  | { type: 'OVERRIDE_COMPLETE'; actorId: string };

// =============================================================================
// API Request Schemas
// =============================================================================

export const QuestInitRequestSchema = z.object({
  client_id: z.string().min(1)
});

export type QuestInitRequest = z.infer<typeof QuestInitRequestSchema>;

export const ListQuestsQuerySchema = z.object({
  client_id: z.string().min(1),
  status: z.enum(QUEST_STATUSES).optional()
});

export type ListQuestsQuery = z.infer<typeof ListQuestsQuerySchema>;

export const ClientQuerySchema = z.object({
  client_id: z.string().min(1)
});

export const EvaluateQuestRequestSchema = z.object({
  checked_indexes: z.array(z.number().int().min(0)).max(50)
});

export type EvaluateQuestRequest = z.infer<typeof EvaluateQuestRequestSchema>;
