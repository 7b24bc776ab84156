/**
 * Quest persistence.
 *
 * The `quests` table carries a unique (client_id, category) constraint, so
 * bulk creation is insert-or-ignore and safe under concurrent retries.
 * Completion is a conditional update on `status = 'pending'`: of two racing
 * completions only one observes a changed row.
 */

import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { HEALTH_AXES } from '../types/diagnosis';
import {
  EvaluationAttempt,
  NewQuest,
  QUEST_STATUSES,
  QuestChecklist,
  QuestRecord
} from '../types/quest';

export const QUESTS_TABLE = 'quests';

export const QuestChecklistSchema = z.object({
  intro: z.string(),
  subtitle: z.string(),
  checklist: z.array(z.string()),
  min_checks: z.number().int()
});

export const QuestEvaluationSchema = z.object({
  passed: z.boolean(),
  score: z.number().int(),
  total: z.number().int(),
  message: z.string(),
  next_step: z.string()
});

export const QuestRowSchema = z.object({
  id: z.string(),
  client_id: z.string(),
  agent_id: z.string().nullable(),
  title: z.string(),
  category: z.enum(HEALTH_AXES),
  quest_order: z.number().int(),
  is_locked: z.boolean(),
  status: z.enum(QUEST_STATUSES),
  checklist: QuestChecklistSchema.nullable().default(null),
  user_answers: z.array(z.number().int()).nullable().default(null),
  checked_count: z.number().int().default(0),
  ai_evaluation: QuestEvaluationSchema.nullable().default(null),
  completed_at: z.string().nullable().default(null),
  created_at: z.string()
});

export interface QuestRepository {
  /** All quests of a client ordered by quest_order */
  listByClient(clientId: string): Promise<QuestRecord[]>;
  findById(questId: string): Promise<QuestRecord | null>;
  /** Insert rows, skipping any (client_id, category) that already exists. Returns rows inserted. */
  insertIgnoringDuplicates(quests: NewQuest[]): Promise<number>;
  /** Replace the checklist and clear the attempt recorded against the previous one */
  saveChecklist(questId: string, checklist: QuestChecklist): Promise<void>;
  saveEvaluation(questId: string, attempt: EvaluationAttempt): Promise<void>;
  /** pending -> completed on an unlocked quest. False when the row was not pending. */
  markCompleted(questId: string, completedAt: string): Promise<boolean>;
  /** Unlock the quest at `questOrder`; null when the client has no such quest. */
  unlockByOrder(clientId: string, questOrder: number): Promise<QuestRecord | null>;
}

function parseRows(data: unknown): QuestRecord[] {
  return z.array(QuestRowSchema).parse(data ?? []);
}

export class SupabaseQuestRepository implements QuestRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  async listByClient(clientId: string): Promise<QuestRecord[]> {
    const { data, error } = await this.supabase
      .from(QUESTS_TABLE)
      .select('*')
      .eq('client_id', clientId)
      .order('quest_order', { ascending: true });
    if (error) {
      throw new Error(`quests list failed: ${error.message}`);
    }
    return parseRows(data);
  }

  async findById(questId: string): Promise<QuestRecord | null> {
    const { data, error } = await this.supabase
      .from(QUESTS_TABLE)
      .select('*')
      .eq('id', questId)
      .maybeSingle();

    if (error) {
      throw new Error(`quest read failed: ${error.message}`);
    }
    return data ? QuestRowSchema.parse(data) : null;
  }

  async insertIgnoringDuplicates(quests: NewQuest[]): Promise<number> {
    const { data, error } = await this.supabase
      .from(QUESTS_TABLE)
      .upsert(quests, { onConflict: 'client_id,category', ignoreDuplicates: true })
      .select('id');

    if (error) {
      throw new Error(`quest insert failed: ${error.message}`);
    }
    return data?.length ?? 0;
  }

  async saveChecklist(questId: string, checklist: QuestChecklist): Promise<void> {
    const { error } = await this.supabase
      .from(QUESTS_TABLE)
      .update({ checklist, user_answers: null, checked_count: 0, ai_evaluation: null })
      .eq('id', questId);

    if (error) {
      throw new Error(`checklist save failed: ${error.message}`);
    }
  }

  async saveEvaluation(questId: string, attempt: EvaluationAttempt): Promise<void> {
    const { error } = await this.supabase
      .from(QUESTS_TABLE)
      .update(attempt)
      .eq('id', questId);

    if (error) {
      throw new Error(`evaluation save failed: ${error.message}`);
    }
  }

  async markCompleted(questId: string, completedAt: string): Promise<boolean> {
    const { data, error } = await this.supabase
      .from(QUESTS_TABLE)
      .update({ status: 'completed', completed_at: completedAt })
      .eq('id', questId)
      .eq('status', 'pending')
      .eq('is_locked', false)
      .select('id');

    if (error) {
      throw new Error(`quest completion failed: ${error.message}`);
    }
    return (data?.length ?? 0) === 1;
  }

  async unlockByOrder(clientId: string, questOrder: number): Promise<QuestRecord | null> {
    const { data, error } = await this.supabase
      .from(QUESTS_TABLE)
      .update({ is_locked: false })
      .eq('client_id', clientId)
      .eq('quest_order', questOrder)
      .select('*');

    if (error) {
      throw new Error(`quest unlock failed: ${error.message}`);
    }
    const rows = parseRows(data);
    return rows[0] ?? null;
  }
}
