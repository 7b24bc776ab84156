/**
 * Health Index persistence tiers.
 *
 * Backends throw on I/O failure; HealthIndexStore decides what a failure
 * means. Rows are keyed uniquely by client_id in both tiers.
 */

import { SupabaseClient } from '@supabase/supabase-js';
import type { firestore } from 'firebase-admin';
import { z } from 'zod';

export const HealthIndexRowSchema = z.object({
  client_id: z.string(),
  agent_id: z.string().nullable().default(null),
  asset_stability: z.number(),
  time_independence: z.number(),
  physical_condition: z.number(),
  emotional_balance: z.number(),
  network_power: z.number(),
  system_leverage: z.number(),
  overall_score: z.number(),
  updated_at: z.string()
});

export type HealthIndexRow = z.infer<typeof HealthIndexRowSchema>;

export interface HealthIndexBackend {
  readonly name: string;
  upsert(row: HealthIndexRow): Promise<void>;
  fetch(clientId: string): Promise<HealthIndexRow | null>;
}

export const HEALTH_INDEX_TABLE = 'health_index';

/**
 * Primary tier: Supabase `health_index`, upsert on client_id
 */
export class SupabaseHealthIndexBackend implements HealthIndexBackend {
  readonly name = 'supabase';

  constructor(private readonly supabase: SupabaseClient) {}

  async upsert(row: HealthIndexRow): Promise<void> {
    const { error } = await this.supabase
      .from(HEALTH_INDEX_TABLE)
      .upsert(row, { onConflict: 'client_id' });

    if (error) {
      throw new Error(`health_index upsert failed: ${error.message}`);
    }
  }

  async fetch(clientId: string): Promise<HealthIndexRow | null> {
    const { data, error } = await this.supabase
      .from(HEALTH_INDEX_TABLE)
      .select('*')
      .eq('client_id', clientId)
      .maybeSingle();

    if (error) {
      throw new Error(`health_index read failed: ${error.message}`);
    }
    return data ? HealthIndexRowSchema.parse(data) : null;
  }
}

/**
 * Secondary tier: Firestore document `health_index/{client_id}`
 */
export class FirestoreHealthIndexBackend implements HealthIndexBackend {
  readonly name = 'firestore';

  constructor(private readonly resolveDb: () => firestore.Firestore) {}

  async upsert(row: HealthIndexRow): Promise<void> {
    await this.resolveDb().collection(HEALTH_INDEX_TABLE).doc(row.client_id).set(row);
  }

  async fetch(clientId: string): Promise<HealthIndexRow | null> {
    const snapshot = await this.resolveDb().collection(HEALTH_INDEX_TABLE).doc(clientId).get();
    if (!snapshot.exists) {
      return null;
    }
    return HealthIndexRowSchema.parse(snapshot.data());
  }
}
