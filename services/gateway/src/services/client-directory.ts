/**
 * Client lookup against the `users` table. A client's agent is the user
 * that invited them (`created_by`).
 */

import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

export interface ClientProfile {
  id: string;
  name: string;
  agent_id: string | null;
}

export interface ClientDirectory {
  getClient(clientId: string): Promise<ClientProfile | null>;
}

const UserRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  created_by: z.string().nullable()
});

export class SupabaseClientDirectory implements ClientDirectory {
  constructor(private readonly supabase: SupabaseClient) {}

  async getClient(clientId: string): Promise<ClientProfile | null> {
    const { data, error } = await this.supabase
      .from('users')
      .select('id, name, created_by')
      .eq('id', clientId)
      .maybeSingle();

    if (error) {
      throw new Error(`client lookup failed: ${error.message}`);
    }
    if (!data) {
      return null;
    }

    const row = UserRowSchema.parse(data);
    return { id: row.id, name: row.name, agent_id: row.created_by };
  }
}
