/**
 * Notification Service: client inbox
 *
 * The engine announces mission completion to the client's inbox. Delivery
 * channels and read state belong to the inbox consumers; this side only
 * writes the notification row.
 */

import { randomUUID } from 'crypto';
import { SupabaseClient } from '@supabase/supabase-js';

// ── Types ────────────────────────────────────────────────────

export type NotificationAudience = 'client' | 'agent' | 'all';

export interface InboxNotification {
  title: string;
  body: string;
  audience: NotificationAudience;
  /** Agent that the notification is sent on behalf of */
  origin: string | null;
  recipient_id: string;
}

export interface NotificationSink {
  send(notification: InboxNotification): Promise<void>;
}

// ── Builders ─────────────────────────────────────────────────

export function questCompletedNotification(
  clientId: string,
  agentId: string | null,
  questTitle: string,
  message: string
): InboxNotification {
  return {
    title: `Mission complete: ${questTitle}`,
    body: message,
    audience: 'client',
    origin: agentId,
    recipient_id: clientId
  };
}

// ── Supabase sink ────────────────────────────────────────────

export class SupabaseNotificationSink implements NotificationSink {
  constructor(private readonly supabase: SupabaseClient) {}

  async send(notification: InboxNotification): Promise<void> {
    const { error } = await this.supabase.from('notifications').insert({
      id: randomUUID(),
      title: notification.title,
      content: notification.body,
      target: notification.audience,
      created_by: notification.origin,
      recipient_id: notification.recipient_id
    });

    if (error) {
      throw new Error(`notification insert failed: ${error.message}`);
    }
    console.log(`[Notifications] Queued "${notification.title}" for ${notification.recipient_id}`);
  }
}
