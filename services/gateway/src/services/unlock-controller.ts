/**
 * Unlock Controller
 *
 * Completes the current quest and unlocks its successor. The storage-level
 * conditional update decides which of two racing completions wins; only the
 * winner unlocks the next quest and notifies the client.
 *
 * Completion and unlock are two writes. When the unlock write fails after the
 * completion landed, the next advance on the completed quest resumes the
 * unlock, provided the client has no active quest.
 */

import { QuestRecord } from '../types/quest';
import { NotificationSink, questCompletedNotification } from './notification-service';
import { QuestRepository } from './quest-repository';
import { evaluateQuestTransition, lifecycleStateOf } from './quest-state-machine';

const LOG_PREFIX = '[Unlock-Controller]';

export type CompletionTrigger =
  | { type: 'PASS'; message: string }
  | { type: 'OVERRIDE_COMPLETE'; actorId: string; message: string };

export interface AdvanceOutcome {
  /** This call completed the quest or finished its interrupted unlock */
  completed: boolean;
  /** Quest unlocked as a consequence, if any */
  unlocked: QuestRecord | null;
  /** The completed quest was the last one in the sequence */
  sequence_complete: boolean;
}

const NOT_ADVANCED: AdvanceOutcome = { completed: false, unlocked: null, sequence_complete: false };

export class UnlockController {
  constructor(
    private readonly repository: QuestRepository,
    private readonly notifications: NotificationSink,
    private readonly now: () => Date = () => new Date()
  ) {}

  async advance(quest: QuestRecord, trigger: CompletionTrigger): Promise<AdvanceOutcome> {
    if (lifecycleStateOf(quest) === 'completed') {
      return this.resume(quest, trigger.message);
    }

    const event = trigger.type === 'PASS'
      ? { type: 'PASS' as const }
      : { type: 'OVERRIDE_COMPLETE' as const, actorId: trigger.actorId };

    if (evaluateQuestTransition(quest, event) !== 'completed') {
      console.warn(`${LOG_PREFIX} ${trigger.type} rejected for quest ${quest.id} (order ${quest.quest_order})`);
      return NOT_ADVANCED;
    }

    const won = await this.repository.markCompleted(quest.id, this.now().toISOString());
    if (!won) {
      console.warn(`${LOG_PREFIX} Quest ${quest.id} was completed concurrently; skipping unlock`);
      return NOT_ADVANCED;
    }

    const quests = await this.repository.listByClient(quest.client_id);
    const successor = quests.find(q => q.quest_order === quest.quest_order + 1) ?? null;
    const unlocked = await this.unlockSuccessor(quest, successor);
    await this.notify(quest, trigger.message);

    return { completed: true, unlocked, sequence_complete: successor === null };
  }

  /**
   * Finish the unlock of an already completed quest whose successor is still
   * locked while no other quest of the client is active.
   */
  private async resume(quest: QuestRecord, message: string): Promise<AdvanceOutcome> {
    const quests = await this.repository.listByClient(quest.client_id);
    if (quests.some(q => lifecycleStateOf(q) === 'active')) {
      return NOT_ADVANCED;
    }

    const successor = quests.find(q => q.quest_order === quest.quest_order + 1);
    if (!successor || evaluateQuestTransition(successor, { type: 'UNLOCK' }) !== 'active') {
      return NOT_ADVANCED;
    }

    console.warn(`${LOG_PREFIX} Resuming interrupted unlock after quest ${quest.id} (client ${quest.client_id})`);
    const unlocked = await this.unlockSuccessor(quest, successor);
    await this.notify(quest, message);

    return { completed: true, unlocked, sequence_complete: false };
  }

  private async unlockSuccessor(quest: QuestRecord, successor: QuestRecord | null): Promise<QuestRecord | null> {
    if (!successor) {
      console.log(`${LOG_PREFIX} Quest ${quest.id} completed; sequence resolved for client ${quest.client_id}`);
      return null;
    }
    if (evaluateQuestTransition(successor, { type: 'UNLOCK' }) !== 'active') {
      console.warn(`${LOG_PREFIX} Successor ${successor.id} of quest ${quest.id} is not locked; leaving it as is`);
      return null;
    }

    try {
      const unlocked = await this.repository.unlockByOrder(quest.client_id, successor.quest_order);
      console.log(`${LOG_PREFIX} Quest ${quest.id} completed; unlocked order ${successor.quest_order} (${successor.category})`);
      return unlocked;
    } catch (err) {
      console.error(
        `${LOG_PREFIX} Unlock of order ${successor.quest_order} failed after completing quest ${quest.id} ` +
        `(client ${quest.client_id}); a retry will resume it:`,
        err instanceof Error ? err.message : String(err)
      );
      throw err;
    }
  }

  private async notify(quest: QuestRecord, message: string): Promise<void> {
    try {
      await this.notifications.send(
        questCompletedNotification(quest.client_id, quest.agent_id, quest.title, message)
      );
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`${LOG_PREFIX} Completion notification failed for quest ${quest.id}: ${reason}`);
    }
  }
}
