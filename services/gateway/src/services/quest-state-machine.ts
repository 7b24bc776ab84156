/**
 * Quest Lifecycle State Machine (XState v5)
 *
 * The gateway keeps no quest state in memory. Each request rehydrates the
 * machine from the persisted (is_locked, status) pair, evaluates one event,
 * and the caller persists the resulting state.
 *
 * State flow:
 *   locked → active            (UNLOCK: predecessor completed)
 *   active → completed         (PASS: oracle verdict, or OVERRIDE_COMPLETE)
 *   completed is final
 */

import { setup, createActor } from 'xstate';
import type {
  QuestLifecycleState,
  QuestMachineContext,
  QuestMachineEvent,
  QuestRecord
} from '../types/quest';

// =============================================================================
// Machine Definition
// =============================================================================

export const questMachine = setup({
  types: {
    context: {} as QuestMachineContext,
    events: {} as QuestMachineEvent,
  },
}).createMachine({
  id: 'quest',
  initial: 'locked',
  context: {
    questId: '',
    questOrder: 0,
  },
  states: {
    locked: {
      on: {
        UNLOCK: {
          target: 'active',
        },
      },
    },
    active: {
      on: {
        PASS: {
          target: 'completed',
        },
        OVERRIDE_COMPLETE: {
          target: 'completed',
        },
      },
    },
    completed: {
      type: 'final',
    },
  },
});

// =============================================================================
// Transition Helpers
// =============================================================================

export function lifecycleStateOf(quest: Pick<QuestRecord, 'is_locked' | 'status'>): QuestLifecycleState {
  if (quest.status === 'completed') {
    return 'completed';
  }
  return quest.is_locked ? 'locked' : 'active';
}

function isLifecycleState(value: unknown): value is QuestLifecycleState {
  return value === 'locked' || value === 'active' || value === 'completed';
}

/**
 * Evaluate a transition without persisting.
 *
 * @returns the new state, or null when the event is not accepted in the
 * current state
 */
export function evaluateQuestTransition(
  quest: Pick<QuestRecord, 'id' | 'quest_order' | 'is_locked' | 'status'>,
  event: QuestMachineEvent
): QuestLifecycleState | null {
  const currentState = lifecycleStateOf(quest);
  const actor = createActor(questMachine, {
    snapshot: questMachine.resolveState({
      value: currentState,
      context: { questId: quest.id, questOrder: quest.quest_order },
    }),
  });

  actor.start();
  actor.send(event);
  const nextValue = actor.getSnapshot().value;
  actor.stop();

  if (!isLifecycleState(nextValue) || nextValue === currentState) {
    return null;
  }
  return nextValue;
}
