/**
 * Quest Sequencer
 *
 * Seeds a client's six quests from their axis scores: weakest axis first,
 * ties broken by HEALTH_AXES declaration order, only order 1 unlocked.
 *
 * Initialization is idempotent. Duplicate prevention relies on the
 * (client_id, category) unique constraint with insert-or-ignore, so
 * concurrent or retried calls never produce more than six rows.
 */

import { randomUUID } from 'crypto';
import { AxisScores, HEALTH_AXES, HealthAxis } from '../types/diagnosis';
import { EngineResult, failure } from '../types/engine-result';
import { NewQuest, QuestRecord } from '../types/quest';
import { questTitle } from './axis-catalog';
import { ClientDirectory } from './client-directory';
import { HealthIndexStore } from './health-index-store';
import { QuestRepository } from './quest-repository';

const LOG_PREFIX = '[Quest-Sequencer]';

export interface SequencedAxis {
  axis: HealthAxis;
  score: number;
  order: number;
}

/**
 * Order axes ascending by score; equal scores keep declaration order
 */
export function sequenceAxes(scores: AxisScores): SequencedAxis[] {
  return HEALTH_AXES
    .map((axis, priority) => ({ axis, score: scores[axis], priority }))
    .sort((a, b) => a.score - b.score || a.priority - b.priority)
    .map(({ axis, score }, index) => ({ axis, score, order: index + 1 }));
}

export function planQuests(
  clientId: string,
  agentId: string | null,
  scores: AxisScores,
  generateId: () => string = randomUUID
): NewQuest[] {
  return sequenceAxes(scores).map(({ axis, order }): NewQuest => ({
    id: generateId(),
    client_id: clientId,
    agent_id: agentId,
    title: questTitle(axis),
    category: axis,
    quest_order: order,
    is_locked: order !== 1,
    status: 'pending'
  }));
}

export interface InitializeOutcome {
  already_initialized: boolean;
  created: number;
  quests: QuestRecord[];
}

export class QuestSequencer {
  constructor(
    private readonly repository: QuestRepository,
    private readonly directory: ClientDirectory,
    private readonly healthIndex: HealthIndexStore,
    private readonly generateId: () => string = randomUUID
  ) {}

  /**
   * @param scores - axis scores to sequence by; the latest Health Index
   * (or the neutral default) when omitted
   */
  async initialize(clientId: string, scores?: AxisScores): Promise<EngineResult<InitializeOutcome>> {
    const client = await this.directory.getClient(clientId);
    if (!client) {
      return failure('NOT_FOUND', `Client not found: ${clientId}`);
    }

    const existing = await this.repository.listByClient(clientId);
    if (existing.length > 0) {
      console.log(`${LOG_PREFIX} Quests already initialized for client ${clientId}`);
      return { ok: true, already_initialized: true, created: 0, quests: existing };
    }

    const axisScores = scores ?? (await this.healthIndex.getLatest(clientId)).scores;
    const plan = planQuests(clientId, client.agent_id, axisScores, this.generateId);
    const created = await this.repository.insertIgnoringDuplicates(plan);
    const quests = await this.repository.listByClient(clientId);

    console.log(
      `${LOG_PREFIX} Initialized client ${clientId}: ${created} quest(s) created, ` +
      `first = ${plan[0]?.category ?? 'none'}`
    );
    return { ok: true, already_initialized: created === 0, created, quests };
  }
}
