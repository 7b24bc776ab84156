/**
 * Quest Service
 *
 * Entry point for quest operations. Every mutation runs inside the owning
 * client's ClientLock and re-reads the quest once inside it, so a decision is
 * never made on a row another request already changed.
 */

import { AxisScores } from '../types/diagnosis';
import { EngineFailure, EngineResult, failure } from '../types/engine-result';
import { QuestChecklist, QuestEvaluation, QuestRecord, QuestStatus } from '../types/quest';
import { ClientDirectory } from './client-directory';
import { ClientLock } from './client-lock';
import { HealthIndexStore } from './health-index-store';
import { QuestAgent } from './quest-agent';
import { QuestRepository } from './quest-repository';
import { InitializeOutcome, QuestSequencer } from './quest-sequencer';
import { lifecycleStateOf } from './quest-state-machine';
import { UnlockController } from './unlock-controller';

const LOG_PREFIX = '[Quest-Service]';

const OVERRIDE_MESSAGE = 'Your agent has marked this mission as complete.';

export interface QuestServiceDeps {
  repository: QuestRepository;
  directory: ClientDirectory;
  healthIndex: HealthIndexStore;
  sequencer: QuestSequencer;
  agent: QuestAgent;
  unlock: UnlockController;
  lock?: ClientLock;
}

export interface ChecklistOutcome {
  quest_id: string;
  checklist: QuestChecklist;
}

export interface EvaluateOutcome {
  quest_id: string;
  evaluation: QuestEvaluation;
  completed: boolean;
  unlocked_quest_id: string | null;
  sequence_complete: boolean;
}

export interface ManualCompleteOutcome {
  quest_id: string;
  completed: boolean;
  unlocked_quest_id: string | null;
  sequence_complete: boolean;
}

/**
 * Deduplicate and bounds-check checked indexes against the checklist length
 */
export function normalizeCheckedIndexes(
  indexes: number[],
  itemCount: number
): EngineResult<{ indexes: number[] }> {
  const outOfRange = indexes.filter(i => !Number.isInteger(i) || i < 0 || i >= itemCount);
  if (outOfRange.length > 0) {
    return failure(
      'VALIDATION_ERROR',
      `Checked index out of range (0..${itemCount - 1}): ${outOfRange.join(', ')}`
    );
  }
  return { ok: true, indexes: [...new Set(indexes)].sort((a, b) => a - b) };
}

/**
 * Attach the quest, client and operation to an oracle failure
 */
function oracleFailure(operation: string, quest: QuestRecord, cause: EngineFailure): EngineFailure {
  const context = `quest ${quest.id}, client ${quest.client_id}, operation ${operation}`;
  console.error(`${LOG_PREFIX} ${operation} failed (${context}): ${cause.message}`);
  return failure(cause.error, `${cause.message} (${context})`);
}

export class QuestService {
  private readonly repository: QuestRepository;
  private readonly directory: ClientDirectory;
  private readonly healthIndex: HealthIndexStore;
  private readonly sequencer: QuestSequencer;
  private readonly agent: QuestAgent;
  private readonly unlock: UnlockController;
  private readonly lock: ClientLock;

  constructor(deps: QuestServiceDeps) {
    this.repository = deps.repository;
    this.directory = deps.directory;
    this.healthIndex = deps.healthIndex;
    this.sequencer = deps.sequencer;
    this.agent = deps.agent;
    this.unlock = deps.unlock;
    this.lock = deps.lock ?? new ClientLock();
  }

  initialize(clientId: string, scores?: AxisScores): Promise<EngineResult<InitializeOutcome>> {
    return this.lock.run(clientId, () => this.sequencer.initialize(clientId, scores));
  }

  /**
   * Quests of a client, initializing them first when the client has none
   */
  async list(clientId: string, status?: QuestStatus): Promise<EngineResult<{ quests: QuestRecord[] }>> {
    let quests = await this.repository.listByClient(clientId);

    if (quests.length === 0) {
      const init = await this.initialize(clientId);
      if (!init.ok) {
        return init;
      }
      quests = init.quests;
    }

    return {
      ok: true,
      quests: status ? quests.filter(q => q.status === status) : quests
    };
  }

  /**
   * The single unlocked, incomplete quest; null once every quest is completed
   */
  async current(clientId: string): Promise<EngineResult<{ quest: QuestRecord | null }>> {
    const listed = await this.list(clientId);
    if (!listed.ok) {
      return listed;
    }

    const active = listed.quests.filter(q => lifecycleStateOf(q) === 'active');
    if (active.length > 1) {
      console.warn(`${LOG_PREFIX} Client ${clientId} has ${active.length} active quests; returning the lowest order`);
    }
    return { ok: true, quest: active[0] ?? null };
  }

  async generateChecklist(questId: string): Promise<EngineResult<ChecklistOutcome>> {
    const found = await this.repository.findById(questId);
    if (!found) {
      return failure('NOT_FOUND', `Quest not found: ${questId}`);
    }

    return this.lock.run(found.client_id, async (): Promise<EngineResult<ChecklistOutcome>> => {
      const quest = await this.repository.findById(questId);
      if (!quest) {
        return failure('NOT_FOUND', `Quest not found: ${questId}`);
      }
      if (quest.is_locked) {
        return failure('LOCKED', `Quest ${questId} is locked`);
      }

      const client = await this.directory.getClient(quest.client_id);
      if (!client) {
        return failure('NOT_FOUND', `Client not found: ${quest.client_id}`);
      }

      const snapshot = await this.healthIndex.getLatest(quest.client_id);
      const generated = await this.agent.generateChecklist({
        clientName: client.name,
        axis: quest.category,
        score: snapshot.scores[quest.category]
      });
      if (!generated.ok) {
        return oracleFailure('generate_checklist', quest, generated);
      }

      await this.repository.saveChecklist(quest.id, generated.checklist);
      console.log(
        `${LOG_PREFIX} Checklist generated for quest ${quest.id} (${quest.category}, ` +
        `${generated.checklist.checklist.length} items)`
      );
      return { ok: true, quest_id: quest.id, checklist: generated.checklist };
    });
  }

  async evaluate(questId: string, checkedIndexes: number[]): Promise<EngineResult<EvaluateOutcome>> {
    const found = await this.repository.findById(questId);
    if (!found) {
      return failure('NOT_FOUND', `Quest not found: ${questId}`);
    }

    return this.lock.run(found.client_id, async (): Promise<EngineResult<EvaluateOutcome>> => {
      const quest = await this.repository.findById(questId);
      if (!quest) {
        return failure('NOT_FOUND', `Quest not found: ${questId}`);
      }
      if (quest.is_locked) {
        return failure('LOCKED', `Quest ${questId} is locked`);
      }
      if (!quest.checklist) {
        return failure('NOT_READY', `Quest ${questId} has no checklist yet`);
      }

      const items = quest.checklist.checklist;
      const normalized = normalizeCheckedIndexes(checkedIndexes, items.length);
      if (!normalized.ok) {
        return normalized;
      }

      const client = await this.directory.getClient(quest.client_id);
      if (!client) {
        return failure('NOT_FOUND', `Client not found: ${quest.client_id}`);
      }

      const verdict = await this.agent.evaluateChecklist({
        clientName: client.name,
        axis: quest.category,
        items,
        checkedIndexes: normalized.indexes
      });
      if (!verdict.ok) {
        return oracleFailure('evaluate', quest, verdict);
      }

      const { evaluation } = verdict;
      await this.repository.saveEvaluation(quest.id, {
        user_answers: normalized.indexes,
        checked_count: evaluation.score,
        ai_evaluation: evaluation
      });

      console.log(
        `${LOG_PREFIX} Quest ${quest.id} evaluated: ${evaluation.score}/${evaluation.total}, ` +
        `passed=${evaluation.passed}`
      );

      // A completed quest only resumes an interrupted unlock; it is never re-completed
      if (!evaluation.passed && quest.status !== 'completed') {
        return {
          ok: true,
          quest_id: quest.id,
          evaluation,
          completed: false,
          unlocked_quest_id: null,
          sequence_complete: false
        };
      }

      const advanced = await this.unlock.advance(quest, { type: 'PASS', message: evaluation.message });
      return {
        ok: true,
        quest_id: quest.id,
        evaluation,
        completed: advanced.completed,
        unlocked_quest_id: advanced.unlocked?.id ?? null,
        sequence_complete: advanced.sequence_complete
      };
    });
  }

  /**
   * Agent override: completes the active quest without an oracle verdict
   */
  async completeManually(questId: string, actorId: string): Promise<EngineResult<ManualCompleteOutcome>> {
    const found = await this.repository.findById(questId);
    if (!found) {
      return failure('NOT_FOUND', `Quest not found: ${questId}`);
    }

    return this.lock.run(found.client_id, async (): Promise<EngineResult<ManualCompleteOutcome>> => {
      const quest = await this.repository.findById(questId);
      if (!quest) {
        return failure('NOT_FOUND', `Quest not found: ${questId}`);
      }
      if (quest.is_locked) {
        return failure('LOCKED', `Quest ${questId} is locked`);
      }

      const advanced = await this.unlock.advance(quest, {
        type: 'OVERRIDE_COMPLETE',
        actorId,
        message: OVERRIDE_MESSAGE
      });
      console.log(`${LOG_PREFIX} Manual completion of quest ${quest.id} by ${actorId}: completed=${advanced.completed}`);

      return {
        ok: true,
        quest_id: quest.id,
        completed: advanced.completed,
        unlocked_quest_id: advanced.unlocked?.id ?? null,
        sequence_complete: advanced.sequence_complete
      };
    });
  }
}
