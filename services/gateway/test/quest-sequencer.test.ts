/**
 * Quest Sequencer Tests
 *
 * Tests for:
 * - Weakest-axis-first ordering with declaration-order tie-break
 * - Only order 1 unlocked on creation
 * - Idempotent initialization, including concurrent calls
 */

import { planQuests, sequenceAxes } from '../src/services/quest-sequencer';
import { AxisScores, neutralAxisScores } from '../src/types/diagnosis';
import { AGENT_ID, CLIENT_ID, QuestEngine, buildQuestEngine } from './__mocks__/quest-engine-harness';

const scenarioScores: AxisScores = {
  asset_stability: 20,
  time_independence: 90,
  physical_condition: 50,
  emotional_balance: 50,
  network_power: 50,
  system_leverage: 50
};

describe('sequenceAxes', () => {
  it('orders ascending by score, ties in declaration order', () => {
    expect(sequenceAxes(scenarioScores).map(s => s.axis)).toEqual([
      'asset_stability',
      'physical_condition',
      'emotional_balance',
      'network_power',
      'system_leverage',
      'time_independence'
    ]);
  });

  it('falls back to declaration order when every score is equal', () => {
    expect(sequenceAxes(neutralAxisScores()).map(s => `${s.order}:${s.axis}`)).toEqual([
      '1:asset_stability',
      '2:time_independence',
      '3:physical_condition',
      '4:emotional_balance',
      '5:network_power',
      '6:system_leverage'
    ]);
  });
});

describe('planQuests', () => {
  it('locks every quest except order 1', () => {
    let n = 0;
    const plan = planQuests(CLIENT_ID, AGENT_ID, scenarioScores, () => `q${++n}`);

    expect(plan[0]).toEqual({
      id: 'q1',
      client_id: CLIENT_ID,
      agent_id: AGENT_ID,
      title: 'Asset Stability Check-up',
      category: 'asset_stability',
      quest_order: 1,
      is_locked: false,
      status: 'pending'
    });
    expect(plan.slice(1).every(q => q.is_locked)).toBe(true);
    expect(plan.map(q => q.quest_order)).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe('QuestSequencer.initialize', () => {
  let engine: QuestEngine;

  beforeEach(() => {
    engine = buildQuestEngine();
  });

  it('creates six quests with the weakest axis unlocked', async () => {
    const result = await engine.sequencer.initialize(CLIENT_ID, scenarioScores);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.already_initialized).toBe(false);
    expect(result.created).toBe(6);

    const first = engine.repository.byOrder(CLIENT_ID, 1);
    expect(first.category).toBe('asset_stability');
    expect(first.is_locked).toBe(false);
    for (let order = 2; order <= 6; order++) {
      expect(engine.repository.byOrder(CLIENT_ID, order).is_locked).toBe(true);
    }
    expect(engine.repository.byOrder(CLIENT_ID, 6).category).toBe('time_independence');
  });

  it('is a no-op the second time', async () => {
    await engine.sequencer.initialize(CLIENT_ID, scenarioScores);
    const again = await engine.sequencer.initialize(CLIENT_ID, neutralAxisScores());

    expect(again.ok).toBe(true);
    if (!again.ok) return;
    expect(again.already_initialized).toBe(true);
    expect(again.created).toBe(0);
    expect(engine.repository.rows.size).toBe(6);
    expect(engine.repository.byOrder(CLIENT_ID, 1).category).toBe('asset_stability');
  });

  it('never creates more than six rows under concurrent calls', async () => {
    const results = await Promise.all([
      engine.sequencer.initialize(CLIENT_ID, scenarioScores),
      engine.sequencer.initialize(CLIENT_ID, scenarioScores),
      engine.sequencer.initialize(CLIENT_ID, scenarioScores)
    ]);

    expect(engine.repository.rows.size).toBe(6);
    const created = results.map(r => (r.ok ? r.created : -1));
    expect(created.reduce((a, b) => a + b, 0)).toBe(6);
  });

  it('uses the stored Health Index when no scores are given', async () => {
    await engine.healthIndex.upsert(CLIENT_ID, {
      scores: { ...neutralAxisScores(), network_power: 10 },
      overall_score: 43
    });

    await engine.sequencer.initialize(CLIENT_ID);
    expect(engine.repository.byOrder(CLIENT_ID, 1).category).toBe('network_power');
  });

  it('uses neutral scores when the client has no Health Index', async () => {
    await engine.sequencer.initialize(CLIENT_ID);
    expect(engine.repository.byOrder(CLIENT_ID, 1).category).toBe('asset_stability');
  });

  it('rejects unknown clients', async () => {
    const result = await engine.sequencer.initialize('client-404', scenarioScores);
    expect(result).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Client not found: client-404' });
    expect(engine.repository.rows.size).toBe(0);
  });
});
