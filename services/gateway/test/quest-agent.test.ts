/**
 * Quest Agent Tests
 *
 * Tests for:
 * - Checklist prompt content and key-presence checks
 * - Locally counted score vs. the oracle's authoritative verdict
 * - Oracle failures surfacing as ORACLE_UNAVAILABLE
 */

import {
  QuestAgent,
  buildChecklistPrompt,
  buildEvaluationPrompt,
  splitChecklist
} from '../src/services/quest-agent';
import { parseJsonObject } from '../src/services/text-oracle';
import { SAMPLE_CHECKLIST_RESPONSE, ScriptedOracle, failVerdict } from './__mocks__/quest-engine-fakes';

const items = SAMPLE_CHECKLIST_RESPONSE.checklist;

describe('Quest Agent prompts', () => {
  it('combines the axis label, score and empathy context', () => {
    const prompt = buildChecklistPrompt({ clientName: 'Jamie', axis: 'time_independence', score: 35 });
    expect(prompt.split('\n')[0]).toBe(
      'Jamie currently scores 35 on Time Independence and is being chased by the clock. ' +
      '"When will I ever have some slack?" Every day just feels busy.'
    );
  });

  it('splits checked and unchecked items by index', () => {
    expect(splitChecklist(['a', 'b', 'c'], [2, 0])).toEqual({ checked: ['a', 'c'], unchecked: ['b'] });
  });

  it('states the pass bar in the evaluation prompt', () => {
    const prompt = buildEvaluationPrompt({
      clientName: 'Jamie',
      axis: 'asset_stability',
      items: ['a', 'b'],
      checkedIndexes: [1],
      minChecks: 3
    });
    expect(prompt).toContain('Checked items (1/2):\n✓ b');
    expect(prompt).toContain('Unchecked items:\n☐ a');
    expect(prompt).toContain('- 3 or more checked items passes (passed: true).');
  });
});

describe('QuestAgent', () => {
  let oracle: ScriptedOracle;
  let agent: QuestAgent;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    oracle = new ScriptedOracle();
    agent = new QuestAgent(oracle, 3);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  describe('generateChecklist', () => {
    it('returns the oracle checklist as given', async () => {
      oracle.enqueue({ ...SAMPLE_CHECKLIST_RESPONSE, checklist: ['only one'], minChecks: 1 });

      const result = await agent.generateChecklist({ clientName: 'Jamie', axis: 'asset_stability', score: 20 });

      expect(result).toEqual({
        ok: true,
        checklist: {
          intro: 'Steady ground first',
          subtitle: 'You are closer than you think.',
          checklist: ['only one'],
          min_checks: 1
        }
      });
      expect(oracle.calls[0].shapeHint).toContain('"minChecks": 3');
    });

    it('falls back to the default pass bar when minChecks is absent', async () => {
      const { minChecks: _omitted, ...withoutMin } = SAMPLE_CHECKLIST_RESPONSE;
      oracle.enqueue(withoutMin);

      const result = await agent.generateChecklist({ clientName: 'Jamie', axis: 'asset_stability', score: 20 });
      expect(result.ok && result.checklist.min_checks).toBe(3);
    });

    it('reports a missing key as ORACLE_UNAVAILABLE', async () => {
      oracle.enqueue({ intro: 'x', checklist: [] });

      const result = await agent.generateChecklist({ clientName: 'Jamie', axis: 'asset_stability', score: 20 });
      expect(result).toEqual({
        ok: false,
        error: 'ORACLE_UNAVAILABLE',
        message: 'Checklist generation returned an unexpected shape'
      });
    });

    it('reports an oracle error as ORACLE_UNAVAILABLE', async () => {
      oracle.enqueue(new Error('Gemini gemini-2.5-flash timed out after 30000ms'));

      const result = await agent.generateChecklist({ clientName: 'Jamie', axis: 'asset_stability', score: 20 });
      expect(result).toEqual({
        ok: false,
        error: 'ORACLE_UNAVAILABLE',
        message: 'Checklist generation failed: Gemini gemini-2.5-flash timed out after 30000ms'
      });
    });
  });

  describe('evaluateChecklist', () => {
    it('counts score and total locally', async () => {
      oracle.enqueue({ passed: true, score: 99, total: 99, message: 'Well done', nextStep: 'Keep going' });

      const result = await agent.evaluateChecklist({
        clientName: 'Jamie',
        axis: 'asset_stability',
        items,
        checkedIndexes: [0, 1, 2]
      });

      expect(result).toEqual({
        ok: true,
        evaluation: { passed: true, score: 3, total: 5, message: 'Well done', next_step: 'Keep going' }
      });
    });

    it('keeps a failing verdict even when the numeric bar is met', async () => {
      oracle.enqueue(failVerdict('The answers look rushed.'));

      const result = await agent.evaluateChecklist({
        clientName: 'Jamie',
        axis: 'asset_stability',
        items,
        checkedIndexes: [0, 1, 2, 3, 4]
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.evaluation.passed).toBe(false);
      expect(result.evaluation.score).toBe(5);
      expect(result.evaluation.message).toBe('The answers look rushed.');
    });

    it('defaults next_step to an empty string', async () => {
      oracle.enqueue({ passed: false, message: 'Not yet' });

      const result = await agent.evaluateChecklist({ clientName: 'Jamie', axis: 'asset_stability', items, checkedIndexes: [] });
      expect(result.ok && result.evaluation.next_step).toBe('');
    });

    it('reports a verdict without passed as ORACLE_UNAVAILABLE', async () => {
      oracle.enqueue({ message: 'Looks good' });

      const result = await agent.evaluateChecklist({ clientName: 'Jamie', axis: 'asset_stability', items, checkedIndexes: [0] });
      expect(result.ok).toBe(false);
      expect(!result.ok && result.error).toBe('ORACLE_UNAVAILABLE');
    });
  });
});

describe('parseJsonObject', () => {
  it('strips a fenced code block', () => {
    expect(parseJsonObject('```json\n{"passed": true}\n```')).toEqual({ passed: true });
  });

  it('rejects arrays', () => {
    expect(() => parseJsonObject('[1, 2]')).toThrow('Oracle response is not a JSON object');
  });
});
