/**
 * Diagnosis Aggregator + Question Battery Tests
 */

import { aggregateDiagnosis } from '../src/services/diagnosis-aggregator';
import { findQuestion, loadQuestionBattery, parseQuestionBattery } from '../src/services/question-battery';
import { AnswerMap, HEALTH_AXES } from '../src/types/diagnosis';
import { BATTERY_PATH } from './__mocks__/quest-engine-harness';

const battery = loadQuestionBattery(BATTERY_PATH);

function bestAnswers(): AnswerMap {
  const answers: AnswerMap = {};
  for (const question of battery.questions) {
    if (question.answer_type === 'single-choice') {
      answers[question.id] = question.choices[3];
    } else if (question.answer_type === 'scalar-slider') {
      answers[question.id] = 10;
    } else {
      answers[question.id] = ['None'];
    }
  }
  return answers;
}

describe('Question Battery', () => {
  it('loads twenty questions in display order', () => {
    expect(battery.questions).toHaveLength(20);
    expect(battery.questions.map(q => q.order)).toEqual(
      Array.from({ length: 20 }, (_, i) => i + 1)
    );
  });

  it('loads the bundled battery when no path is given', () => {
    const bundled = loadQuestionBattery();
    expect(bundled.version).toBe('2026.1');
    expect(bundled.questions).toEqual(battery.questions);
  });

  it('reports a missing battery file', () => {
    expect(() => loadQuestionBattery('/nonexistent/questions.json'))
      .toThrow('Battery file not found: /nonexistent/questions.json');
  });

  it('covers every category', () => {
    const categories = new Set(battery.questions.map(q => q.category));
    expect([...categories].sort()).toEqual(['asset', 'body', 'emotion', 'network', 'system', 'time']);
  });

  it('finds questions by id', () => {
    expect(findQuestion(battery, 'emotion_4')?.answer_type).toBe('multi-select');
    expect(findQuestion(battery, 'missing_1')).toBeUndefined();
  });

  it('rejects duplicate question ids', () => {
    const question = { id: 'q1', category: 'asset', prompt: 'p', answer_type: 'scalar-slider', order: 1 };
    expect(() => parseQuestionBattery({ version: 'x', questions: [question, { ...question, order: 2 }] }))
      .toThrow('Duplicate question id: q1');
  });

  it('rejects an unknown category', () => {
    expect(() => parseQuestionBattery({
      version: 'x',
      questions: [{ id: 'q1', category: 'wealth', prompt: 'p', answer_type: 'scalar-slider', order: 1 }]
    })).toThrow('Invalid question battery');
  });

  it('sorts by order regardless of file order', () => {
    const parsed = parseQuestionBattery({
      version: 'x',
      questions: [
        { id: 'b', category: 'time', prompt: 'p', answer_type: 'scalar-slider', order: 2 },
        { id: 'a', category: 'asset', prompt: 'p', answer_type: 'scalar-slider', order: 1 }
      ]
    });
    expect(parsed.questions.map(q => q.id)).toEqual(['a', 'b']);
  });
});

describe('Diagnosis Aggregator', () => {
  it('yields 50 everywhere when no question is answered', () => {
    const result = aggregateDiagnosis(battery, {});
    for (const axis of HEALTH_AXES) {
      expect(result.scores[axis]).toBe(50);
    }
    expect(result.overall_score).toBe(50);
  });

  it('averages each category and the overall score', () => {
    const result = aggregateDiagnosis(battery, bestAnswers());

    expect(result.scores).toEqual({
      asset_stability: 100,
      time_independence: 100,
      physical_condition: 100,
      // slider 100, two single-choice 100, "None" 90 -> 97.5
      emotional_balance: 98,
      network_power: 100,
      system_leverage: 100
    });
    expect(result.overall_score).toBe(100);
  });

  it('treats unanswered questions in a category as neutral', () => {
    const result = aggregateDiagnosis(battery, {
      asset_1: 'Deficit or zero',
      asset_2: '1 to 3 months'
    });

    // (15 + 40 + 50) / 3
    expect(result.scores.asset_stability).toBe(35);
    expect(result.scores.time_independence).toBe(50);
    // (35 + 5 * 50) / 6 = 47.5
    expect(result.overall_score).toBe(48);
  });

  it('ignores answers for ids outside the battery', () => {
    const result = aggregateDiagnosis(battery, { bonus_1: 'Over 2M KRW' });
    expect(result.overall_score).toBe(50);
  });

  it('is deterministic', () => {
    const answers = bestAnswers();
    expect(aggregateDiagnosis(battery, answers)).toEqual(aggregateDiagnosis(battery, answers));
  });
});
