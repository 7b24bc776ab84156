/**
 * Diagnosis Aggregator
 *
 * Scores every question in the battery, averages per health axis and
 * averages the six axes into the overall score. Deterministic; persistence
 * belongs to the caller.
 */

import {
  AnswerMap,
  AxisScores,
  DiagnosisResult,
  HEALTH_AXES,
  HealthAxis,
  NEUTRAL_SCORE,
  QuestionBattery,
  toHealthAxis
} from '../types/diagnosis';
import { scoreAnswer } from './score-calculator';

function roundedMean(values: number[]): number {
  if (values.length === 0) {
    return NEUTRAL_SCORE;
  }
  const sum = values.reduce((acc, v) => acc + v, 0);
  return Math.round(sum / values.length);
}

export function aggregateDiagnosis(battery: QuestionBattery, answers: AnswerMap): DiagnosisResult {
  const grouped = new Map<HealthAxis, number[]>(HEALTH_AXES.map(axis => [axis, []]));

  for (const question of battery.questions) {
    const score = scoreAnswer(answers[question.id], question);
    grouped.get(toHealthAxis(question.category))?.push(score);
  }

  const axisMean = (axis: HealthAxis): number => roundedMean(grouped.get(axis) ?? []);
  const scores: AxisScores = {
    asset_stability: axisMean('asset_stability'),
    time_independence: axisMean('time_independence'),
    physical_condition: axisMean('physical_condition'),
    emotional_balance: axisMean('emotional_balance'),
    network_power: axisMean('network_power'),
    system_leverage: axisMean('system_leverage')
  };

  return {
    scores,
    overall_score: roundedMean(HEALTH_AXES.map(axis => scores[axis]))
  };
}
