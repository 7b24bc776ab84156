/**
 * Score Calculator
 *
 * Maps one raw answer to a 0-100 score according to the question's answer
 * type. Pure and total: malformed or missing input scores NEUTRAL_SCORE so a
 * diagnosis can always complete on partial data.
 */

import {
  DiagnosisQuestion,
  RawAnswer,
  NEUTRAL_SCORE,
  NONE_OF_THE_ABOVE
} from '../types/diagnosis';

/**
 * Choice index -> score for single-choice questions
 */
export const CHOICE_SCORE_TIERS: Readonly<Record<number, number>> = {
  0: 15,
  1: 40,
  2: 70,
  3: 100
};

export const MAX_SCORED_CHOICES = 4;

/** Score when the "none" sentinel is selected on a multi-select question */
export const NO_CONCERN_SCORE = 90;
export const CONCERN_BASE_SCORE = 80;
export const CONCERN_PENALTY = 20;
export const CONCERN_FLOOR = 10;

const SLIDER_MULTIPLIER = 10;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function scoreSingleChoice(answer: RawAnswer, choices: readonly string[]): number {
  if (choices.length === 0 || choices.length > MAX_SCORED_CHOICES) {
    return NEUTRAL_SCORE;
  }
  if (typeof answer !== 'string' && typeof answer !== 'number') {
    return NEUTRAL_SCORE;
  }

  const index = choices.indexOf(String(answer));
  return CHOICE_SCORE_TIERS[index] ?? NEUTRAL_SCORE;
}

export function scoreSlider(answer: RawAnswer): number {
  let value: number;
  if (typeof answer === 'number') {
    value = answer;
  } else if (typeof answer === 'string' && answer.trim() !== '') {
    value = Number(answer);
  } else {
    return NEUTRAL_SCORE;
  }

  if (!Number.isFinite(value)) {
    return NEUTRAL_SCORE;
  }
  return clamp(value * SLIDER_MULTIPLIER, 0, 100);
}

export function scoreMultiSelect(answer: RawAnswer, noneChoice: string = NONE_OF_THE_ABOVE): number {
  if (!Array.isArray(answer)) {
    return NEUTRAL_SCORE;
  }

  const selected = new Set(answer.filter((item): item is string => typeof item === 'string'));
  if (selected.has(noneChoice)) {
    return NO_CONCERN_SCORE;
  }

  const concerns = selected.size;
  if (concerns === 0) {
    return NEUTRAL_SCORE;
  }
  return Math.max(CONCERN_FLOOR, CONCERN_BASE_SCORE - CONCERN_PENALTY * concerns);
}

/**
 * Score a single answer against its question
 */
export function scoreAnswer(answer: RawAnswer, question: DiagnosisQuestion): number {
  if (answer === null || answer === undefined) {
    return NEUTRAL_SCORE;
  }

  switch (question.answer_type) {
    case 'single-choice':
      return scoreSingleChoice(answer, question.choices);
    case 'scalar-slider':
      return scoreSlider(answer);
    case 'multi-select':
      return scoreMultiSelect(answer, question.none_choice ?? NONE_OF_THE_ABOVE);
  }
}
