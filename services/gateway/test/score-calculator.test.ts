/**
 * Score Calculator Tests
 *
 * Tests for:
 * - Single-choice tier lookup and neutral fallbacks
 * - Slider scaling and clamping
 * - Multi-select concern penalty and the "none" sentinel
 */

import {
  scoreAnswer,
  scoreMultiSelect,
  scoreSingleChoice,
  scoreSlider
} from '../src/services/score-calculator';
import { DiagnosisQuestion } from '../src/types/diagnosis';

const CHOICES = ['Under 1 hour', '1 to 3 hours', '3 to 6 hours', 'Over 6 hours'];

const singleChoice: DiagnosisQuestion = {
  id: 'time_1',
  category: 'time',
  prompt: 'How many hours a day do you have for yourself?',
  answer_type: 'single-choice',
  choices: CHOICES,
  order: 1
};

const slider: DiagnosisQuestion = {
  id: 'body_3',
  category: 'body',
  prompt: 'Rate your energy from 1 to 10',
  answer_type: 'scalar-slider',
  choices: [],
  order: 2
};

const multiSelect: DiagnosisQuestion = {
  id: 'emotion_4',
  category: 'emotion',
  prompt: 'What weighs on you lately?',
  answer_type: 'multi-select',
  choices: ['Money', 'Relationships', 'Health', 'Future', 'None'],
  order: 3
};

describe('Score Calculator', () => {
  describe('single-choice', () => {
    it.each([
      ['Under 1 hour', 15],
      ['1 to 3 hours', 40],
      ['3 to 6 hours', 70],
      ['Over 6 hours', 100]
    ])('scores "%s" as %d', (answer, expected) => {
      expect(scoreSingleChoice(answer, CHOICES)).toBe(expected);
    });

    it('returns 50 for a label outside the choice list', () => {
      expect(scoreSingleChoice('About 2 hours', CHOICES)).toBe(50);
    });

    it('matches labels exactly', () => {
      expect(scoreSingleChoice('over 6 hours', CHOICES)).toBe(50);
      expect(scoreSingleChoice(' Over 6 hours', CHOICES)).toBe(50);
    });

    it('returns 50 when the question declares more than four choices', () => {
      expect(scoreSingleChoice('a', ['a', 'b', 'c', 'd', 'e'])).toBe(50);
    });

    it('returns 50 for array answers', () => {
      expect(scoreSingleChoice(['Over 6 hours'], CHOICES)).toBe(50);
    });
  });

  describe('scalar-slider', () => {
    it.each([
      [0, 0],
      [10, 100],
      [-5, 0],
      [15, 100],
      [7, 70],
      [5.5, 55]
    ])('scores %d as %d', (value, expected) => {
      expect(scoreSlider(value)).toBe(expected);
    });

    it('accepts numeric strings', () => {
      expect(scoreSlider('8')).toBe(80);
    });

    it('returns 50 for non-numeric input', () => {
      expect(scoreSlider('high')).toBe(50);
      expect(scoreSlider('')).toBe(50);
      expect(scoreSlider(['7'])).toBe(50);
    });
  });

  describe('multi-select', () => {
    it('scores 90 when the sentinel is selected, whatever else is selected', () => {
      expect(scoreMultiSelect(['None'])).toBe(90);
      expect(scoreMultiSelect(['Money', 'Health', 'None'])).toBe(90);
    });

    it.each([
      [['Money'], 60],
      [['Money', 'Health'], 40],
      [['Money', 'Health', 'Future'], 20],
      [['Money', 'Health', 'Future', 'Relationships'], 10]
    ])('scores %j as %d', (answer, expected) => {
      expect(scoreMultiSelect(answer)).toBe(expected);
    });

    it('returns 50 for an empty selection', () => {
      expect(scoreMultiSelect([])).toBe(50);
    });

    it('counts a repeated selection once', () => {
      expect(scoreMultiSelect(['Money', 'Money'])).toBe(60);
    });

    it('honours a custom sentinel label', () => {
      expect(scoreMultiSelect(['Nothing'], 'Nothing')).toBe(90);
      expect(scoreMultiSelect(['None'], 'Nothing')).toBe(60);
    });

    it('returns 50 for a scalar answer', () => {
      expect(scoreMultiSelect('Money')).toBe(50);
    });
  });

  describe('scoreAnswer', () => {
    it('returns 50 for a missing answer of any type', () => {
      expect(scoreAnswer(undefined, singleChoice)).toBe(50);
      expect(scoreAnswer(null, slider)).toBe(50);
      expect(scoreAnswer(undefined, multiSelect)).toBe(50);
    });

    it('dispatches on the answer type', () => {
      expect(scoreAnswer('3 to 6 hours', singleChoice)).toBe(70);
      expect(scoreAnswer(3, slider)).toBe(30);
      expect(scoreAnswer(['Money', 'Health'], multiSelect)).toBe(40);
    });
  });
});
