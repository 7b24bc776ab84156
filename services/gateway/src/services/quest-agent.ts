/**
 * Quest Agent
 *
 * Oracle boundary for quest checklists: builds the mentor prompts, asks the
 * oracle for a checklist or a verdict, and checks only that the expected keys
 * are present. Item counts are not validated; the oracle's checklist is kept
 * as returned.
 *
 * Evaluation keeps two independent facts: the locally counted score and the
 * oracle's pass/fail verdict. The verdict may fail a client who met the
 * numeric bar.
 */

import { z } from 'zod';
import { HealthAxis } from '../types/diagnosis';
import { EngineResult, failure } from '../types/engine-result';
import { QuestChecklist, QuestEvaluation } from '../types/quest';
import { axisLabel, empathyContext } from './axis-catalog';
import { TextOracle } from './text-oracle';

const LOG_PREFIX = '[Quest-Agent]';

const CHECKLIST_SYSTEM_PROMPT = 'You are a business mentor with ten years of experience coaching owner-operators.';
const EVALUATION_SYSTEM_PROMPT = 'You are an expert mentor who helps business owners grow.';

const CHECKLIST_SHAPE = `{
  "intro": "short, punchy title",
  "subtitle": "warm encouragement addressed to the owner",
  "checklist": ["question 1", "question 2", "question 3", "question 4", "question 5"],
  "minChecks": 3
}`;

const EVALUATION_SHAPE = `{
  "passed": true or false,
  "score": <number of checked items>,
  "total": <number of items>,
  "message": "evaluation and encouragement (3-4 sentences)",
  "nextStep": "next-step guidance when passed, empty string otherwise"
}`;

const GeneratedChecklistSchema = z.object({
  intro: z.string(),
  subtitle: z.string(),
  checklist: z.array(z.string()),
  minChecks: z.number().int().optional()
});

const OracleVerdictSchema = z.object({
  passed: z.boolean(),
  message: z.string(),
  nextStep: z.string().optional()
});

export interface ChecklistRequest {
  clientName: string;
  axis: HealthAxis;
  score: number;
}

export interface EvaluationRequest {
  clientName: string;
  axis: HealthAxis;
  items: string[];
  checkedIndexes: number[];
  minChecks: number;
}

export function buildChecklistPrompt({ clientName, axis, score }: ChecklistRequest): string {
  return `${clientName} currently scores ${score} on ${axisLabel(axis)} and ${empathyContext(axis)}

Write a warm, concrete self-check list that lets ${clientName} feel "I'm doing better than I thought" or "I just need to fill these gaps".

Requirements:
- 5 to 7 items
- Each item is a yes/no question ("Have you ...?" or "Are you ...?")
- Encouraging, never blaming
- Specific and actionable
- Written from a business owner's point of view`;
}

export function splitChecklist(items: string[], checkedIndexes: number[]): { checked: string[]; unchecked: string[] } {
  const selected = new Set(checkedIndexes);
  return {
    checked: items.filter((_, i) => selected.has(i)),
    unchecked: items.filter((_, i) => !selected.has(i))
  };
}

export function buildEvaluationPrompt({ clientName, axis, items, checkedIndexes, minChecks }: EvaluationRequest): string {
  const label = axisLabel(axis);
  const { checked, unchecked } = splitChecklist(items, checkedIndexes);

  return `${clientName} has completed the "${label}" checklist.

Checked items (${checked.length}/${items.length}):
${checked.map(item => `✓ ${item}`).join('\n')}

Unchecked items:
${unchecked.map(item => `☐ ${item}`).join('\n')}

Assess ${clientName}'s readiness to improve "${label}" and decide whether they can move to the next step.

Criteria:
- ${minChecks} or more checked items passes (passed: true).
- If essential items are missing or the answers look careless, you may recommend a review instead.
- Keep the tone very warm and encouraging, with professional insight.`;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class QuestAgent {
  constructor(
    private readonly oracle: TextOracle,
    private readonly defaultMinChecks: number
  ) {}

  async generateChecklist(request: ChecklistRequest): Promise<EngineResult<{ checklist: QuestChecklist }>> {
    let raw: Record<string, unknown>;
    try {
      raw = await this.oracle.generate(CHECKLIST_SYSTEM_PROMPT, buildChecklistPrompt(request), CHECKLIST_SHAPE);
    } catch (err) {
      console.error(`${LOG_PREFIX} checklist generation failed (${request.axis}):`, describeError(err));
      return failure('ORACLE_UNAVAILABLE', `Checklist generation failed: ${describeError(err)}`);
    }

    const parsed = GeneratedChecklistSchema.safeParse(raw);
    if (!parsed.success) {
      console.error(`${LOG_PREFIX} checklist response missing keys (${request.axis}):`, parsed.error.errors);
      return failure('ORACLE_UNAVAILABLE', 'Checklist generation returned an unexpected shape');
    }

    return {
      ok: true,
      checklist: {
        intro: parsed.data.intro,
        subtitle: parsed.data.subtitle,
        checklist: parsed.data.checklist,
        min_checks: parsed.data.minChecks ?? this.defaultMinChecks
      }
    };
  }

  async evaluateChecklist(
    request: Omit<EvaluationRequest, 'minChecks'>
  ): Promise<EngineResult<{ evaluation: QuestEvaluation }>> {
    const fullRequest: EvaluationRequest = { ...request, minChecks: this.defaultMinChecks };

    let raw: Record<string, unknown>;
    try {
      raw = await this.oracle.generate(EVALUATION_SYSTEM_PROMPT, buildEvaluationPrompt(fullRequest), EVALUATION_SHAPE);
    } catch (err) {
      console.error(`${LOG_PREFIX} evaluation failed (${request.axis}):`, describeError(err));
      return failure('ORACLE_UNAVAILABLE', `Checklist evaluation failed: ${describeError(err)}`);
    }

    const parsed = OracleVerdictSchema.safeParse(raw);
    if (!parsed.success) {
      console.error(`${LOG_PREFIX} evaluation response missing keys (${request.axis}):`, parsed.error.errors);
      return failure('ORACLE_UNAVAILABLE', 'Checklist evaluation returned an unexpected shape');
    }

    const { checked } = splitChecklist(request.items, request.checkedIndexes);
    return {
      ok: true,
      evaluation: {
        passed: parsed.data.passed,
        score: checked.length,
        total: request.items.length,
        message: parsed.data.message,
        next_step: parsed.data.nextStep ?? ''
      }
    };
  }
}
