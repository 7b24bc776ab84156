/**
 * Text-generation oracle
 *
 * Structured-JSON generation behind a narrow interface. The Gemini
 * implementation tries the primary model, falls back to the secondary model
 * on error, and bounds every attempt with a timeout.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';

const LOG_PREFIX = '[Text-Oracle]';

export interface TextOracle {
  /**
   * Returns the parsed JSON object the model produced. Rejects on transport
   * error, timeout, or a response that is not a JSON object.
   */
  generate(systemPrompt: string, userPrompt: string, responseShapeHint: string): Promise<Record<string, unknown>>;
}

export interface GeminiOracleOptions {
  apiKey: string | undefined;
  primaryModel: string;
  fallbackModel: string;
  timeoutMs: number;
  temperature?: number;
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function parseJsonObject(text: string): Record<string, unknown> {
  const trimmed = text.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  const parsed: unknown = JSON.parse(trimmed);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Oracle response is not a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export class GeminiTextOracle implements TextOracle {
  // Lazy: the gateway starts without a Gemini key and fails only on use
  private client: GoogleGenerativeAI | null = null;

  constructor(private readonly options: GeminiOracleOptions) {}

  private getClient(): GoogleGenerativeAI {
    if (!this.options.apiKey) {
      throw new Error('GOOGLE_GEMINI_API_KEY not configured - oracle unavailable');
    }
    if (!this.client) {
      this.client = new GoogleGenerativeAI(this.options.apiKey);
      console.log(`${LOG_PREFIX} Gemini client initialized (lazy)`);
    }
    return this.client;
  }

  private async generateWith(model: string, systemPrompt: string, prompt: string): Promise<Record<string, unknown>> {
    const generative = this.getClient().getGenerativeModel(
      {
        model,
        systemInstruction: systemPrompt,
        generationConfig: {
          temperature: this.options.temperature ?? 0.7,
          responseMimeType: 'application/json'
        }
      },
      { timeout: this.options.timeoutMs }
    );

    const result = await withTimeout(generative.generateContent(prompt), this.options.timeoutMs, `Gemini ${model}`);
    return parseJsonObject(result.response.text());
  }

  async generate(systemPrompt: string, userPrompt: string, responseShapeHint: string): Promise<Record<string, unknown>> {
    const prompt = `${userPrompt}\n\nRespond ONLY with JSON in exactly this shape:\n${responseShapeHint}`;

    try {
      return await this.generateWith(this.options.primaryModel, systemPrompt, prompt);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(
        `${LOG_PREFIX} Primary model (${this.options.primaryModel}) failed, falling back to ${this.options.fallbackModel}:`,
        message
      );
      return await this.generateWith(this.options.fallbackModel, systemPrompt, prompt);
    }
  }
}
