import { z } from 'zod';

/**
 * Gateway configuration, read from the environment once per process.
 *
 * Integrations that are not configured stay undefined; callers decide whether
 * that disables a feature or fails the request.
 */

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SUPABASE_SERVICE_ROLE: optionalString,
  SUPABASE_JWT_SECRET: optionalString,
  GOOGLE_GEMINI_API_KEY: optionalString,
  ORACLE_PRIMARY_MODEL: z.string().default('gemini-2.5-pro'),
  ORACLE_FALLBACK_MODEL: z.string().default('gemini-2.5-flash'),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FIREBASE_PROJECT_ID: optionalString,
  DIAGNOSIS_QUESTIONS_PATH: optionalString,
  DIAGNOSIS_SESSION_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  QUEST_MIN_CHECKS: z.coerce.number().int().min(1).default(3),
  CORS_ALLOWED_ORIGINS: optionalString
});

export interface GatewayConfig {
  port: number;
  supabase: {
    url: string | undefined;
    serviceRoleKey: string | undefined;
    jwtSecret: string | undefined;
  };
  oracle: {
    apiKey: string | undefined;
    primaryModel: string;
    fallbackModel: string;
    timeoutMs: number;
  };
  firebaseProjectId: string | undefined;
  diagnosis: {
    questionsPath: string | undefined;
    sessionTtlMs: number;
  };
  quest: {
    minChecks: number;
  };
  corsAllowedOrigins: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`[Config] Invalid environment: ${details}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    supabase: {
      url: e.SUPABASE_URL,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY ?? e.SUPABASE_SERVICE_ROLE,
      jwtSecret: e.SUPABASE_JWT_SECRET
    },
    oracle: {
      apiKey: e.GOOGLE_GEMINI_API_KEY,
      primaryModel: e.ORACLE_PRIMARY_MODEL,
      fallbackModel: e.ORACLE_FALLBACK_MODEL,
      timeoutMs: e.ORACLE_TIMEOUT_MS
    },
    firebaseProjectId: e.FIREBASE_PROJECT_ID,
    diagnosis: {
      questionsPath: e.DIAGNOSIS_QUESTIONS_PATH,
      sessionTtlMs: e.DIAGNOSIS_SESSION_TTL_MS
    },
    quest: {
      minChecks: e.QUEST_MIN_CHECKS
    },
    corsAllowedOrigins: (e.CORS_ALLOWED_ORIGINS ?? '')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean)
  };
}
