/**
 * Result envelope shared by the diagnosis and quest services.
 *
 * Services report domain failures as values; only programming errors throw.
 */

export const ENGINE_ERROR_CODES = [
  'NOT_FOUND',
  'LOCKED',
  'NOT_READY',
  'ORACLE_UNAVAILABLE',
  'PERSISTENCE_LOST',
  'VALIDATION_ERROR',
  'SESSION_EXPIRED',
  'UNKNOWN_QUESTION'
] as const;

export type EngineErrorCode = typeof ENGINE_ERROR_CODES[number];

export interface EngineFailure {
  ok: false;
  error: EngineErrorCode;
  message: string;
}

export type EngineResult<T> = ({ ok: true } & T) | EngineFailure;

export function failure(error: EngineErrorCode, message: string): EngineFailure {
  return { ok: false, error, message };
}

/**
 * HTTP status for each failure code
 */
export const ERROR_HTTP_STATUS: Record<EngineErrorCode, number> = {
  NOT_FOUND: 404,
  SESSION_EXPIRED: 404,
  LOCKED: 403,
  NOT_READY: 409,
  VALIDATION_ERROR: 400,
  UNKNOWN_QUESTION: 400,
  ORACLE_UNAVAILABLE: 503,
  PERSISTENCE_LOST: 503
};
