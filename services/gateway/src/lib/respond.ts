/**
 * Shared JSON responses for engine failures and request validation.
 */

import { Response } from 'express';
import { ZodError } from 'zod';
import { EngineFailure, ERROR_HTTP_STATUS } from '../types/engine-result';

export function sendFailure(res: Response, result: EngineFailure): Response {
  return res.status(ERROR_HTTP_STATUS[result.error]).json({
    ok: false,
    error: result.error,
    message: result.message
  });
}

export function sendValidationError(res: Response, error: ZodError): Response {
  return res.status(400).json({
    ok: false,
    error: 'VALIDATION_ERROR',
    message: 'Validation failed',
    details: error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
  });
}

export function sendInternalError(res: Response, logPrefix: string, operation: string, err: unknown): Response {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`${logPrefix} ${operation} error:`, message);
  return res.status(500).json({
    ok: false,
    error: 'INTERNAL_ERROR',
    message
  });
}
