/**
 * Diagnosis Routes
 *
 * Endpoints:
 * - POST /api/v1/diagnosis/start         - Open a diagnosis session for a client
 * - GET  /api/v1/diagnosis/questions     - The question battery in display order
 * - POST /api/v1/diagnosis/answer        - Record one raw answer
 * - POST /api/v1/diagnosis/complete      - Score, persist the Health Index, seed quests
 * - GET  /api/v1/diagnosis/health-index  - Latest Health Index (neutral default when none)
 */

import { Router, Request, Response } from 'express';
import {
  DiagnosisAnswerRequestSchema,
  DiagnosisCompleteRequestSchema,
  DiagnosisStartRequestSchema
} from '../types/diagnosis';
import { ClientQuerySchema } from '../types/quest';
import { sendFailure, sendInternalError, sendValidationError } from '../lib/respond';
import { DiagnosisService } from '../services/diagnosis-service';

const LOG_PREFIX = '[Diagnosis-Routes]';

export function createDiagnosisRouter(service: DiagnosisService): Router {
  const router = Router();

  router.post('/start', async (req: Request, res: Response) => {
    const validation = DiagnosisStartRequestSchema.safeParse(req.body);
    if (!validation.success) {
      console.warn(`${LOG_PREFIX} start validation failed:`, validation.error.errors);
      return sendValidationError(res, validation.error);
    }

    try {
      const result = await service.start(validation.data.client_id);
      if (!result.ok) {
        return sendFailure(res, result);
      }
      return res.status(201).json({
        ok: true,
        diagnosis_id: result.diagnosis_id,
        expires_at: result.expires_at
      });
    } catch (err) {
      return sendInternalError(res, LOG_PREFIX, 'start', err);
    }
  });

  router.get('/questions', (_req: Request, res: Response) => {
    const { version, questions } = service.battery;
    return res.json({ ok: true, version, count: questions.length, questions });
  });

  router.post('/answer', (req: Request, res: Response) => {
    const validation = DiagnosisAnswerRequestSchema.safeParse(req.body);
    if (!validation.success) {
      console.warn(`${LOG_PREFIX} answer validation failed:`, validation.error.errors);
      return sendValidationError(res, validation.error);
    }

    const { diagnosis_id, question_id, answer } = validation.data;
    const result = service.answer(diagnosis_id, question_id, answer);
    if (!result.ok) {
      return sendFailure(res, result);
    }
    return res.json({ ok: true, diagnosis_id, question_id, answered: result.answered });
  });

  router.post('/complete', async (req: Request, res: Response) => {
    const validation = DiagnosisCompleteRequestSchema.safeParse(req.body);
    if (!validation.success) {
      console.warn(`${LOG_PREFIX} complete validation failed:`, validation.error.errors);
      return sendValidationError(res, validation.error);
    }

    try {
      const result = await service.complete(validation.data.diagnosis_id);
      if (!result.ok) {
        return sendFailure(res, result);
      }
      return res.json(result);
    } catch (err) {
      return sendInternalError(res, LOG_PREFIX, 'complete', err);
    }
  });

  router.get('/health-index', async (req: Request, res: Response) => {
    const validation = ClientQuerySchema.safeParse(req.query);
    if (!validation.success) {
      return sendValidationError(res, validation.error);
    }

    try {
      const snapshot = await service.healthIndex(validation.data.client_id);
      return res.json({ ok: true, health_index: snapshot });
    } catch (err) {
      return sendInternalError(res, LOG_PREFIX, 'health-index', err);
    }
  });

  return router;
}
