/**
 * Quest Routes
 *
 * Endpoints:
 * - POST /api/v1/quests/init                 - Seed the six quests from the Health Index
 * - GET  /api/v1/quests?client_id=&status=   - List quests (auto-initializes when none exist)
 * - GET  /api/v1/quests/current?client_id=   - The unlocked, incomplete quest
 * - POST /api/v1/quests/:questId/checklist   - Generate the self-check list
 * - POST /api/v1/quests/:questId/evaluate    - Evaluate checked items, unlock the next quest on pass
 * - POST /api/v1/quests/:questId/complete    - Agent override (agent/admin only)
 */

import { Router, Request, Response } from 'express';
import {
  ClientQuerySchema,
  EvaluateQuestRequestSchema,
  ListQuestsQuerySchema,
  QuestInitRequestSchema
} from '../types/quest';
import { sendFailure, sendInternalError, sendValidationError } from '../lib/respond';
import { AuthenticatedRequest, requireRole } from '../middleware/auth-supabase-jwt';
import { QuestService } from '../services/quest-service';

const LOG_PREFIX = '[Quest-Routes]';

export const OVERRIDE_ROLES = ['agent', 'admin'];

export function createQuestRouter(service: QuestService): Router {
  const router = Router();

  router.post('/init', async (req: Request, res: Response) => {
    const validation = QuestInitRequestSchema.safeParse(req.body);
    if (!validation.success) {
      console.warn(`${LOG_PREFIX} init validation failed:`, validation.error.errors);
      return sendValidationError(res, validation.error);
    }

    try {
      const result = await service.initialize(validation.data.client_id);
      if (!result.ok) {
        return sendFailure(res, result);
      }
      return res.status(result.created > 0 ? 201 : 200).json(result);
    } catch (err) {
      return sendInternalError(res, LOG_PREFIX, 'init', err);
    }
  });

  router.get('/', async (req: Request, res: Response) => {
    const validation = ListQuestsQuerySchema.safeParse(req.query);
    if (!validation.success) {
      return sendValidationError(res, validation.error);
    }

    try {
      const { client_id, status } = validation.data;
      const result = await service.list(client_id, status);
      if (!result.ok) {
        return sendFailure(res, result);
      }
      return res.json({ ok: true, count: result.quests.length, quests: result.quests });
    } catch (err) {
      return sendInternalError(res, LOG_PREFIX, 'list', err);
    }
  });

  router.get('/current', async (req: Request, res: Response) => {
    const validation = ClientQuerySchema.safeParse(req.query);
    if (!validation.success) {
      return sendValidationError(res, validation.error);
    }

    try {
      const result = await service.current(validation.data.client_id);
      if (!result.ok) {
        return sendFailure(res, result);
      }
      return res.json({ ok: true, quest: result.quest });
    } catch (err) {
      return sendInternalError(res, LOG_PREFIX, 'current', err);
    }
  });

  router.post('/:questId/checklist', async (req: Request, res: Response) => {
    try {
      const result = await service.generateChecklist(req.params.questId);
      if (!result.ok) {
        return sendFailure(res, result);
      }
      return res.json(result);
    } catch (err) {
      return sendInternalError(res, LOG_PREFIX, 'checklist', err);
    }
  });

  router.post('/:questId/evaluate', async (req: Request, res: Response) => {
    const validation = EvaluateQuestRequestSchema.safeParse(req.body);
    if (!validation.success) {
      console.warn(`${LOG_PREFIX} evaluate validation failed:`, validation.error.errors);
      return sendValidationError(res, validation.error);
    }

    try {
      const result = await service.evaluate(req.params.questId, validation.data.checked_indexes);
      if (!result.ok) {
        return sendFailure(res, result);
      }
      return res.json(result);
    } catch (err) {
      return sendInternalError(res, LOG_PREFIX, 'evaluate', err);
    }
  });

  router.post('/:questId/complete', requireRole(...OVERRIDE_ROLES), async (req: AuthenticatedRequest, res: Response) => {
    const actorId = req.identity?.user_id ?? 'unknown';

    try {
      const result = await service.completeManually(req.params.questId, actorId);
      if (!result.ok) {
        return sendFailure(res, result);
      }
      return res.json(result);
    } catch (err) {
      return sendInternalError(res, LOG_PREFIX, 'complete', err);
    }
  });

  return router;
}
