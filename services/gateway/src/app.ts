import express, { Express, NextFunction, Request, Response } from 'express';
import { setupCors } from './middleware/cors';
import { requireAuth } from './middleware/auth-supabase-jwt';
import { createDiagnosisRouter } from './routes/diagnosis';
import { createQuestRouter } from './routes/quests';
import { DiagnosisService } from './services/diagnosis-service';
import { QuestService } from './services/quest-service';

export interface AppDeps {
  diagnosis: DiagnosisService;
  quests: QuestService;
  jwtSecret: string | null;
  corsAllowedOrigins: string[];
  /** Integration flags reported by GET /health */
  integrations: Record<string, boolean>;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  setupCors(app, deps.corsAllowedOrigins);

  // JSON body parser must come before route handlers
  app.use(express.json());

  app.get('/alive', (_req, res) => {
    res.json({ status: 'ok', service: 'questline-gateway', timestamp: new Date().toISOString() });
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      battery_version: deps.diagnosis.battery.version,
      integrations: deps.integrations,
      timestamp: new Date().toISOString()
    });
  });

  const auth = requireAuth(deps.jwtSecret);
  app.use('/api/v1/diagnosis', auth, createDiagnosisRouter(deps.diagnosis));
  app.use('/api/v1/quests', auth, createQuestRouter(deps.quests));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  // Malformed JSON bodies and CORS rejections land here
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const isBodyError = err instanceof SyntaxError;
    if (!isBodyError) {
      console.error('[Gateway] Unhandled error:', err.message);
    }
    res.status(isBodyError ? 400 : 500).json({
      ok: false,
      error: isBodyError ? 'VALIDATION_ERROR' : 'INTERNAL_ERROR',
      message: err.message
    });
  });

  return app;
}
