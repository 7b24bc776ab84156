import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './lib/config';
import { getFirestore } from './lib/firestore';
import { getSupabase } from './lib/supabase';
import { SupabaseClientDirectory } from './services/client-directory';
import { DiagnosisService } from './services/diagnosis-service';
import { DiagnosisSessionStore } from './services/diagnosis-session-store';
import { FirestoreHealthIndexBackend, SupabaseHealthIndexBackend } from './services/health-index-backends';
import { HealthIndexStore } from './services/health-index-store';
import { SupabaseNotificationSink } from './services/notification-service';
import { QuestAgent } from './services/quest-agent';
import { SupabaseQuestRepository } from './services/quest-repository';
import { QuestSequencer } from './services/quest-sequencer';
import { QuestService } from './services/quest-service';
import { loadQuestionBattery } from './services/question-battery';
import { GeminiTextOracle } from './services/text-oracle';
import { UnlockController } from './services/unlock-controller';

const config = loadConfig();

const supabase = getSupabase(config);
if (!supabase) {
  throw new Error('[Gateway] Supabase is required: set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
}

const firebaseProjectId = config.firebaseProjectId;
const secondaryTier = firebaseProjectId
  ? new FirestoreHealthIndexBackend(() => getFirestore(firebaseProjectId))
  : null;
if (!secondaryTier) {
  console.warn('[Gateway] FIREBASE_PROJECT_ID not set: Health Index has no fallback tier');
}

const directory = new SupabaseClientDirectory(supabase);
const repository = new SupabaseQuestRepository(supabase);
const healthIndex = new HealthIndexStore(new SupabaseHealthIndexBackend(supabase), secondaryTier);
const sequencer = new QuestSequencer(repository, directory, healthIndex);
const agent = new QuestAgent(new GeminiTextOracle(config.oracle), config.quest.minChecks);
const unlock = new UnlockController(repository, new SupabaseNotificationSink(supabase));

const quests = new QuestService({ repository, directory, healthIndex, sequencer, agent, unlock });
const diagnosis = new DiagnosisService({
  battery: loadQuestionBattery(config.diagnosis.questionsPath),
  sessions: new DiagnosisSessionStore({ ttlMs: config.diagnosis.sessionTtlMs }),
  directory,
  healthIndex,
  quests
});

const app = createApp({
  diagnosis,
  quests,
  jwtSecret: config.supabase.jwtSecret ?? null,
  corsAllowedOrigins: config.corsAllowedOrigins,
  integrations: {
    supabase: true,
    firestore_fallback: secondaryTier !== null,
    gemini: Boolean(config.oracle.apiKey),
    auth: Boolean(config.supabase.jwtSecret)
  }
});

app.listen(config.port, () => {
  console.log('✅ Questline gateway running on port ' + config.port);
  console.log('🧭 Diagnosis: /api/v1/diagnosis  Quests: /api/v1/quests');
});
