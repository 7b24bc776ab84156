/**
 * Health Index Store
 *
 * One current snapshot per client. Writes go to the primary tier and fail
 * over to the secondary tier; losing both is logged as a data-loss event and
 * reported to the caller. Reads never fail: with no readable row the neutral
 * all-50 snapshot is returned.
 */

import {
  AxisScores,
  DiagnosisResult,
  HealthIndexSnapshot,
  NEUTRAL_SCORE,
  neutralAxisScores
} from '../types/diagnosis';
import { EngineResult, failure } from '../types/engine-result';
import { HealthIndexBackend, HealthIndexRow } from './health-index-backends';

const LOG_PREFIX = '[HealthIndex-Store]';

export type PersistenceTier = 'primary' | 'secondary';

function toRow(clientId: string, agentId: string | null, result: DiagnosisResult, updatedAt: string): HealthIndexRow {
  return {
    client_id: clientId,
    agent_id: agentId,
    ...result.scores,
    overall_score: result.overall_score,
    updated_at: updatedAt
  };
}

function toSnapshot(row: HealthIndexRow): HealthIndexSnapshot {
  const scores: AxisScores = {
    asset_stability: row.asset_stability,
    time_independence: row.time_independence,
    physical_condition: row.physical_condition,
    emotional_balance: row.emotional_balance,
    network_power: row.network_power,
    system_leverage: row.system_leverage
  };
  return {
    client_id: row.client_id,
    scores,
    overall_score: row.overall_score,
    updated_at: row.updated_at,
    is_default: false
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class HealthIndexStore {
  constructor(
    private readonly primary: HealthIndexBackend,
    private readonly secondary: HealthIndexBackend | null = null,
    private readonly now: () => Date = () => new Date()
  ) {}

  async upsert(
    clientId: string,
    result: DiagnosisResult,
    agentId: string | null = null
  ): Promise<EngineResult<{ tier: PersistenceTier }>> {
    const row = toRow(clientId, agentId, result, this.now().toISOString());

    let primaryError: string;
    try {
      await this.primary.upsert(row);
      return { ok: true, tier: 'primary' };
    } catch (err) {
      primaryError = errorMessage(err);
    }

    if (!this.secondary) {
      console.error(
        `${LOG_PREFIX} DATA LOSS: ${this.primary.name} write failed for client ${clientId} ` +
        `and no secondary tier is configured: ${primaryError}`
      );
      return failure('PERSISTENCE_LOST', `Health Index could not be saved for client ${clientId}`);
    }

    try {
      await this.secondary.upsert(row);
      console.warn(
        `${LOG_PREFIX} Persistence degraded: ${this.primary.name} write failed for client ${clientId} ` +
        `(${primaryError}); saved to ${this.secondary.name}`
      );
      return { ok: true, tier: 'secondary' };
    } catch (err) {
      console.error(
        `${LOG_PREFIX} DATA LOSS: Health Index for client ${clientId} not saved. ` +
        `${this.primary.name}: ${primaryError}; ${this.secondary.name}: ${errorMessage(err)}`
      );
      return failure('PERSISTENCE_LOST', `Health Index could not be saved for client ${clientId}`);
    }
  }

  /**
   * Newest snapshot across both tiers. A degraded write leaves the newer row
   * in the secondary tier while the primary may still hold an older one.
   */
  async getLatest(clientId: string): Promise<HealthIndexSnapshot> {
    const [primaryRow, secondaryRow] = await Promise.all([
      this.tryFetch(this.primary, clientId),
      this.secondary ? this.tryFetch(this.secondary, clientId) : Promise.resolve(null)
    ]);

    if (primaryRow && secondaryRow) {
      const secondaryIsNewer = Date.parse(secondaryRow.updated_at) > Date.parse(primaryRow.updated_at);
      return toSnapshot(secondaryIsNewer ? secondaryRow : primaryRow);
    }
    const row = primaryRow ?? secondaryRow;
    return row ? toSnapshot(row) : this.neutral(clientId);
  }

  private async tryFetch(backend: HealthIndexBackend, clientId: string): Promise<HealthIndexRow | null> {
    try {
      return await backend.fetch(clientId);
    } catch (err) {
      console.warn(`${LOG_PREFIX} ${backend.name} read failed for client ${clientId}: ${errorMessage(err)}`);
      return null;
    }
  }

  private neutral(clientId: string): HealthIndexSnapshot {
    return {
      client_id: clientId,
      scores: neutralAxisScores(),
      overall_score: NEUTRAL_SCORE,
      updated_at: null,
      is_default: true
    };
  }
}
