import fs from 'fs';
import { fileURLToPath } from 'url';
import pg from 'pg';
import type { PoolClient, QueryResult, QueryResultRow } from 'pg';
import type winston from 'winston';
import { ScanRunRowSchema, type ScanRunRow, type DatabaseConfig } from '../schemas/index.js';
import { PersistenceError, describeError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { ScanStore } from './scan-store.js';
import type { AssetRecord, ScanRun, ScanRunUpdate } from '../types/index.js';

const { Pool } = pg;

export const SCHEMA_PATH = fileURLToPath(new URL('../../schema.sql', import.meta.url));

export function rowToScanRun(row: ScanRunRow): ScanRun {
  return {
    id: row.id,
    domain: row.domain,
    includeSubdomains: row.include_subdomains,
    requester: row.requester,
    status: row.status,
    progress: row.progress,
    currentPhase: row.current_phase,
    counts: {
      assetsDiscovered: row.assets_discovered,
      highRisk: row.high_risk_count,
      critical: row.critical_count,
    },
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    errorMessage: row.error_message,
  };
}

/** SET clause and parameters for a partial scan-run update; parameter $1 is the id. */
export function buildScanRunUpdate(update: ScanRunUpdate): { assignments: string[]; params: unknown[] } {
  const assignments: string[] = [];
  const params: unknown[] = [];

  const set = (column: string, value: unknown): void => {
    params.push(value);
    assignments.push(`${column} = $${params.length + 1}`);
  };

  // undefined leaves a column alone; null clears it
  if (update.status !== undefined) set('status', update.status);
  if (update.progress !== undefined) set('progress', update.progress);
  if (update.currentPhase !== undefined) set('current_phase', update.currentPhase);
  if (update.startedAt !== undefined) set('started_at', update.startedAt);
  if (update.completedAt !== undefined) set('completed_at', update.completedAt);
  if (update.errorMessage !== undefined) set('error_message', update.errorMessage);

  if (update.counts) {
    set('assets_discovered', update.counts.assetsDiscovered);
    set('high_risk_count', update.counts.highRisk);
    set('critical_count', update.counts.critical);
  }

  return { assignments, params };
}

export class PostgresScanStore implements ScanStore {
  private readonly pool: pg.Pool;
  private readonly logger: winston.Logger;

  constructor(config: Partial<DatabaseConfig> = {}, logger?: winston.Logger) {
    this.logger = logger ?? createLogger({ name: 'database' });

    const poolConfig = {
      host: config.host ?? 'localhost',
      port: config.port ?? 5432,
      database: config.database ?? 'surface_risk',
      user: config.user ?? 'postgres',
      password: config.password ?? '',
      max: config.max ?? 20,
      idleTimeoutMillis: config.idleTimeoutMillis ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 10000,
    };

    this.pool = new Pool(poolConfig);
    this.pool.on('error', (err) => {
      this.logger.error(`Database pool error: ${err.message}`);
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<T>> {
    const client = await this.pool.connect();
    try {
      return await client.query<T>(text, params);
    } finally {
      client.release();
    }
  }

  async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async initialize(): Promise<void> {
    await this.guard('initialize', async () => {
      const schema = fs.readFileSync(SCHEMA_PATH, 'utf8');
      await this.query(schema);
    });
  }

  async createScanRun(run: ScanRun): Promise<void> {
    await this.guard('createScanRun', async () => {
      await this.query(
        `
        INSERT INTO scan_runs (
          id, domain, include_subdomains, requester, status, progress, current_phase,
          assets_discovered, high_risk_count, critical_count,
          created_at, started_at, completed_at, error_message
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
        `,
        [
          run.id,
          run.domain,
          run.includeSubdomains,
          run.requester,
          run.status,
          run.progress,
          run.currentPhase,
          run.counts.assetsDiscovered,
          run.counts.highRisk,
          run.counts.critical,
          run.createdAt,
          run.startedAt,
          run.completedAt,
          run.errorMessage,
        ]
      );
    });
  }

  async updateScanRun(id: string, update: ScanRunUpdate): Promise<void> {
    const { assignments, params } = buildScanRunUpdate(update);
    if (assignments.length === 0) return;

    await this.guard('updateScanRun', async () => {
      const result = await this.query(`UPDATE scan_runs SET ${assignments.join(', ')} WHERE id = $1`, [id, ...params]);
      if (result.rowCount === 0) {
        throw new Error(`scan run ${id} does not exist`);
      }
    });
  }

  async saveAssets(scanId: string, owner: string, records: readonly AssetRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    return this.guard('saveAssets', () =>
      this.transaction(async (client) => {
        let saved = 0;

        for (const record of records) {
          const { asset, risk } = record;
          const result = await client.query(
            `
            INSERT INTO assets (
              owner, asset_value, asset_type, parent_domain, discovered_via, last_scan_id,
              enrichment, findings, features,
              risk_score, risk_level, risk_confidence, scoring_method, risk_factors,
              pipeline_error, updated_at
            )
            VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, NOW())
            ON CONFLICT (owner, asset_value, asset_type)
            DO UPDATE SET
              parent_domain = EXCLUDED.parent_domain,
              discovered_via = EXCLUDED.discovered_via,
              last_scan_id = EXCLUDED.last_scan_id,
              enrichment = EXCLUDED.enrichment,
              findings = EXCLUDED.findings,
              features = EXCLUDED.features,
              risk_score = EXCLUDED.risk_score,
              risk_level = EXCLUDED.risk_level,
              risk_confidence = EXCLUDED.risk_confidence,
              scoring_method = EXCLUDED.scoring_method,
              risk_factors = EXCLUDED.risk_factors,
              pipeline_error = EXCLUDED.pipeline_error,
              updated_at = NOW()
            `,
            [
              owner,
              asset.assetValue,
              asset.assetType,
              asset.parentDomain,
              asset.discoveredVia,
              scanId,
              record.enrichment ? JSON.stringify(record.enrichment) : null,
              JSON.stringify(record.findings),
              record.features ? JSON.stringify(record.features) : null,
              risk?.score ?? null,
              risk?.level ?? null,
              risk?.confidence ?? null,
              risk?.method ?? null,
              JSON.stringify(risk?.riskFactors ?? []),
              record.pipelineError,
            ]
          );
          saved += result.rowCount ?? 0;
        }

        return saved;
      })
    );
  }

  async getScanRun(id: string): Promise<ScanRun | null> {
    return this.guard('getScanRun', async () => {
      const result = await this.query('SELECT * FROM scan_runs WHERE id = $1', [id]);
      const row = result.rows[0];
      return row ? rowToScanRun(ScanRunRowSchema.parse(row)) : null;
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(operation, describeError(error));
    }
  }
}
