import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { componentLogger } from './logger.js';
import type { AggregateTrialResult, LatencyStats, MeasurementResult, MeasurementRunRow, ResolvedEndpoint } from './types.js';

const logger = componentLogger('database');

export interface StoredRun {
    id: number;
    result: MeasurementResult;
}

function toTrials(row: MeasurementRunRow): AggregateTrialResult {
    if (
        row.successful_trials === 0 ||
        row.avg_download_mbps === null ||
        row.avg_upload_mbps === null ||
        row.avg_download_mb === null ||
        row.avg_upload_mb === null
    ) {
        return { ok: false, successfulTrialCount: 0, attemptedTrialCount: row.attempted_trials };
    }
    return {
        ok: true,
        avgDownloadMbps: row.avg_download_mbps,
        avgUploadMbps: row.avg_upload_mbps,
        avgDownloadDataMB: row.avg_download_mb,
        avgUploadDataMB: row.avg_upload_mb,
        successfulTrialCount: row.successful_trials,
        attemptedTrialCount: row.attempted_trials
    };
}

function toLatency(row: MeasurementRunRow): LatencyStats {
    if (
        row.probes_received === 0 ||
        row.latency_low_ms === null ||
        row.latency_high_ms === null ||
        row.latency_avg_ms === null ||
        row.jitter_ms === null
    ) {
        return { ok: false, receivedCount: 0, sentCount: row.probes_sent };
    }
    return {
        ok: true,
        lowMs: row.latency_low_ms,
        highMs: row.latency_high_ms,
        avgMs: row.latency_avg_ms,
        jitterMs: row.jitter_ms,
        receivedCount: row.probes_received,
        sentCount: row.probes_sent
    };
}

function toEndpoint(row: MeasurementRunRow): ResolvedEndpoint {
    const { server_host, server_name, server_country, advertised_latency_ms } = row;
    if (server_host === null || server_name === null || server_country === null || advertised_latency_ms === null) {
        return { address: row.address };
    }
    return {
        address: row.address,
        candidate: {
            host: server_host,
            displayName: server_name,
            country: server_country,
            advertisedLatencyMs: advertised_latency_ms,
            sponsor: row.server_sponsor ?? undefined,
            id: row.server_id ?? undefined
        }
    };
}

export function rowToResult(row: MeasurementRunRow): MeasurementResult {
    const endpoint = toEndpoint(row);

    return {
        endpoint,
        usedFallback: row.used_fallback === 1,
        trials: toTrials(row),
        packetLossPercent: row.packet_loss_pct,
        latency: toLatency(row),
        checkedAt: row.checked_at,
        durationMs: row.duration_ms
    };
}

/**
 * Append-only history of completed measurement runs.
 * Unavailable figures are stored as NULL, never as placeholder numbers.
 */
export class RunStore {
    private readonly db: Database.Database;
    private readonly cache: Partial<Record<'insertRun' | 'getRun' | 'listRuns', Database.Statement>> = {};

    constructor(dbPath: string) {
        if (dbPath !== ':memory:' && !fs.existsSync(path.dirname(dbPath))) {
            fs.mkdirSync(path.dirname(dbPath), { recursive: true });
        }

        this.db = new Database(dbPath, { verbose: process.env.DEBUG ? (msg) => logger.debug(String(msg)) : undefined });

        // Enable WAL mode for better concurrency
        this.db.pragma('journal_mode = WAL');
        this.migrate();
    }

    private migrate() {
        const migration = this.db.transaction(() => {
            this.db.prepare(`
                CREATE TABLE IF NOT EXISTS measurement_runs (
                    id INTEGER PRIMARY KEY AUTOINCREMENT,
                    checked_at TEXT NOT NULL,
                    duration_ms INTEGER NOT NULL,
                    address TEXT NOT NULL,
                    used_fallback INTEGER NOT NULL,

                    -- Selected server (all NULL on the fallback path)
                    server_host TEXT,
                    server_name TEXT,
                    server_country TEXT,
                    server_sponsor TEXT,
                    server_id TEXT,
                    advertised_latency_ms REAL,

                    -- Throughput (averages NULL when no trial succeeded)
                    attempted_trials INTEGER NOT NULL,
                    successful_trials INTEGER NOT NULL,
                    avg_download_mbps REAL,
                    avg_upload_mbps REAL,
                    avg_download_mb REAL,
                    avg_upload_mb REAL,

                    -- Latency (NULL when no probe answered)
                    packet_loss_pct REAL NOT NULL,
                    probes_sent INTEGER NOT NULL,
                    probes_received INTEGER NOT NULL,
                    latency_low_ms REAL,
                    latency_high_ms REAL,
                    latency_avg_ms REAL,
                    jitter_ms REAL,

                    created_at INTEGER DEFAULT (strftime('%s', 'now') * 1000),

                    CHECK (server_host IS NULL OR (
                        server_name IS NOT NULL AND server_country IS NOT NULL AND advertised_latency_ms IS NOT NULL
                    ))
                )
            `).run();

            this.db.prepare(`CREATE INDEX IF NOT EXISTS idx_runs_checked_at ON measurement_runs(checked_at)`).run();
        });

        try {
            migration();
            logger.info('schema initialized');
        } catch (err) {
            logger.error({ err }, 'schema initialization failed');
            throw err;
        }
    }

    // Lazily prepared statements
    private statement(key: 'insertRun' | 'getRun' | 'listRuns', sql: string): Database.Statement {
        const cached = this.cache[key];
        if (cached) return cached;
        const prepared = this.db.prepare(sql);
        this.cache[key] = prepared;
        return prepared;
    }

    public save(result: MeasurementResult): number {
        const { endpoint, trials, latency } = result;
        const candidate = endpoint.candidate;

        const info = this.statement('insertRun', `
            INSERT INTO measurement_runs (
                checked_at, duration_ms, address, used_fallback,
                server_host, server_name, server_country, server_sponsor, server_id, advertised_latency_ms,
                attempted_trials, successful_trials, avg_download_mbps, avg_upload_mbps, avg_download_mb, avg_upload_mb,
                packet_loss_pct, probes_sent, probes_received, latency_low_ms, latency_high_ms, latency_avg_ms, jitter_ms
            ) VALUES (
                @checked_at, @duration_ms, @address, @used_fallback,
                @server_host, @server_name, @server_country, @server_sponsor, @server_id, @advertised_latency_ms,
                @attempted_trials, @successful_trials, @avg_download_mbps, @avg_upload_mbps, @avg_download_mb, @avg_upload_mb,
                @packet_loss_pct, @probes_sent, @probes_received, @latency_low_ms, @latency_high_ms, @latency_avg_ms, @jitter_ms
            )
        `).run({
            checked_at: result.checkedAt,
            duration_ms: result.durationMs,
            address: endpoint.address,
            used_fallback: result.usedFallback ? 1 : 0,
            server_host: candidate?.host ?? null,
            server_name: candidate?.displayName ?? null,
            server_country: candidate?.country ?? null,
            server_sponsor: candidate?.sponsor ?? null,
            server_id: candidate?.id ?? null,
            advertised_latency_ms: candidate?.advertisedLatencyMs ?? null,
            attempted_trials: trials.attemptedTrialCount,
            successful_trials: trials.successfulTrialCount,
            avg_download_mbps: trials.ok ? trials.avgDownloadMbps : null,
            avg_upload_mbps: trials.ok ? trials.avgUploadMbps : null,
            avg_download_mb: trials.ok ? trials.avgDownloadDataMB : null,
            avg_upload_mb: trials.ok ? trials.avgUploadDataMB : null,
            packet_loss_pct: result.packetLossPercent,
            probes_sent: latency.sentCount,
            probes_received: latency.receivedCount,
            latency_low_ms: latency.ok ? latency.lowMs : null,
            latency_high_ms: latency.ok ? latency.highMs : null,
            latency_avg_ms: latency.ok ? latency.avgMs : null,
            jitter_ms: latency.ok ? latency.jitterMs : null
        });

        const id = Number(info.lastInsertRowid);
        logger.debug({ id }, 'run saved');
        return id;
    }

    public get(id: number): StoredRun | null {
        const row = this.statement('getRun', `SELECT * FROM measurement_runs WHERE id = ?`)
            .get(id) as MeasurementRunRow | undefined;
        return row ? { id: row.id, result: rowToResult(row) } : null;
    }

    /** Most recent first. */
    public list(limit: number = 20): StoredRun[] {
        const rows = this.statement('listRuns', `
            SELECT * FROM measurement_runs
            ORDER BY id DESC
            LIMIT ?
        `).all(limit) as MeasurementRunRow[];
        return rows.map(row => ({ id: row.id, result: rowToResult(row) }));
    }

    public close() {
        this.db.close();
    }
}
