import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { RunStore, rowToResult } from './database.js';
import { candidate } from './test-fakes.js';
import type { MeasurementResult, MeasurementRunRow } from './types.js';

const measured: MeasurementResult = {
    endpoint: { candidate: { ...candidate('srv1.example.com:8080', 12), sponsor: 'Example ISP', id: '4021' }, address: '203.0.113.5' },
    usedFallback: false,
    trials: {
        ok: true,
        avgDownloadMbps: 55,
        avgUploadMbps: 10,
        avgDownloadDataMB: 68.75,
        avgUploadDataMB: 12.5,
        successfulTrialCount: 2,
        attemptedTrialCount: 3
    },
    packetLossPercent: 25,
    latency: { ok: true, lowMs: 10.5, highMs: 14, avgMs: 12, jitterMs: 3.5, receivedCount: 3, sentCount: 4 },
    checkedAt: '2026-03-01T08:00:00.000Z',
    durationMs: 41_250
};

const degraded: MeasurementResult = {
    endpoint: { address: '192.0.2.53' },
    usedFallback: true,
    trials: { ok: false, successfulTrialCount: 0, attemptedTrialCount: 3 },
    packetLossPercent: 100,
    latency: { ok: false, receivedCount: 0, sentCount: 4 },
    checkedAt: '2026-03-01T09:00:00.000Z',
    durationMs: 95_000
};

describe('RunStore', () => {
    let store: RunStore;

    beforeEach(() => {
        store = new RunStore(':memory:');
    });

    afterEach(() => {
        store.close();
    });

    it('stores a complete run and reads it back', () => {
        const id = store.save(measured);

        expect(id).toBe(1);
        expect(store.get(id)).toEqual({ id: 1, result: measured });
    });

    it('keeps unavailable figures unavailable', () => {
        const id = store.save(degraded);
        const run = store.get(id);

        expect(run?.result).toEqual(degraded);
        expect(run?.result.endpoint.candidate).toBeUndefined();
    });

    it('lists the most recent runs first', () => {
        store.save(measured);
        store.save(degraded);
        store.save(measured);

        expect(store.list().map(run => run.id)).toEqual([3, 2, 1]);
        expect(store.list(2).map(run => run.id)).toEqual([3, 2]);
    });

    it('returns null for an unknown id', () => {
        expect(store.get(42)).toBeNull();
    });
});

describe('rowToResult', () => {
    const row: MeasurementRunRow = {
        id: 7,
        checked_at: '2026-03-01T10:00:00.000Z',
        duration_ms: 30_000,
        address: '203.0.113.5',
        used_fallback: 0,
        server_host: 'srv1.example.com:8080',
        server_name: 'srv1',
        server_country: 'Testland',
        server_sponsor: null,
        server_id: null,
        advertised_latency_ms: 12,
        attempted_trials: 1,
        successful_trials: 1,
        avg_download_mbps: 50,
        avg_upload_mbps: 10,
        avg_download_mb: 62.5,
        avg_upload_mb: 12.5,
        packet_loss_pct: 0,
        probes_sent: 2,
        probes_received: 2,
        latency_low_ms: 11,
        latency_high_ms: 13,
        latency_avg_ms: 12,
        jitter_ms: 2,
        created_at: 1772359200000
    };

    it('rebuilds the candidate from its columns', () => {
        expect(rowToResult(row).endpoint).toEqual({
            address: '203.0.113.5',
            candidate: { host: 'srv1.example.com:8080', displayName: 'srv1', country: 'Testland', advertisedLatencyMs: 12 }
        });
    });

    it('never invents a latency for a candidate whose latency is missing', () => {
        expect(rowToResult({ ...row, advertised_latency_ms: null }).endpoint).toEqual({ address: '203.0.113.5' });
    });
});

describe('RunStore schema', () => {
    it('refuses a candidate row without its advertised latency', () => {
        const store = new RunStore(':memory:');
        try {
            const partial = {
                ...measured,
                endpoint: { ...measured.endpoint, candidate: { ...candidate('srv1.example.com'), advertisedLatencyMs: Number.NaN } }
            };
            expect(() => store.save(partial)).toThrow(/CHECK constraint failed/);
        } finally {
            store.close();
        }
    });
});
