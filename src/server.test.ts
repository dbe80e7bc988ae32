import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { RunStore } from './database.js';
import { MeasurementOrchestrator } from './orchestrator.js';
import { RunService } from './run-service.js';
import { createApp } from './server.js';
import { AddressProbe, MapResolver, SequenceCatalog, candidate, sample } from './test-fakes.js';
import type { MeasurementConfig, MeasurementProvider } from './types.js';

const defaults: MeasurementConfig = { trialCount: 1, retries: 1, selectionRetries: 1, sampleCount: 2 };

describe('HTTP API', () => {
    let store: RunStore;
    let service: RunService;
    let server: Server;
    let baseUrl: string;
    let hold: Promise<void>;

    const provider: MeasurementProvider = {
        measureDownload: async () => {
            await hold;
            return sample(50, 62.5);
        },
        measureUpload: async () => sample(10, 12.5)
    };

    async function request(path: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
        const response = await fetch(`${baseUrl}${path}`, init);
        const body: unknown = await response.json();
        return { status: response.status, body };
    }

    beforeEach(async () => {
        hold = Promise.resolve();
        store = new RunStore(':memory:');
        service = new RunService(new MeasurementOrchestrator({
            catalog: new SequenceCatalog([candidate('srv1.example.com', 12)]),
            provider,
            probe: new AddressProbe({ '203.0.113.5': 12 }),
            resolver: new MapResolver({ 'srv1.example.com': '203.0.113.5' }),
            fallbackHost: 'fallback.example.org'
        }), store, defaults);

        server = createApp(service).listen(0, '127.0.0.1');
        await new Promise<void>(resolve => server.once('listening', () => resolve()));
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('server is not listening on a TCP port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
        store.close();
    });

    describe('POST /api/runs', () => {
        it('runs a measurement and returns the stored run', async () => {
            const { status, body } = await request('/api/runs', { method: 'POST' });

            expect(status).toBe(201);
            expect(body).toMatchObject({
                id: 1,
                result: {
                    usedFallback: false,
                    endpoint: { address: '203.0.113.5', candidate: { host: 'srv1.example.com' } },
                    trials: { ok: true, avgDownloadMbps: 50, avgUploadMbps: 10, successfulTrialCount: 1 },
                    latency: { ok: true, avgMs: 12, sentCount: 2 }
                }
            });
            expect(store.get(1)?.result.trials.ok).toBe(true);
        });

        it('applies overrides from the JSON body', async () => {
            const { status, body } = await request('/api/runs', {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ trialCount: 2 })
            });

            expect(status).toBe(201);
            expect(body).toMatchObject({ result: { trials: { attemptedTrialCount: 2 } } });
        });

        it('answers 400 for invalid overrides', async () => {
            const { status, body } = await request('/api/runs', {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ trialCount: 0 })
            });

            expect(status).toBe(400);
            expect(body).toEqual({
                statusCode: 400,
                error: 'Bad Request',
                message: 'trialCount must be a positive integer, got 0',
                code: 'CONFIGURATION'
            });
        });

        it('answers 400 for a malformed JSON body', async () => {
            const { status, body } = await request('/api/runs', {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: '{bad'
            });

            expect(status).toBe(400);
            expect(body).toEqual({ statusCode: 400, error: 'Bad Request', message: 'Malformed JSON body' });
            expect(service.isRunning()).toBe(false);
        });

        it('answers 409 while another run is in progress', async () => {
            let release: () => void = () => undefined;
            hold = new Promise<void>(resolve => {
                release = () => resolve();
            });
            const first = service.start();

            const { status, body } = await request('/api/runs', { method: 'POST' });

            expect(status).toBe(409);
            expect(body).toEqual({
                statusCode: 409,
                error: 'Conflict',
                message: 'A measurement run is already in progress'
            });

            release();
            await expect(first).resolves.toMatchObject({ id: 1 });
        });
    });

    describe('GET /api/runs', () => {
        it('lists stored runs newest first', async () => {
            await service.start();
            await service.start();

            const { status, body } = await request('/api/runs');

            expect(status).toBe(200);
            expect(body).toMatchObject({ running: false, runs: [{ id: 2 }, { id: 1 }] });
        });

        it('clamps the limit and defaults to 20', async () => {
            const list = jest.spyOn(service, 'list');

            for (const [query, expected] of [
                ['', 20],
                ['?limit=5', 5],
                ['?limit=500', 200],
                ['?limit=0', 20],
                ['?limit=-3', 20],
                ['?limit=abc', 20]
            ] as const) {
                const { status } = await request(`/api/runs${query}`);
                expect(status).toBe(200);
                expect(list).toHaveBeenLastCalledWith(expected);
            }
        });
    });

    describe('GET /api/runs/:id', () => {
        it('returns a stored run', async () => {
            await service.start();

            const { status, body } = await request('/api/runs/1');

            expect(status).toBe(200);
            expect(body).toMatchObject({ id: 1, result: { endpoint: { address: '203.0.113.5' } } });
        });

        it('answers 404 for an unknown id', async () => {
            const { status, body } = await request('/api/runs/99');

            expect(status).toBe(404);
            expect(body).toEqual({ statusCode: 404, error: 'Not Found', message: 'Run 99 not found' });
        });

        it('answers 404 for an id that is not a number', async () => {
            const { status, body } = await request('/api/runs/latest');

            expect(status).toBe(404);
            expect(body).toEqual({ statusCode: 404, error: 'Not Found', message: 'Run latest not found' });
        });
    });
});
