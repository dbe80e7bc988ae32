import { afterEach, describe, expect, it, jest } from '@jest/globals';
import { HttpServerCatalog, parseServerList } from './catalog.js';
import { CatalogUnavailableError, ProbeEnvironmentError } from './errors.js';
import { AddressProbe, MapResolver } from './test-fakes.js';
import type { LatencyProbe } from './types.js';

const CATALOG_URL = 'https://catalog.example.test/servers';

const listing = [
    { host: 'far.example.net:8080', name: 'Far City', country: 'Farland', sponsor: 'Far ISP', id: '3', distance: 900 },
    { host: 'near.example.net:8080', name: 'Near City', country: 'Nearland', sponsor: 'Near ISP', id: 1, distance: 10 },
    { host: 'mid.example.net:8080', name: 'Mid City', country: 'Midland', id: '2', distance: '120.5' },
    { name: 'No Host', distance: 1 }
];

const resolver = new MapResolver({
    'near.example.net': '203.0.113.1',
    'mid.example.net': '203.0.113.2',
    'far.example.net': '203.0.113.3'
});

function mockFetch(body: unknown, status = 200) {
    return jest.spyOn(globalThis, 'fetch').mockResolvedValue(
        new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
    );
}

describe('parseServerList', () => {
    it('keeps entries with a host and coerces numeric fields', () => {
        expect(parseServerList(listing)).toEqual([
            { host: 'far.example.net:8080', name: 'Far City', country: 'Farland', sponsor: 'Far ISP', id: '3', distance: 900 },
            { host: 'near.example.net:8080', name: 'Near City', country: 'Nearland', sponsor: 'Near ISP', id: '1', distance: 10 },
            { host: 'mid.example.net:8080', name: 'Mid City', country: 'Midland', sponsor: undefined, id: '2', distance: 120.5 }
        ]);
    });

    it('rejects a payload that is not a list', () => {
        expect(() => parseServerList({ servers: [] })).toThrow(CatalogUnavailableError);
    });
});

describe('HttpServerCatalog', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('returns the lowest-latency server among the closest entries', async () => {
        const fetchSpy = mockFetch(listing);
        const probe = new AddressProbe({ '203.0.113.1': 40, '203.0.113.2': 18, '203.0.113.3': 5 });
        const catalog = new HttpServerCatalog({ url: CATALOG_URL, probe, resolver, closestCount: 2, probeTimeoutMs: 1000 });

        const best = await catalog.getBestCandidate();

        expect(best).toEqual({
            host: 'mid.example.net:8080',
            displayName: 'Mid City',
            country: 'Midland',
            advertisedLatencyMs: 18,
            sponsor: undefined,
            id: '2'
        });
        // far.example.net is outside the closest two and never probed
        expect(probe.calls).toEqual(['203.0.113.1', '203.0.113.2']);
        expect(fetchSpy).toHaveBeenCalledWith(CATALOG_URL, expect.objectContaining({ headers: { 'Accept': 'application/json' } }));
    });

    it('fetches the list once and re-ranks on every call', async () => {
        const fetchSpy = mockFetch(listing);
        let round = 0;
        const rtts: Record<string, number>[] = [
            { '203.0.113.1': 10, '203.0.113.2': 30 },
            { '203.0.113.1': 50, '203.0.113.2': 30 }
        ];
        const probe: LatencyProbe = {
            probe: async (address) => rtts[Math.floor(round++ / 2)][address] ?? null
        };
        const catalog = new HttpServerCatalog({ url: CATALOG_URL, probe, resolver, closestCount: 2, probeTimeoutMs: 1000 });

        expect((await catalog.getBestCandidate()).host).toBe('near.example.net:8080');
        expect((await catalog.getBestCandidate()).host).toBe('mid.example.net:8080');
        expect(fetchSpy).toHaveBeenCalledTimes(1);
    });

    it('returns the nearest server at the probe timeout when nothing answers', async () => {
        mockFetch(listing);
        const catalog = new HttpServerCatalog({
            url: CATALOG_URL,
            probe: new AddressProbe({}),
            resolver,
            probeTimeoutMs: 1500
        });

        const best = await catalog.getBestCandidate();

        expect(best.host).toBe('near.example.net:8080');
        expect(best.advertisedLatencyMs).toBe(1500);
    });

    it('reports the catalog unavailable on an HTTP error', async () => {
        mockFetch({ error: 'down' }, 503);
        const catalog = new HttpServerCatalog({ url: CATALOG_URL, probe: new AddressProbe({}), resolver, probeTimeoutMs: 1000 });

        await expect(catalog.getBestCandidate()).rejects.toThrow('Failed to retrieve server list: HTTP 503');
    });

    it('reports the catalog unavailable when the request fails', async () => {
        jest.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
        const catalog = new HttpServerCatalog({ url: CATALOG_URL, probe: new AddressProbe({}), resolver, probeTimeoutMs: 1000 });

        await expect(catalog.getBestCandidate()).rejects.toBeInstanceOf(CatalogUnavailableError);
    });

    it('reports the catalog unavailable when no entry has a host', async () => {
        mockFetch([{ name: 'No Host' }]);
        const catalog = new HttpServerCatalog({ url: CATALOG_URL, probe: new AddressProbe({}), resolver, probeTimeoutMs: 1000 });

        await expect(catalog.getBestCandidate()).rejects.toThrow('Server list contains no usable servers');
    });

    it('lets a probe environment fault through', async () => {
        mockFetch(listing);
        const probe: LatencyProbe = {
            probe: async () => {
                throw new ProbeEnvironmentError('Cannot probe 203.0.113.1: EACCES');
            }
        };
        const catalog = new HttpServerCatalog({ url: CATALOG_URL, probe, resolver, probeTimeoutMs: 1000 });

        await expect(catalog.getBestCandidate()).rejects.toBeInstanceOf(ProbeEnvironmentError);
    });
});
