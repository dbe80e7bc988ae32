import { CatalogUnavailableError, ProbeEnvironmentError, errorMessage } from './errors.js';
import { componentLogger } from './logger.js';
import { normalizeHost } from './server-selector.js';
import type { HostResolver, LatencyProbe, ServerCandidate, ServerCatalog } from './types.js';

const logger = componentLogger('catalog');

const DEFAULT_CLOSEST_COUNT = 5;
const DEFAULT_TIMEOUT_MS = 5000;

export interface ListedServer {
    host: string;
    name: string;
    country: string;
    sponsor?: string;
    id?: string;
    distance: number;
}

export interface HttpCatalogOptions {
    url: string;
    probe: LatencyProbe;
    resolver: HostResolver;
    closestCount?: number;
    timeoutMs?: number;
    // Reported as the latency of a candidate no probe reached this round
    probeTimeoutMs: number;
}

function toNumber(value: unknown): number | undefined {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === 'string') {
        const parsed = Number(value);
        if (Number.isFinite(parsed)) {
            return parsed;
        }
    }
    return undefined;
}

function toText(value: unknown): string | undefined {
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
}

/**
 * Parse a server list payload. Entries without a host are dropped; missing
 * distances sort last.
 */
export function parseServerList(payload: unknown): ListedServer[] {
    if (!Array.isArray(payload)) {
        throw new CatalogUnavailableError('Server list is not an array');
    }

    const servers: ListedServer[] = [];
    for (const value of payload) {
        if (!value || typeof value !== 'object') continue;
        const entry = value as Record<string, unknown>;

        const host = toText(entry.host);
        if (!host) continue;

        servers.push({
            host,
            name: toText(entry.name) ?? host,
            country: toText(entry.country) ?? 'Unknown',
            sponsor: toText(entry.sponsor),
            id: toText(entry.id),
            distance: toNumber(entry.distance) ?? Number.POSITIVE_INFINITY
        });
    }
    return servers;
}

/**
 * Server catalog backed by a JSON server list.
 *
 * The list is fetched once per instance. Each `getBestCandidate()` call probes
 * the closest entries afresh and returns the fastest responder, so repeated
 * calls may return the same server or a different one.
 */
export class HttpServerCatalog implements ServerCatalog {
    private servers: ListedServer[] | null = null;
    private readonly closestCount: number;
    private readonly timeoutMs: number;

    constructor(private readonly options: HttpCatalogOptions) {
        this.closestCount = options.closestCount ?? DEFAULT_CLOSEST_COUNT;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    public async getBestCandidate(): Promise<ServerCandidate> {
        const servers = await this.loadServers();

        let best: { server: ListedServer; latencyMs: number } | null = null;
        for (const server of servers) {
            const latencyMs = await this.measure(server);
            if (latencyMs === null) continue;
            if (!best || latencyMs < best.latencyMs) {
                best = { server, latencyMs };
            }
        }

        if (!best) {
            logger.warn({ count: servers.length }, 'no listed server answered, returning nearest by distance');
            return this.toCandidate(servers[0], this.options.probeTimeoutMs);
        }

        logger.debug({ host: best.server.host, latencyMs: best.latencyMs }, 'best candidate ranked');
        return this.toCandidate(best.server, best.latencyMs);
    }

    private async loadServers(): Promise<ListedServer[]> {
        if (this.servers) return this.servers;

        let payload: unknown;
        try {
            const response = await fetch(this.options.url, {
                headers: { 'Accept': 'application/json' },
                signal: AbortSignal.timeout(this.timeoutMs)
            });
            if (!response.ok) throw new Error(`HTTP ${response.status}`);
            payload = await response.json();
        } catch (err) {
            throw new CatalogUnavailableError(`Failed to retrieve server list: ${errorMessage(err)}`, { cause: err });
        }

        const servers = parseServerList(payload)
            .sort((a, b) => a.distance - b.distance)
            .slice(0, this.closestCount);

        if (servers.length === 0) {
            throw new CatalogUnavailableError('Server list contains no usable servers');
        }

        logger.info({ count: servers.length, hosts: servers.map(s => s.host) }, 'server list loaded');
        this.servers = servers;
        return servers;
    }

    private async measure(server: ListedServer): Promise<number | null> {
        try {
            const address = await this.options.resolver.resolve(normalizeHost(server.host));
            return await this.options.probe.probe(address);
        } catch (err) {
            if (err instanceof ProbeEnvironmentError) throw err;
            logger.debug({ host: server.host, err: errorMessage(err) }, 'ranking probe failed');
            return null;
        }
    }

    private toCandidate(server: ListedServer, latencyMs: number): ServerCandidate {
        return Object.freeze({
            host: server.host,
            displayName: server.name,
            country: server.country,
            advertisedLatencyMs: latencyMs,
            sponsor: server.sponsor,
            id: server.id
        });
    }
}
