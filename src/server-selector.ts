import {
    CatalogUnavailableError,
    FallbackResolutionError,
    ProbeEnvironmentError,
    errorMessage,
    requirePositiveInteger
} from './errors.js';
import { componentLogger } from './logger.js';
import type {
    HostResolver,
    LatencyProbe,
    ServerCandidate,
    ServerCatalog,
    ServerSelection
} from './types.js';

const logger = componentLogger('selector');

/**
 * Strip a port suffix from a catalog host.
 * "speed.example.net:8080" -> "speed.example.net", "[2001:db8::1]:8080" -> "2001:db8::1".
 * A bare IPv6 literal (more than one colon, no brackets) is returned unchanged.
 */
export function normalizeHost(host: string): string {
    const trimmed = host.trim();
    const bracketed = trimmed.match(/^\[([^\]]+)\](?::\d+)?$/);
    if (bracketed) return bracketed[1];

    const colons = trimmed.split(':').length - 1;
    if (colons === 1) return trimmed.slice(0, trimmed.indexOf(':'));
    return trimmed;
}

/**
 * First-acceptable server selection: the first catalog candidate that
 * resolves and answers one probe wins. No ranking among acceptable candidates.
 */
export class ServerSelector {
    constructor(
        private readonly resolver: HostResolver,
        private readonly probe: LatencyProbe,
        private readonly fallbackHost: string
    ) {}

    public async selectServer(catalog: ServerCatalog, retryBudget: number): Promise<ServerSelection> {
        requirePositiveInteger('selectionRetries', retryBudget);

        const rejected = new Set<string>();
        let attempts = 0;

        while (attempts < retryBudget) {
            attempts++;

            const candidate = await this.fetchCandidate(catalog);
            const host = normalizeHost(candidate.host);

            if (rejected.has(host)) {
                logger.warn({ host, attempt: attempts, retryBudget }, 'catalog repeated a rejected candidate, skipping');
                continue;
            }

            let address: string;
            try {
                address = await this.resolver.resolve(host);
            } catch (err) {
                logger.warn({ host, attempt: attempts, err: errorMessage(err) }, 'candidate did not resolve, rejecting');
                rejected.add(host);
                continue;
            }

            const rtt = await this.probe.probe(address);
            if (rtt === null) {
                logger.warn({ host, address, attempt: attempts }, 'candidate unreachable, rejecting');
                rejected.add(host);
                continue;
            }

            logger.info({ host, address, rtt, name: candidate.displayName, country: candidate.country }, 'server selected');
            return Object.freeze({
                endpoint: Object.freeze({ candidate, address }),
                usedFallback: false,
                attempts
            });
        }

        return this.fallback(attempts, rejected);
    }

    private async fetchCandidate(catalog: ServerCatalog): Promise<ServerCandidate> {
        try {
            return await catalog.getBestCandidate();
        } catch (err) {
            if (err instanceof CatalogUnavailableError || err instanceof ProbeEnvironmentError) throw err;
            throw new CatalogUnavailableError(`Server catalog failed: ${errorMessage(err)}`, { cause: err });
        }
    }

    private async fallback(attempts: number, rejected: Set<string>): Promise<ServerSelection> {
        logger.warn({ attempts, rejected: [...rejected], fallbackHost: this.fallbackHost }, 'no candidate accepted, using fallback host');

        let address: string;
        try {
            address = await this.resolver.resolve(this.fallbackHost);
        } catch (err) {
            throw new FallbackResolutionError(this.fallbackHost, { cause: err });
        }

        return Object.freeze({
            endpoint: Object.freeze({ address }),
            usedFallback: true,
            attempts
        });
    }
}
