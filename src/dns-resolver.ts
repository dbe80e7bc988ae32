import dns from 'dns/promises';
import net from 'net';
import type { HostResolver } from './types.js';

const DEFAULT_TIMEOUT_MS = 2000;

/** getaddrinfo-based resolution (honours /etc/hosts) bounded by a timeout. */
export class SystemResolver implements HostResolver {
    constructor(private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS) {}

    public async resolve(host: string): Promise<string> {
        if (net.isIP(host)) return host;

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`DNS lookup for ${host} timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
        });

        try {
            const { address } = await Promise.race([dns.lookup(host), timeout]);
            return address;
        } finally {
            clearTimeout(timer);
        }
    }
}
