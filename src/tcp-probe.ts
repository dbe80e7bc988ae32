import net from 'net';
import { performance } from 'perf_hooks';
import { ProbeEnvironmentError } from './errors.js';
import { componentLogger } from './logger.js';
import type { LatencyProbe } from './types.js';

const logger = componentLogger('probe');

const DEFAULT_PORT = 80;
const DEFAULT_TIMEOUT_MS = 1000;

// The local host cannot open sockets at all; retrying will not help.
const ENVIRONMENT_FAULTS = new Set(['EMFILE', 'ENFILE', 'ENOBUFS', 'EACCES', 'EPERM']);

export interface TcpProbeOptions {
    port?: number;
    timeoutMs?: number;
}

/**
 * Measures round-trip time as TCP connect time.
 * A completed handshake and a reset (ECONNREFUSED) are both replies from the
 * target; anything else is a lost probe.
 */
export class TcpLatencyProbe implements LatencyProbe {
    private readonly port: number;
    private readonly timeoutMs: number;

    constructor(options: TcpProbeOptions = {}) {
        this.port = options.port ?? DEFAULT_PORT;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    public probe(address: string): Promise<number | null> {
        return new Promise((resolve, reject) => {
            const start = performance.now();
            const socket = new net.Socket();
            let settled = false;

            const onDone = (rtt: number | null, fault?: Error) => {
                if (settled) return;
                settled = true;
                socket.destroy();
                if (fault) {
                    reject(fault);
                    return;
                }
                logger.debug({ address, port: this.port, rtt }, 'probe finished');
                resolve(rtt);
            };

            socket.setTimeout(this.timeoutMs);

            socket.connect(this.port, address, () => {
                onDone(performance.now() - start);
            });

            socket.on('error', (err: NodeJS.ErrnoException) => {
                if (err.code === 'ECONNREFUSED') {
                    onDone(performance.now() - start);
                } else if (err.code !== undefined && ENVIRONMENT_FAULTS.has(err.code)) {
                    onDone(null, new ProbeEnvironmentError(`Cannot probe ${address}: ${err.code}`, { cause: err }));
                } else {
                    onDone(null);
                }
            });

            socket.on('timeout', () => {
                onDone(null);
            });
        });
    }
}
