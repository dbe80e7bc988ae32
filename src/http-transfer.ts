import net from 'net';
import { performance } from 'perf_hooks';
import { TransientMeasurementError, errorMessage } from './errors.js';
import { componentLogger } from './logger.js';
import type { MeasurementProvider, ResolvedEndpoint, TransferSample } from './types.js';

const logger = componentLogger('transfer');

const DEFAULT_SERVER_PORT = 8080;

export interface HttpTransferOptions {
    timeoutMs: number;
    downloadBytes: number;
    uploadBytes: number;
    fallbackDownloadUrl: string;
    fallbackUploadUrl: string;
}

// "host:8080" and "[v6]:8080" carry a port; bare names and bare IPv6 literals do not.
function portOf(host: string): number {
    const bracketed = host.match(/^\[[^\]]+\]:(\d+)$/);
    if (bracketed) return Number(bracketed[1]);

    const parts = host.split(':');
    if (parts.length === 2 && /^\d+$/.test(parts[1])) return Number(parts[1]);
    return DEFAULT_SERVER_PORT;
}

function hostForUrl(address: string): string {
    return net.isIPv6(address) ? `[${address}]` : address;
}

/** Bits over seconds, in Mbps; bytes in MB. Decimal units. */
export function toSample(bytes: number, elapsedMs: number): TransferSample {
    const seconds = elapsedMs / 1000;
    const throughputMbps = seconds > 0 ? (bytes * 8) / seconds / 1_000_000 : 0;
    if (!Number.isFinite(throughputMbps) || throughputMbps <= 0) {
        throw new TransientMeasurementError(`Invalid throughput from ${bytes} bytes in ${elapsedMs}ms`);
    }
    return { throughputMbps, dataUsedMB: bytes / 1_000_000 };
}

/**
 * Throughput over plain HTTP: a timed GET of a sized payload and a timed POST
 * of a generated one. A selected server is addressed by its resolved IP so the
 * transfer takes the path the latency figures describe.
 */
export class HttpTransferProvider implements MeasurementProvider {
    constructor(private readonly options: HttpTransferOptions) {}

    public async measureDownload(endpoint: ResolvedEndpoint): Promise<TransferSample> {
        const url = this.downloadUrl(endpoint);
        const start = performance.now();

        let received = 0;
        try {
            const response = await fetch(url, {
                signal: AbortSignal.timeout(this.options.timeoutMs)
            });
            if (!response.ok) throw new Error(`HTTP ${response.status}`);

            const reader = response.body?.getReader();
            if (!reader) throw new Error('Failed to get response reader');

            while (true) {
                const { done, value } = await reader.read();
                if (done) break;
                received += value.length;
            }
        } catch (err) {
            throw new TransientMeasurementError(`Download from ${url} failed: ${errorMessage(err)}`, { cause: err });
        }

        const sample = toSample(received, performance.now() - start);
        logger.debug({ url, bytes: received, mbps: sample.throughputMbps }, 'download transfer');
        return sample;
    }

    public async measureUpload(endpoint: ResolvedEndpoint): Promise<TransferSample> {
        const url = this.uploadUrl(endpoint);
        const body = new Uint8Array(this.options.uploadBytes);
        const start = performance.now();

        try {
            const response = await fetch(url, {
                method: 'POST',
                body,
                headers: { 'Content-Type': 'application/octet-stream' },
                signal: AbortSignal.timeout(this.options.timeoutMs)
            });
            if (!response.ok) throw new Error(`HTTP ${response.status}`);
            await response.arrayBuffer();
        } catch (err) {
            throw new TransientMeasurementError(`Upload to ${url} failed: ${errorMessage(err)}`, { cause: err });
        }

        const sample = toSample(body.byteLength, performance.now() - start);
        logger.debug({ url, bytes: body.byteLength, mbps: sample.throughputMbps }, 'upload transfer');
        return sample;
    }

    public downloadUrl(endpoint: ResolvedEndpoint): string {
        const { candidate, address } = endpoint;
        if (!candidate) {
            const url = new URL(this.options.fallbackDownloadUrl);
            url.searchParams.set('bytes', String(this.options.downloadBytes));
            return url.toString();
        }
        return `http://${hostForUrl(address)}:${portOf(candidate.host)}/download?size=${this.options.downloadBytes}`;
    }

    public uploadUrl(endpoint: ResolvedEndpoint): string {
        const { candidate, address } = endpoint;
        if (!candidate) return this.options.fallbackUploadUrl;
        return `http://${hostForUrl(address)}:${portOf(candidate.host)}/upload`;
    }
}
