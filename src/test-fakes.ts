// In-process stand-ins for the network capabilities, shared by the unit tests.
import { TransientMeasurementError } from './errors.js';
import type {
    HostResolver,
    LatencyProbe,
    MeasurementProvider,
    ResolvedEndpoint,
    ServerCandidate,
    ServerCatalog,
    TransferSample
} from './types.js';

export function candidate(host: string, advertisedLatencyMs = 10): ServerCandidate {
    return { host, displayName: `${host} node`, country: 'Testland', advertisedLatencyMs };
}

/** Replays a fixed list of probe results, then repeats the last one. */
export class ScriptedProbe implements LatencyProbe {
    public readonly calls: string[] = [];
    private index = 0;

    constructor(private readonly results: (number | null)[]) {}

    async probe(address: string): Promise<number | null> {
        this.calls.push(address);
        const result = this.results[Math.min(this.index, this.results.length - 1)];
        this.index++;
        return result ?? null;
    }
}

/** Answers per address; unknown addresses never answer. */
export class AddressProbe implements LatencyProbe {
    public readonly calls: string[] = [];

    constructor(private readonly rtts: Record<string, number | null>) {}

    async probe(address: string): Promise<number | null> {
        this.calls.push(address);
        return this.rtts[address] ?? null;
    }
}

export class MapResolver implements HostResolver {
    public readonly calls: string[] = [];

    constructor(private readonly table: Record<string, string>) {}

    async resolve(host: string): Promise<string> {
        this.calls.push(host);
        const address = this.table[host];
        if (address === undefined) {
            throw new Error(`getaddrinfo ENOTFOUND ${host}`);
        }
        return address;
    }
}

export class SequenceCatalog implements ServerCatalog {
    public queries = 0;

    constructor(private readonly candidates: ServerCandidate[]) {}

    async getBestCandidate(): Promise<ServerCandidate> {
        const next = this.candidates[Math.min(this.queries, this.candidates.length - 1)];
        this.queries++;
        return next;
    }
}

export class FailingCatalog implements ServerCatalog {
    public queries = 0;

    constructor(private readonly error: Error) {}

    async getBestCandidate(): Promise<ServerCandidate> {
        this.queries++;
        throw this.error;
    }
}

type Step = TransferSample | 'fail';

/**
 * Replays scripted transfer outcomes per direction, one step per attempt.
 * Once a script runs out every further attempt fails.
 */
export class ScriptedProvider implements MeasurementProvider {
    public readonly downloadCalls: ResolvedEndpoint[] = [];
    public readonly uploadCalls: ResolvedEndpoint[] = [];

    constructor(
        private readonly downloads: Step[],
        private readonly uploads: Step[]
    ) {}

    async measureDownload(endpoint: ResolvedEndpoint): Promise<TransferSample> {
        const step = this.downloads[this.downloadCalls.length];
        this.downloadCalls.push(endpoint);
        return this.play(step, 'download');
    }

    async measureUpload(endpoint: ResolvedEndpoint): Promise<TransferSample> {
        const step = this.uploads[this.uploadCalls.length];
        this.uploadCalls.push(endpoint);
        return this.play(step, 'upload');
    }

    private play(step: Step | undefined, direction: string): TransferSample {
        if (step === undefined || step === 'fail') {
            throw new TransientMeasurementError(`scripted ${direction} failure`);
        }
        return step;
    }
}

export function sample(throughputMbps: number, dataUsedMB: number): TransferSample {
    return { throughputMbps, dataUsedMB };
}
