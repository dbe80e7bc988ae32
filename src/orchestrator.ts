import { performance } from 'perf_hooks';
import { errorMessage, requirePositiveInteger } from './errors.js';
import { componentLogger } from './logger.js';
import { PingStatsCollector } from './ping-stats.js';
import { ServerSelector } from './server-selector.js';
import { SpeedTrialRunner } from './speed-trials.js';
import type {
    HostResolver,
    LatencyProbe,
    MeasurementConfig,
    MeasurementProvider,
    MeasurementResult,
    ProgressEvent,
    ServerCatalog
} from './types.js';

const logger = componentLogger('orchestrator');

export interface OrchestratorDeps {
    catalog: ServerCatalog;
    provider: MeasurementProvider;
    probe: LatencyProbe;
    resolver: HostResolver;
    fallbackHost: string;
}

export function validateMeasurementConfig(config: MeasurementConfig): void {
    requirePositiveInteger('trialCount', config.trialCount);
    requirePositiveInteger('retries', config.retries);
    requirePositiveInteger('selectionRetries', config.selectionRetries);
    requirePositiveInteger('sampleCount', config.sampleCount);
}

/**
 * One end-to-end run: select a server, run throughput trials against it, then
 * sample latency against the same resolved address.
 *
 * Raises only for bad configuration, an unusable catalog, an unresolvable
 * fallback host, or a host that cannot open sockets. Everything else ends up
 * in the result.
 */
export class MeasurementOrchestrator {
    // Event for callers (API server, CLI) to hook into
    public onProgress?: (event: ProgressEvent) => void;

    constructor(private readonly deps: OrchestratorDeps) {}

    public async run(config: MeasurementConfig): Promise<MeasurementResult> {
        validateMeasurementConfig(config);

        const startedAt = performance.now();
        const { catalog, provider, probe, resolver, fallbackHost } = this.deps;

        // Fresh components per run; nothing carries over between runs.
        const selector = new ServerSelector(resolver, probe, fallbackHost);
        const runner = new SpeedTrialRunner(provider, (direction, trial, trialCount) => {
            this.emit({ phase: direction, trial, trialCount });
        });
        const collector = new PingStatsCollector(probe);

        this.emit({ phase: 'selecting' });
        const { endpoint, usedFallback } = await selector.selectServer(catalog, config.selectionRetries);
        this.emit({ phase: 'selected', endpoint, usedFallback });

        const trials = await runner.runTrials(endpoint, config.trialCount, config.retries);

        // Latency describes the path that carried the throughput test.
        this.emit({ phase: 'latency' });
        const packetLossPercent = await collector.collectPacketLoss(endpoint.address, config.sampleCount);
        const latency = await collector.collectLatencyStats(endpoint.address, config.sampleCount);

        const result: MeasurementResult = Object.freeze({
            endpoint,
            usedFallback,
            trials,
            packetLossPercent,
            latency,
            checkedAt: new Date().toISOString(),
            durationMs: Math.round(performance.now() - startedAt)
        });

        logger.info({
            address: endpoint.address,
            usedFallback,
            successfulTrials: trials.successfulTrialCount,
            packetLossPercent,
            latencyAvailable: latency.ok,
            durationMs: result.durationMs
        }, 'measurement run complete');

        this.emit({ phase: 'complete' });
        return result;
    }

    private emit(event: ProgressEvent) {
        if (!this.onProgress) return;
        try {
            this.onProgress(event);
        } catch (err) {
            logger.error({ err: errorMessage(err), phase: event.phase }, 'progress listener threw');
        }
    }
}
