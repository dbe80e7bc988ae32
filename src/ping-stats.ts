import { requirePositiveInteger } from './errors.js';
import { componentLogger } from './logger.js';
import type { LatencyProbe, LatencyStats } from './types.js';

const logger = componentLogger('ping-stats');

/**
 * Reduces repeated latency probes against one address into loss and
 * latency-distribution figures. Probes run one after another.
 */
export class PingStatsCollector {
    constructor(private readonly probe: LatencyProbe) {}

    /** Percentage of probes that got no answer, in [0, 100]. */
    public async collectPacketLoss(address: string, sampleCount: number): Promise<number> {
        requirePositiveInteger('sampleCount', sampleCount);

        const samples = await this.sample(address, sampleCount);
        const lost = samples.filter(rtt => rtt === null).length;
        const lossPercent = (lost / sampleCount) * 100;

        logger.info({ address, sent: sampleCount, lost, lossPercent }, 'packet loss collected');
        return lossPercent;
    }

    public async collectLatencyStats(address: string, sampleCount: number): Promise<LatencyStats> {
        requirePositiveInteger('sampleCount', sampleCount);

        const rtts = (await this.sample(address, sampleCount))
            .filter((rtt): rtt is number => rtt !== null);

        if (rtts.length === 0) {
            logger.warn({ address, sent: sampleCount }, 'no probe answered, latency unavailable');
            return Object.freeze({ ok: false, receivedCount: 0, sentCount: sampleCount });
        }

        const lowMs = Math.min(...rtts);
        const highMs = Math.max(...rtts);
        const avgMs = rtts.reduce((a, b) => a + b, 0) / rtts.length;

        // Range, not standard deviation.
        const jitterMs = highMs - lowMs;

        logger.info({ address, lowMs, highMs, avgMs, jitterMs }, 'latency stats collected');
        return Object.freeze({
            ok: true,
            lowMs,
            highMs,
            avgMs,
            jitterMs,
            receivedCount: rtts.length,
            sentCount: sampleCount
        });
    }

    private async sample(address: string, count: number): Promise<(number | null)[]> {
        const results: (number | null)[] = [];
        for (let i = 0; i < count; i++) {
            results.push(await this.probe.probe(address));
        }
        return results;
    }
}
