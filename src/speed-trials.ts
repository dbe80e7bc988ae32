import { TransientMeasurementError, errorMessage, requirePositiveInteger } from './errors.js';
import { componentLogger } from './logger.js';
import type {
    AggregateTrialResult,
    Direction,
    MeasurementProvider,
    ResolvedEndpoint,
    TransferSample,
    TrialOutcome
} from './types.js';

const logger = componentLogger('trials');

function isUsable(sample: TransferSample): boolean {
    return Number.isFinite(sample.throughputMbps) && sample.throughputMbps > 0
        && Number.isFinite(sample.dataUsedMB) && sample.dataUsedMB > 0;
}

export type TrialListener = (direction: Direction, trial: number, trialCount: number) => void;

export class SpeedTrialRunner {
    constructor(
        private readonly provider: MeasurementProvider,
        private readonly onTrial?: TrialListener
    ) {}

    /**
     * One direction, up to `retryBudget` attempts. Every provider failure, and
     * every sample without a positive finite speed and volume, consumes an
     * attempt. Null once the budget is spent.
     */
    public async runTrial(endpoint: ResolvedEndpoint, direction: Direction, retryBudget: number): Promise<TrialOutcome | null> {
        requirePositiveInteger('retries', retryBudget);

        for (let attempt = 1; attempt <= retryBudget; attempt++) {
            try {
                const sample = direction === 'download'
                    ? await this.provider.measureDownload(endpoint)
                    : await this.provider.measureUpload(endpoint);
                if (!isUsable(sample)) {
                    throw new TransientMeasurementError(
                        `${direction} returned ${sample.throughputMbps} Mbps over ${sample.dataUsedMB} MB`
                    );
                }

                return Object.freeze({
                    direction,
                    throughputMbps: sample.throughputMbps,
                    dataUsedMB: sample.dataUsedMB
                });
            } catch (err) {
                logger.warn({ direction, attempt, retryBudget, address: endpoint.address, err: errorMessage(err) }, 'transfer attempt failed');
            }
        }

        logger.error({ direction, retryBudget, address: endpoint.address }, `${direction} failed after ${retryBudget} attempts`);
        return null;
    }

    public async runTrials(endpoint: ResolvedEndpoint, trialCount: number, retryBudget: number): Promise<AggregateTrialResult> {
        requirePositiveInteger('trialCount', trialCount);
        requirePositiveInteger('retries', retryBudget);

        let totalDownloadMbps = 0;
        let totalUploadMbps = 0;
        let totalDownloadMB = 0;
        let totalUploadMB = 0;
        let successfulTrialCount = 0;

        for (let trial = 1; trial <= trialCount; trial++) {
            this.notify('download', trial, trialCount);
            const download = await this.runTrial(endpoint, 'download', retryBudget);

            // Upload only runs after a download succeeded in the same trial.
            if (download === null) {
                logger.warn({ trial, trialCount }, 'download failed, skipping upload for this trial');
                continue;
            }

            totalDownloadMbps += download.throughputMbps;
            totalDownloadMB += download.dataUsedMB;
            logger.info({ trial, trialCount, mbps: download.throughputMbps, mb: download.dataUsedMB }, 'download complete');

            this.notify('upload', trial, trialCount);
            const upload = await this.runTrial(endpoint, 'upload', retryBudget);
            if (upload !== null) {
                totalUploadMbps += upload.throughputMbps;
                totalUploadMB += upload.dataUsedMB;
                logger.info({ trial, trialCount, mbps: upload.throughputMbps, mb: upload.dataUsedMB }, 'upload complete');
            }

            // The trial counts on the strength of its download alone.
            successfulTrialCount++;
        }

        if (successfulTrialCount === 0) {
            logger.error({ trialCount }, 'all trials failed, no throughput data');
            return Object.freeze({ ok: false, successfulTrialCount: 0, attemptedTrialCount: trialCount });
        }

        return Object.freeze({
            ok: true,
            avgDownloadMbps: totalDownloadMbps / successfulTrialCount,
            avgUploadMbps: totalUploadMbps / successfulTrialCount,
            avgDownloadDataMB: totalDownloadMB / successfulTrialCount,
            avgUploadDataMB: totalUploadMB / successfulTrialCount,
            successfulTrialCount,
            attemptedTrialCount: trialCount
        });
    }

    private notify(direction: Direction, trial: number, trialCount: number) {
        if (!this.onTrial) return;
        try {
            this.onTrial(direction, trial, trialCount);
        } catch (err) {
            logger.error({ err: errorMessage(err) }, 'trial listener threw');
        }
    }
}
