import { conflict } from '@hapi/boom';
import { mergeMeasurementConfig } from './config.js';
import type { RunStore, StoredRun } from './database.js';
import { componentLogger } from './logger.js';
import type { MeasurementOrchestrator } from './orchestrator.js';
import type { MeasurementConfig, ProgressEvent } from './types.js';

const logger = componentLogger('runs');

export interface RunServiceHooks {
    onProgress?: (event: ProgressEvent) => void;
    onComplete?: (run: StoredRun) => void;
}

/**
 * Runs measurements one at a time and records each completed run.
 */
export class RunService {
    private active = false;

    constructor(
        private readonly orchestrator: MeasurementOrchestrator,
        private readonly store: RunStore,
        private readonly defaults: MeasurementConfig,
        private readonly hooks: RunServiceHooks = {}
    ) {
        this.orchestrator.onProgress = (event) => this.hooks.onProgress?.(event);
    }

    public isRunning(): boolean {
        return this.active;
    }

    public async start(overrides?: unknown): Promise<StoredRun> {
        // Validate before claiming the slot so a bad request never blocks the next one
        const config = mergeMeasurementConfig(this.defaults, overrides);

        if (this.active) {
            throw conflict('A measurement run is already in progress');
        }

        this.active = true;
        try {
            logger.info({ config }, 'measurement run started');
            const result = await this.orchestrator.run(config);
            const id = this.store.save(result);
            const run = { id, result };
            this.hooks.onComplete?.(run);
            return run;
        } finally {
            this.active = false;
        }
    }

    public list(limit?: number): StoredRun[] {
        return this.store.list(limit);
    }

    public get(id: number): StoredRun | null {
        return this.store.get(id);
    }
}
