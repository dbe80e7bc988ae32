#!/usr/bin/env node
import { config } from 'dotenv';
config();

import { createOrchestrator } from './bootstrap.js';
import { loadConfig } from './config.js';
import { RunStore } from './database.js';
import { MeasurementError } from './errors.js';
import { logger } from './logger.js';

async function main(): Promise<number> {
    const appConfig = loadConfig();

    const orchestrator = createOrchestrator(appConfig);
    orchestrator.onProgress = (event) => logger.info({ ...event }, `phase: ${event.phase}`);

    const result = await orchestrator.run(appConfig.measurement);

    const store = new RunStore(appConfig.dbPath);
    try {
        const id = store.save(result);
        logger.info({ id, result }, 'measurement stored');
    } finally {
        store.close();
    }

    // Zero successful trials is a result, but not a passing one for scripted use
    return result.trials.ok ? 0 : 2;
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (err: unknown) => {
        if (err instanceof MeasurementError) {
            logger.fatal({ code: err.code }, err.message);
        } else {
            logger.fatal({ err }, 'measurement failed');
        }
        process.exitCode = 1;
    }
);
