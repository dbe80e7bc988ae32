import { config } from 'dotenv';
config();

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { createServer } from 'http';
import { Server } from 'socket.io';
import cors from 'cors';
import { notFound } from '@hapi/boom';
import { createOrchestrator } from './bootstrap.js';
import { loadConfig } from './config.js';
import { RunStore } from './database.js';
import { boomPayload, toBoom } from './http-errors.js';
import { componentLogger } from './logger.js';
import { RunService } from './run-service.js';

const logger = componentLogger('server');

const MAX_LIST_LIMIT = 200;

export function createApp(runs: RunService): express.Express {
    const app = express();
    app.use(express.json());

    app.post('/api/runs', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const run = await runs.start(req.body);
            res.status(201).json(run);
        } catch (err) {
            next(err);
        }
    });

    app.get('/api/runs', (req: Request, res: Response) => {
        const requested = Number(req.query.limit ?? 20);
        const limit = Number.isInteger(requested) && requested > 0 ? Math.min(requested, MAX_LIST_LIMIT) : 20;
        res.json({ running: runs.isRunning(), runs: runs.list(limit) });
    });

    app.get('/api/runs/:id', (req: Request, res: Response, next: NextFunction) => {
        const id = Number(req.params.id);
        const run = Number.isInteger(id) && id > 0 ? runs.get(id) : null;
        if (!run) {
            next(notFound(`Run ${req.params.id} not found`));
            return;
        }
        res.json(run);
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const boom = toBoom(err);
        if (boom.isServer) {
            logger.error({ err }, 'request failed');
        }
        res.status(boom.output.statusCode).json(boomPayload(boom));
    });

    return app;
}

function main() {
    const appConfig = loadConfig();

    const orchestrator = createOrchestrator(appConfig);
    const store = new RunStore(appConfig.dbPath);

    const app = express();
    app.use(cors({ origin: appConfig.clientOrigin }));

    const httpServer = createServer(app);
    const io = new Server(httpServer, {
        cors: {
            origin: appConfig.clientOrigin,
            methods: ['GET', 'POST']
        }
    });

    const runs = new RunService(orchestrator, store, appConfig.measurement, {
        onProgress: (event) => io.emit('run-progress', event),
        onComplete: (run) => io.emit('run-complete', run)
    });
    app.use(createApp(runs));

    io.on('connection', (socket) => {
        logger.debug({ id: socket.id }, 'client connected');
        socket.emit('run-status', { running: runs.isRunning() });
    });

    process.on('unhandledRejection', (reason) => {
        logger.error({ reason }, 'unhandled rejection');
    });

    httpServer.listen(appConfig.port, () => {
        logger.info({ port: appConfig.port }, 'server running');
    });
}

if (require.main === module) {
    main();
}
