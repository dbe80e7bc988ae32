import { pino } from 'pino';

function resolveLevel(): string {
    if (process.argv.includes('--debug')) return 'debug';
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger = pino({
    name: 'netquality',
    level: resolveLevel()
});

export function componentLogger(component: string) {
    return logger.child({ component });
}
