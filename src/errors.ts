export type MeasurementErrorCode =
    | 'CONFIGURATION'
    | 'CATALOG_UNAVAILABLE'
    | 'FALLBACK_UNRESOLVED'
    | 'TRANSIENT_MEASUREMENT'
    | 'PROBE_ENVIRONMENT';

export abstract class MeasurementError extends Error {
    abstract readonly code: MeasurementErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Bad trial counts, retry budgets or sample counts. Raised before any network activity. */
export class ConfigurationError extends MeasurementError {
    readonly code = 'CONFIGURATION';
}

/** The server catalog cannot produce candidates at all. Never retried. */
export class CatalogUnavailableError extends MeasurementError {
    readonly code = 'CATALOG_UNAVAILABLE';
}

export class FallbackResolutionError extends MeasurementError {
    readonly code = 'FALLBACK_UNRESOLVED';

    constructor(readonly host: string, options?: { cause?: unknown }) {
        super(`Fallback host ${host} could not be resolved`, options);
    }
}

/** One failed transfer attempt; consumes a retry. */
export class TransientMeasurementError extends MeasurementError {
    readonly code = 'TRANSIENT_MEASUREMENT';
}

/** The host cannot issue probes at all (no sockets, no permission). */
export class ProbeEnvironmentError extends MeasurementError {
    readonly code = 'PROBE_ENVIRONMENT';
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function requirePositiveInteger(name: string, value: number): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
    }
    return value;
}
