import path from 'path';
import { ConfigurationError, requirePositiveInteger } from './errors.js';
import type { MeasurementConfig } from './types.js';

// Must also be the host of the fallback transfer URLs.
export const DEFAULT_FALLBACK_HOST = 'speed.cloudflare.com';
export const DEFAULT_CATALOG_URL = 'https://www.speedtest.net/api/js/servers?engine=js&limit=10';
export const DEFAULT_FALLBACK_DOWNLOAD_URL = 'https://speed.cloudflare.com/__down';
export const DEFAULT_FALLBACK_UPLOAD_URL = 'https://speed.cloudflare.com/__up';

export interface AppConfig {
    port: number;
    clientOrigin: string;
    dbPath: string;
    measurement: MeasurementConfig;
    probe: {
        port: number;
        timeoutMs: number;
    };
    dnsTimeoutMs: number;
    fallbackHost: string;
    catalog: {
        url: string;
        closestCount: number;
        timeoutMs: number;
    };
    transfer: {
        timeoutMs: number;
        downloadBytes: number;
        uploadBytes: number;
        fallbackDownloadUrl: string;
        fallbackUploadUrl: string;
    };
}

type Env = Record<string, string | undefined>;

const MAX_PORT = 65535;

function intFrom(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${key} is not a number: "${raw}"`);
    }
    return requirePositiveInteger(key, value);
}

function portFrom(env: Env, key: string, fallback: number): number {
    const value = intFrom(env, key, fallback);
    if (value > MAX_PORT) {
        throw new ConfigurationError(`${key} must be a port between 1 and ${MAX_PORT}, got ${value}`);
    }
    return value;
}

function stringFrom(env: Env, key: string, fallback: string): string {
    const raw = env[key]?.trim();
    return raw ? raw : fallback;
}

function urlFrom(env: Env, key: string, fallback: string): string {
    const value = stringFrom(env, key, fallback);
    try {
        new URL(value);
    } catch {
        throw new ConfigurationError(`${key} is not a valid URL: "${value}"`);
    }
    return value;
}

// On the fallback path latency is sampled on FALLBACK_HOST, so the transfers have to go there too.
function requireSameHost(fallbackHost: string, key: string, url: string) {
    const hostname = new URL(url).hostname.replace(/^\[|\]$/g, '');
    if (hostname.toLowerCase() !== fallbackHost.toLowerCase()) {
        throw new ConfigurationError(`${key} must point at FALLBACK_HOST ${fallbackHost}, got ${hostname}`);
    }
}

/**
 * Build the application config from environment variables.
 * Call dotenv's `config()` first when running from a shell.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const fallbackHost = stringFrom(env, 'FALLBACK_HOST', DEFAULT_FALLBACK_HOST);
    const fallbackDownloadUrl = urlFrom(env, 'FALLBACK_DOWNLOAD_URL', DEFAULT_FALLBACK_DOWNLOAD_URL);
    const fallbackUploadUrl = urlFrom(env, 'FALLBACK_UPLOAD_URL', DEFAULT_FALLBACK_UPLOAD_URL);
    requireSameHost(fallbackHost, 'FALLBACK_DOWNLOAD_URL', fallbackDownloadUrl);
    requireSameHost(fallbackHost, 'FALLBACK_UPLOAD_URL', fallbackUploadUrl);

    return {
        port: portFrom(env, 'PORT', 3001),
        clientOrigin: stringFrom(env, 'CLIENT_ORIGIN', '*'),
        dbPath: stringFrom(env, 'DB_PATH', path.join(process.cwd(), 'data', 'netquality.db')),
        measurement: {
            trialCount: intFrom(env, 'TRIAL_COUNT', 3),
            retries: intFrom(env, 'TRIAL_RETRIES', 3),
            selectionRetries: intFrom(env, 'SELECTION_RETRIES', 3),
            sampleCount: intFrom(env, 'PING_SAMPLES', 4)
        },
        probe: {
            port: portFrom(env, 'PROBE_PORT', 80),
            timeoutMs: intFrom(env, 'PROBE_TIMEOUT_MS', 1000)
        },
        dnsTimeoutMs: intFrom(env, 'DNS_TIMEOUT_MS', 2000),
        fallbackHost,
        catalog: {
            url: urlFrom(env, 'CATALOG_URL', DEFAULT_CATALOG_URL),
            closestCount: intFrom(env, 'CATALOG_CLOSEST', 5),
            timeoutMs: intFrom(env, 'CATALOG_TIMEOUT_MS', 5000)
        },
        transfer: {
            timeoutMs: intFrom(env, 'TRANSFER_TIMEOUT_MS', 30_000),
            downloadBytes: intFrom(env, 'DOWNLOAD_BYTES', 25_000_000),
            uploadBytes: intFrom(env, 'UPLOAD_BYTES', 10_000_000),
            fallbackDownloadUrl,
            fallbackUploadUrl
        }
    };
}

/** Overlay request-supplied overrides on the configured defaults. */
export function mergeMeasurementConfig(base: MeasurementConfig, overrides: unknown): MeasurementConfig {
    if (overrides === undefined || overrides === null) return base;
    if (typeof overrides !== 'object' || Array.isArray(overrides)) {
        throw new ConfigurationError('Measurement overrides must be an object');
    }

    const merged: MeasurementConfig = { ...base };
    const keys: (keyof MeasurementConfig)[] = ['trialCount', 'retries', 'selectionRetries', 'sampleCount'];
    for (const key of keys) {
        if (!(key in overrides)) continue;
        const value: unknown = Reflect.get(overrides, key);
        if (typeof value !== 'number') {
            throw new ConfigurationError(`${key} must be a number`);
        }
        merged[key] = requirePositiveInteger(key, value);
    }
    return merged;
}
