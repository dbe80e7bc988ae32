// Core measurement model. Every value here is built fresh per run and frozen.

export type Direction = 'download' | 'upload';

export interface ServerCandidate {
    host: string;                // may carry a ":port" suffix as listed by the catalog
    displayName: string;
    country: string;
    advertisedLatencyMs: number;
    sponsor?: string;
    id?: string;
}

export interface ResolvedEndpoint {
    candidate?: ServerCandidate; // absent on the fallback path
    address: string;
}

export interface ServerSelection {
    endpoint: ResolvedEndpoint;
    usedFallback: boolean;
    attempts: number;            // catalog queries issued
}

export interface TrialOutcome {
    direction: Direction;
    throughputMbps: number;
    dataUsedMB: number;
}

export type AggregateTrialResult = {
    ok: true;
    avgDownloadMbps: number;
    avgUploadMbps: number;
    avgDownloadDataMB: number;
    avgUploadDataMB: number;
    successfulTrialCount: number;
    attemptedTrialCount: number;
} | {
    ok: false;                   // no throughput data
    successfulTrialCount: 0;
    attemptedTrialCount: number;
};

export type LatencyStats = {
    ok: true;
    lowMs: number;
    highMs: number;
    avgMs: number;
    jitterMs: number;            // high - low
    receivedCount: number;
    sentCount: number;
} | {
    ok: false;                   // no probe answered
    receivedCount: 0;
    sentCount: number;
};

export interface MeasurementResult {
    endpoint: ResolvedEndpoint;
    usedFallback: boolean;
    trials: AggregateTrialResult;
    packetLossPercent: number;
    latency: LatencyStats;
    checkedAt: string;
    durationMs: number;
}

export interface MeasurementConfig {
    trialCount: number;
    retries: number;             // per direction, per trial
    selectionRetries: number;
    sampleCount: number;         // probes per statistic
}

export type RunPhase = 'selecting' | 'selected' | 'download' | 'upload' | 'latency' | 'complete';

export interface ProgressEvent {
    phase: RunPhase;
    trial?: number;
    trialCount?: number;
    endpoint?: ResolvedEndpoint;
    usedFallback?: boolean;
}

// --- Capabilities consumed by the core ---

export interface LatencyProbe {
    /** Round-trip time in ms, or null when the target did not answer. */
    probe(address: string): Promise<number | null>;
}

export interface HostResolver {
    resolve(host: string): Promise<string>;
}

export interface ServerCatalog {
    getBestCandidate(): Promise<ServerCandidate>;
}

export interface TransferSample {
    throughputMbps: number;
    dataUsedMB: number;
}

export interface MeasurementProvider {
    measureDownload(endpoint: ResolvedEndpoint): Promise<TransferSample>;
    measureUpload(endpoint: ResolvedEndpoint): Promise<TransferSample>;
}

// Database Row Types

export interface MeasurementRunRow {
    id: number;
    checked_at: string;
    duration_ms: number;
    address: string;
    used_fallback: number;       // SQLite uses 0/1 for boolean
    server_host: string | null;
    server_name: string | null;
    server_country: string | null;
    server_sponsor: string | null;
    server_id: string | null;
    advertised_latency_ms: number | null;
    attempted_trials: number;
    successful_trials: number;
    avg_download_mbps: number | null;
    avg_upload_mbps: number | null;
    avg_download_mb: number | null;
    avg_upload_mb: number | null;
    packet_loss_pct: number;
    probes_sent: number;
    probes_received: number;
    latency_low_ms: number | null;
    latency_high_ms: number | null;
    latency_avg_ms: number | null;
    jitter_ms: number | null;
    created_at: number;
}
