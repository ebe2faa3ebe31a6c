import { ProviderOperation } from '@fabricflow/sdk';
import { v7 as uuid } from 'uuid';

export interface EngineConfig {
    port: number;
    databaseUrl: string | undefined;
    redisUrl: string;
    lockTtlMs: number;
    pollBatchSize: number;
    reaperStale: number;        // seconds
    reaperInterval: number;     // ms
    maxRecoveries: number;
    maxInFlight: number;
    maxEventLoopLag: number;    // ms
    defaultOperation: ProviderOperation;
    notifyWebhookUrl: string | null;
    workerId: string;
}

const OPERATIONS: readonly ProviderOperation[] = ['render', 'diff', 'apply'];

export function isOperation(value: string): value is ProviderOperation {
    return OPERATIONS.some(op => op === value);
}

function int(raw: string | undefined, fallback: number): number {
    const parsed = parseInt(raw || '', 10);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const defaultOperation = (env.DEFAULT_OPERATION || 'render').trim();
    if (!isOperation(defaultOperation)) {
        throw new Error(`DEFAULT_OPERATION must be one of ${OPERATIONS.join(', ')}, got "${defaultOperation}"`);
    }

    return {
        port: int(env.PORT, 50051),
        databaseUrl: env.DATABASE_URL,
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        lockTtlMs: int(env.LOCK_TTL_MS, 60_000),
        pollBatchSize: int(env.POLL_BATCH_SIZE, 10),
        reaperStale: int(env.REAPER_STALE_THRESHOLD, 300),
        reaperInterval: int(env.REAPER_INTERVAL, 10_000),
        maxRecoveries: int(env.MAX_RECOVERIES, 3),
        maxInFlight: int(env.MAX_IN_FLIGHT, 100),
        maxEventLoopLag: int(env.MAX_EVENT_LOOP_LAG, 100),
        defaultOperation,
        notifyWebhookUrl: env.NOTIFY_WEBHOOK_URL || null,
        workerId: `worker-${uuid().slice(0, 8)}`,
    };
}
