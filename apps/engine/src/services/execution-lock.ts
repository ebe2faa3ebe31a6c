import { Redis } from 'ioredis';
import { v7 as uuid } from 'uuid';
import { RedisLease } from './redis-lease';

const TAG = '[lock]';
const KEY_PREFIX = 'fabricflow:execution-lock:';

export type LockResult<T> = { acquired: true; value: T } | { acquired: false };

/**
 * Mutual exclusion per execution id. `withLock` never waits: when another
 * holder has the lock it returns `{ acquired: false }` straight away.
 */
export interface ExecutionLock {
    withLock<T>(executionId: string, fn: () => Promise<T>): Promise<LockResult<T>>;
}

export class RedisExecutionLock implements ExecutionLock {
    constructor(
        private readonly redis: Redis,
        private readonly ttlMs = 60_000,
    ) { }

    async withLock<T>(executionId: string, fn: () => Promise<T>): Promise<LockResult<T>> {
        const lease = new RedisLease(this.redis, KEY_PREFIX + executionId, uuid(), this.ttlMs);
        if (!await lease.acquire()) return { acquired: false };

        // A long driver call keeps the lock
        lease.keepAlive(() => console.warn(`${TAG} lost lock for execution ${executionId}`));
        try {
            return { acquired: true, value: await fn() };
        } finally {
            await lease.release();
        }
    }
}

/** Single-process lock, for one engine process or tests. */
export class InProcessExecutionLock implements ExecutionLock {
    private readonly held = new Set<string>();

    async withLock<T>(executionId: string, fn: () => Promise<T>): Promise<LockResult<T>> {
        if (this.held.has(executionId)) return { acquired: false };
        this.held.add(executionId);
        try {
            return { acquired: true, value: await fn() };
        } finally {
            this.held.delete(executionId);
        }
    }
}
