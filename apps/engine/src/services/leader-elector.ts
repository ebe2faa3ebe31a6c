import { Redis } from 'ioredis';
import { RedisLease } from './redis-lease';

export const LEADER_KEY = 'fabricflow:reaper:leader';

const TAG = '[leader]';

/** Reaper leadership: whichever worker holds LEADER_KEY reaps. */
export class LeaderElector {
    readonly workerId: string;
    private readonly lease: RedisLease;

    constructor(redis: Redis, workerId?: string, ttlSeconds = 30) {
        this.workerId = workerId || `worker-${process.pid}-${Date.now()}`;
        this.lease = new RedisLease(redis, LEADER_KEY, this.workerId, ttlSeconds * 1000);
    }

    async tryBecomeLeader(): Promise<boolean> {
        if (!await this.lease.acquire()) return false;
        this.lease.keepAlive(() => console.warn(`${TAG} ${this.workerId} lost reaper leadership`));
        return true;
    }

    async releaseLeadership(): Promise<void> {
        await this.lease.release();
    }

    isLeader(): Promise<boolean> {
        return this.lease.isHeld();
    }
}
