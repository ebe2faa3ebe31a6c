import { Redis } from 'ioredis';
import { executionStatus } from '../db/execution.entity';
import { stepStatus } from '../db/execution_step.entity';
import { Queryable } from '../db/transaction.manager';
import { LeaderElector } from './leader-elector';

const TAG = '[reaper]';

const ACTIVE = [
    executionStatus.PENDING,
    executionStatus.SCHEDULED,
    executionStatus.RUNNING,
    executionStatus.AWAITING_APPROVAL,
];

export interface ReapedExecution {
    id: string;
    recovery_count: number;
    action: 'released' | 'failed';
}

export interface ReaperOptions {
    staleThresholdSeconds?: number;
    intervalMs?: number;
    maxRecoveries?: number;
    workerId?: string;
}

// Recovers executions held by dead workers. Only the Redis-elected leader
// reaps, so two instances never release the same claim twice.
export class Reaper {
    private readonly intervalMs: number;
    private readonly staleThresholdSeconds: number;
    private readonly maxRecoveries: number;
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;
    private leaderElector: LeaderElector;

    constructor(
        private readonly pool: Queryable,
        redis: Redis,
        options: ReaperOptions = {},
    ) {
        this.staleThresholdSeconds = options.staleThresholdSeconds ?? 300;
        this.intervalMs = options.intervalMs ?? 10_000;
        this.maxRecoveries = options.maxRecoveries ?? 3;
        this.leaderElector = new LeaderElector(redis, options.workerId);
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }

        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms, stale threshold: ${this.staleThresholdSeconds}s)`);

        // Fire immediately, then on schedule
        this.tick();
        this.intervalHandle = setInterval(() => this.tick(), this.intervalMs);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leaderElector.releaseLeadership();
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    // Followers keep trying for leadership so a dead leader is replaced.
    private tick(): void {
        this.leaderElector.tryBecomeLeader()
            .then(isLeader => (isLeader ? this.reap() : []))
            .catch(err => console.error(`${TAG} leader election failed:`, err));
    }

    async reap(): Promise<ReapedExecution[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        const reaped: ReapedExecution[] = [];

        try {
            reaped.push(...await this.releaseStaleClaims());
            reaped.push(...await this.failExhaustedExecutions());

            if (reaped.length > 0) {
                console.log(`${TAG} reaped ${reaped.length} executions: ${reaped.map(e => `${e.id}(${e.action})`).join(', ')}`);
            }
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
        } finally {
            this.isReaping = false;
        }

        return reaped;
    }

    // The next worker to claim a released execution fails its interrupted step.
    private async releaseStaleClaims(): Promise<ReapedExecution[]> {
        const res = await this.pool.query<{ id: string; recovery_count: number }>(
            `UPDATE executions
             SET worker_id = NULL, heartbeat_at = NULL, recovery_count = recovery_count + 1, updated_at = NOW()
             WHERE worker_id IS NOT NULL
               AND status = ANY($1)
               AND heartbeat_at < NOW() - (INTERVAL '1 second' * $2)
               AND recovery_count < $3
             RETURNING id, recovery_count`,
            [ACTIVE, this.staleThresholdSeconds, this.maxRecoveries],
        );

        return res.rows.map(row => ({ id: row.id, recovery_count: row.recovery_count, action: 'released' as const }));
    }

    private async failExhaustedExecutions(): Promise<ReapedExecution[]> {
        const res = await this.pool.query<{ id: string; recovery_count: number }>(
            `UPDATE executions
             SET status = $1,
                 failure_reason = 'Execution exceeded ' || $4 || ' recoveries after worker failure',
                 worker_id = NULL,
                 completed_at = NOW(),
                 updated_at = NOW()
             WHERE worker_id IS NOT NULL
               AND status = ANY($2)
               AND heartbeat_at < NOW() - (INTERVAL '1 second' * $3)
               AND recovery_count >= $4
             RETURNING id, recovery_count`,
            [executionStatus.FAILED, ACTIVE, this.staleThresholdSeconds, this.maxRecoveries],
        );

        const ids = res.rows.map(row => row.id);
        if (ids.length > 0) {
            await this.pool.query(
                `UPDATE execution_steps
                 SET status = $1, error_kind = 'DriverError', error_message = 'interrupted: worker failed repeatedly', completed_at = NOW()
                 WHERE status = $2 AND execution_id = ANY($3)`,
                [stepStatus.FAILED, stepStatus.RUNNING, ids],
            );
        }

        return res.rows.map(row => ({ id: row.id, recovery_count: row.recovery_count, action: 'failed' as const }));
    }
}
