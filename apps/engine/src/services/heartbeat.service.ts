import { ExecutionRepository } from '../repositories/execution.repository';

const TAG = '[heartbeat]';

/**
 * Keeps heartbeat_at fresh for every execution this worker holds, so the
 * reaper can tell a live worker from a dead one.
 */
export class HeartbeatService {
    private readonly intervalMs: number;
    private readonly handles = new Map<string, NodeJS.Timeout>();

    constructor(
        private readonly executions: Pick<ExecutionRepository, 'updateHeartbeat'>,
        intervalMs: number = 5000,
    ) {
        this.intervalMs = intervalMs;
    }

    start(executionId: string): void {
        if (this.handles.has(executionId)) {
            console.warn(`${TAG} already running for execution ${executionId}`);
            return;
        }

        this.tick(executionId);
        this.handles.set(executionId, setInterval(() => this.tick(executionId), this.intervalMs));
    }

    stop(executionId: string): void {
        const handle = this.handles.get(executionId);
        if (handle) {
            clearInterval(handle);
            this.handles.delete(executionId);
        }
    }

    stopAll(): void {
        for (const handle of this.handles.values()) clearInterval(handle);
        this.handles.clear();
    }

    isRunning(executionId: string): boolean {
        return this.handles.has(executionId);
    }

    get activeCount(): number {
        return this.handles.size;
    }

    private tick(executionId: string): void {
        this.executions.updateHeartbeat(executionId).catch(
            err => console.error(`${TAG} failed to update for execution ${executionId}:`, err),
        );
    }
}
