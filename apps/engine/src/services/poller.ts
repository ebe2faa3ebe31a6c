import { ExecutionEntity } from '../db/execution.entity';
import { ExecutionRepository } from '../repositories/execution.repository';

const TAG = '[poller]';

export interface PollerConfig {
    workerId: string;
    onExecutionClaimed: (execution: ExecutionEntity) => Promise<void>;
    batchSize?: number;
    checkBackpressure?: () => boolean;
}

export class Poller {
    private interval = 100;
    private readonly minInterval = 100;
    private readonly maxInterval = 500;
    private readonly batchSize: number;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly workerId: string;
    private readonly onExecutionClaimed: (execution: ExecutionEntity) => Promise<void>;
    private readonly checkBackpressure?: () => boolean;

    constructor(
        private readonly executions: Pick<ExecutionRepository, 'claim'>,
        config: PollerConfig,
    ) {
        this.workerId = config.workerId;
        this.onExecutionClaimed = config.onExecutionClaimed;
        this.batchSize = config.batchSize || 10;
        this.checkBackpressure = config.checkBackpressure;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (worker: ${this.workerId})`);
        this.schedule(0);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    private schedule(delayMs: number): void {
        if (!this.running) return;
        this.currentTimeout = setTimeout(() => {
            this.poll().catch(err => console.error(`${TAG} poll loop error:`, err));
        }, delayMs);
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        if (this.checkBackpressure && this.checkBackpressure()) {
            console.warn(`${TAG} backpressure detected, skipping poll`);
            this.schedule(1000);
            return;
        }

        try {
            const executions = await this.executions.claim(this.batchSize, this.workerId);

            if (executions.length > 0) {
                this.interval = this.minInterval;
                for (const execution of executions) {
                    if (!this.running) break;
                    this.onExecutionClaimed(execution).catch(
                        err => console.error(`${TAG} execution ${execution.id} callback error:`, err),
                    );
                }
            } else {
                // backoff: 100 -> 200 -> 400 -> 500ms cap
                this.interval = Math.min(this.interval * 2, this.maxInterval);
            }
        } catch (err) {
            console.error(`${TAG} claim error:`, err);
            this.interval = this.maxInterval;
        }

        this.schedule(this.interval);
    }
}
