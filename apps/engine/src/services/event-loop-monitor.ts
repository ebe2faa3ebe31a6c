import { monitorEventLoopDelay } from 'perf_hooks';

const TAG = '[backpressure]';

export class EventLoopMonitor {
    private monitor: ReturnType<typeof monitorEventLoopDelay>;

    constructor(resolution: number = 10) {
        this.monitor = monitorEventLoopDelay({ resolution });
        this.monitor.enable();
    }

    /** p99 event loop delay in milliseconds */
    get lag(): number {
        return this.monitor.percentile(99) / 1000000;
    }

    disable(): void {
        this.monitor.disable();
    }
}

export interface BackpressureLimits {
    maxInFlight: number;
    maxEventLoopLag: number;
}

/** Tells the poller to skip a round while the worker is saturated. */
export function createBackpressureCheck(
    limits: BackpressureLimits,
    inFlight: () => number,
    lag: () => number,
): () => boolean {
    return () => {
        const current = inFlight();
        if (current >= limits.maxInFlight) {
            console.warn(`${TAG} in-flight executions ${current} >= ${limits.maxInFlight}`);
            return true;
        }
        const delay = lag();
        if (delay >= limits.maxEventLoopLag) {
            console.warn(`${TAG} event loop lag ${delay.toFixed(2)}ms >= ${limits.maxEventLoopLag}ms`);
            return true;
        }
        return false;
    };
}
