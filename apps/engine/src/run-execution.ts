import { ExecutionEntity } from './db/execution.entity';
import { ExecutionRepository } from './repositories/execution.repository';
import { ExecutionEngine } from './services/execution-engine';
import { HeartbeatService } from './services/heartbeat.service';

const TAG = '[engine]';

/**
 * Drives a claimed execution until it stops making progress, then hands the
 * claim back so a later poll (or another worker) picks up waits, approvals
 * and lock conflicts.
 */
export async function runExecution(
    engine: ExecutionEngine,
    heartbeat: HeartbeatService,
    executions: Pick<ExecutionRepository, 'release'>,
    workerId: string,
    execution: ExecutionEntity,
): Promise<void> {
    console.log(`${TAG} processing execution ${execution.id} (${execution.status})`);
    heartbeat.start(execution.id);

    try {
        const result = await engine.run(execution.id);
        if (result.outcome === 'conflict') {
            console.warn(`${TAG} execution ${execution.id} not advanced: ${result.reason}`);
        } else {
            console.log(`${TAG} execution ${execution.id} stopped at ${result.outcome} (${result.execution.status})`);
        }
    } catch (err) {
        console.error(`${TAG} execution ${execution.id} errored:`, err);
        throw err;
    } finally {
        heartbeat.stop(execution.id);
        await executions.release(execution.id, workerId);
    }
}
