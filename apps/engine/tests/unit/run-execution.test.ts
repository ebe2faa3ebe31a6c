import { executionStatus } from '../../src/db/execution.entity';
import { stepType } from '../../src/db/workflow.entity';
import { runExecution } from '../../src/run-execution';
import { HeartbeatService } from '../../src/services/heartbeat.service';
import { execution, workflow } from '../helpers/fixtures';
import { Harness, createHarness } from '../helpers/harness';

describe('runExecution', () => {
    let h: Harness;
    let heartbeat: HeartbeatService;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        h = createHarness();
        heartbeat = new HeartbeatService(h.executions, 1000);
        h.workflows.add(workflow([{ step_order: 1, name: 'push', step_type: stepType.TASK }]));
    });

    afterEach(() => {
        heartbeat.stopAll();
        jest.restoreAllMocks();
    });

    it('drives a claimed execution to the end and hands the claim back', async () => {
        const created = await h.submit({ inputs: { vlan: 10 } });
        const [claimed] = await h.executions.claim(1, 'worker-1');

        await runExecution(h.engine, heartbeat, h.executions, 'worker-1', claimed);

        const row = h.executions.rows.get(created.id);
        expect(row?.status).toBe(executionStatus.COMPLETED);
        expect(row?.worker_id).toBeNull();
        expect(heartbeat.activeCount).toBe(0);
    });

    it('releases a waiting execution so a later poll resumes it', async () => {
        h.workflows.add(workflow([{ step_order: 1, name: 'pause', step_type: stepType.WAIT, config: { delay_seconds: 60 } }], {
            id: 'wf-2',
            name: 'paced',
        }));
        const created = await h.submit({ workflowName: 'paced' });
        const [claimed] = await h.executions.claim(1, 'worker-1');

        await runExecution(h.engine, heartbeat, h.executions, 'worker-1', claimed);

        expect(h.executions.rows.get(created.id)).toMatchObject({ status: executionStatus.RUNNING, worker_id: null });
        expect(await h.executions.claim(1, 'worker-2')).toEqual([]);

        h.advanceClock(60_000);
        expect(await h.executions.claim(1, 'worker-2')).toHaveLength(1);
    });

    it('rethrows engine errors after cleaning up', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const release = jest.fn().mockResolvedValue(undefined);

        await expect(runExecution(h.engine, heartbeat, { release }, 'worker-1', execution({ id: 'ghost' })))
            .rejects.toMatchObject({ name: 'ExecutionNotFoundError' });

        expect(error).toHaveBeenCalled();
        expect(release).toHaveBeenCalledWith('ghost', 'worker-1');
        expect(heartbeat.isRunning('ghost')).toBe(false);
    });
});
