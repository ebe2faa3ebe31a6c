import { executionStatus } from '../../src/db/execution.entity';
import { stepStatus } from '../../src/db/execution_step.entity';
import { stepType } from '../../src/db/workflow.entity';
import { runExecution } from '../../src/run-execution';
import { HeartbeatService } from '../../src/services/heartbeat.service';
import { Poller } from '../../src/services/poller';
import { workflow } from '../helpers/fixtures';
import { Harness, createHarness } from '../helpers/harness';
import { waitUntil } from '../helpers/poll';

describe('poller driving the engine', () => {
    let h: Harness;
    let heartbeat: HeartbeatService;
    let poller: Poller;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        h = createHarness();
        heartbeat = new HeartbeatService(h.executions, 1000);
        poller = new Poller(h.executions, {
            workerId: 'worker-1',
            batchSize: 5,
            onExecutionClaimed: (execution) => runExecution(h.engine, heartbeat, h.executions, 'worker-1', execution),
        });
    });

    afterEach(async () => {
        await poller.stop();
        heartbeat.stopAll();
        jest.restoreAllMocks();
    });

    it('applies an approved rollout end to end', async () => {
        h.workflows.add(workflow([
            { step_order: 1, name: 'preview', step_type: stepType.VALIDATION },
            { step_order: 2, name: 'push', step_type: stepType.TASK },
            { step_order: 3, name: 'tell', step_type: stepType.NOTIFICATION, config: { message: 'vlan {{ inputs.vlan }} rolled out' } },
        ], { approval_required: true }));
        const created = await h.submit({ inputs: { vlan: 10 }, operation: 'apply', requestedBy: 'alice' });

        poller.start();
        await waitUntil(() => h.executions.rows.get(created.id)?.status === executionStatus.AWAITING_APPROVAL, 3000, 20);
        expect(h.lab.calls).toHaveLength(0);

        await h.engine.approve(created.id, 'bob');
        await waitUntil(() => h.executions.rows.get(created.id)?.status === executionStatus.COMPLETED, 3000, 20);

        expect(h.lab.calls.map(call => call.operation)).toEqual(['diff', 'apply']);
        expect((await h.stepsOf(created.id)).map(step => step.status)).toEqual([
            stepStatus.COMPLETED,
            stepStatus.COMPLETED,
            stepStatus.COMPLETED,
        ]);
        expect(h.notifier.sent).toEqual([{ execution_id: created.id, step: 'tell', message: 'vlan 10 rolled out' }]);
        await waitUntil(() => h.executions.rows.get(created.id)?.worker_id === null, 1000, 20);
    });

    it('runs several submitted executions', async () => {
        h.workflows.add(workflow([{ step_order: 1, name: 'push', step_type: stepType.TASK }]));
        const ids: string[] = [];
        for (const vlan of [10, 20, 30]) {
            ids.push((await h.submit({ inputs: { vlan } })).id);
        }

        poller.start();
        await waitUntil(
            () => ids.every(id => h.executions.rows.get(id)?.status === executionStatus.COMPLETED),
            3000,
            20,
        );

        const rendered = await Promise.all(ids.map(async id => (await h.stepsOf(id))[0].rendered_content));
        expect(rendered).toEqual(['vlan 10', 'vlan 20', 'vlan 30']);
    });
});
