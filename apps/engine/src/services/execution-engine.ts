import { JsonObject, ProviderOperation, TargetRef } from '@fabricflow/sdk';
import { ExecutionEntity, executionStatus, isTerminal } from '../db/execution.entity';
import { ExecutionStepEntity, NewExecutionStep, stepStatus } from '../db/execution_step.entity';
import { UnitOfWork } from '../db/transaction.manager';
import { WorkflowStepEntity, WorkflowWithSteps, failurePolicy, stepType } from '../db/workflow.entity';
import { WorkflowDefinitionError } from '../errors/catalog.error';
import { ExecutionNotFoundError, ExecutionSubmissionError } from '../errors/execution.error';
import { StepError } from '../errors/step.error';
import { CatalogRepository } from '../repositories/catalog.repository';
import { ExecutionRepository } from '../repositories/execution.repository';
import { ExecutionStepRepository } from '../repositories/execution-step.repository';
import { WorkflowRepository } from '../repositories/workflow.repository';
import { ExecutionLock } from './execution-lock';
import { InputSchemaError, InputValidation, InputValidator } from './input-validator';
import { StepExecutor, StepRecord } from './step-executor';

const TAG = '[engine]';

const ACTIVE = [
    executionStatus.PENDING,
    executionStatus.SCHEDULED,
    executionStatus.RUNNING,
    executionStatus.AWAITING_APPROVAL,
];

export interface SubmitRequest {
    workflowName: string;
    targets: TargetRef[];
    inputs?: JsonObject;
    requestedBy?: string | null;
    operation?: ProviderOperation;
    scheduledFor?: Date | null;
}

export type ConflictResult = { outcome: 'conflict'; execution: ExecutionEntity; reason: string };

export type AdvanceResult =
    | { outcome: 'advanced'; execution: ExecutionEntity; step: ExecutionStepEntity }
    | { outcome: 'waiting'; execution: ExecutionEntity; resumeAt: Date }
    | { outcome: 'suspended'; execution: ExecutionEntity; reason: 'awaiting_approval' }
    | { outcome: 'finished'; execution: ExecutionEntity }
    | ConflictResult;

export type StartResult = { outcome: 'started'; execution: ExecutionEntity } | ConflictResult;

export interface ChangeResult {
    changed: boolean;
    execution: ExecutionEntity;
}

export interface ExecutionView {
    execution: ExecutionEntity;
    steps: ExecutionStepEntity[];
}

export interface ExecutionEngineDeps {
    executions: ExecutionRepository;
    steps: ExecutionStepRepository;
    workflows: WorkflowRepository;
    catalog: CatalogRepository;
    executor: StepExecutor;
    lock: ExecutionLock;
    unitOfWork: UnitOfWork;
    validator: InputValidator;
    defaultOperation?: ProviderOperation;
    now?: () => Date;
}

function recordOf(outcome: StepRecord): StepRecord {
    return {
        inputs: outcome.inputs,
        outputs: outcome.outputs,
        logs: outcome.logs,
        rendered_content: outcome.rendered_content,
        task_implementation_id: outcome.task_implementation_id,
        provider_instance_id: outcome.provider_instance_id,
    };
}

function describeFailure(step: WorkflowStepEntity, error: StepError): string {
    return `Step ${step.step_order} "${step.name}" failed (${error.kind}): ${error.message}`;
}

/**
 * Durable state machine for executions. Every transition is persisted before
 * the call returns, so any process can pick an execution up where another
 * left it. `advance` performs exactly one transition under the
 * per-execution lock.
 */
export class ExecutionEngine {
    private readonly now: () => Date;
    private readonly defaultOperation: ProviderOperation;

    constructor(private readonly deps: ExecutionEngineDeps) {
        this.now = deps.now ?? (() => new Date());
        this.defaultOperation = deps.defaultOperation ?? 'render';
    }

    async submit(request: SubmitRequest): Promise<ExecutionEntity> {
        const workflow = await this.deps.workflows.findByName(request.workflowName);
        if (!workflow || !workflow.enabled) {
            throw new ExecutionSubmissionError('WorkflowUnavailable', `Workflow "${request.workflowName}" does not exist or is disabled`);
        }

        const inputs: JsonObject = { ...workflow.default_inputs, ...(request.inputs ?? {}) };
        let validation: InputValidation;
        try {
            validation = this.deps.validator.validate(workflow.input_schema, inputs);
        } catch (err) {
            if (err instanceof InputSchemaError) throw new WorkflowDefinitionError(`Workflow "${workflow.name}": ${err.message}`);
            throw err;
        }
        if (!validation.ok) {
            if (validation.missing.length > 0) {
                throw new ExecutionSubmissionError('InputMissing', `Missing inputs: ${validation.missing.join(', ')}`);
            }
            throw new ExecutionSubmissionError('InputInvalid', validation.message);
        }

        if (request.targets.length === 0) {
            throw new ExecutionSubmissionError('TargetUnresolved', 'At least one target is required');
        }
        for (const ref of request.targets) {
            if (!await this.deps.catalog.findTarget(ref)) {
                throw new ExecutionSubmissionError('TargetUnresolved', `Target ${ref.kind} ${ref.id} does not exist in the catalog`);
            }
        }

        const scheduledFor = request.scheduledFor ?? null;
        const deferred = scheduledFor !== null && scheduledFor.getTime() > this.now().getTime();
        if (deferred && !workflow.schedule_allowed) {
            throw new ExecutionSubmissionError('ScheduleNotAllowed', `Workflow "${workflow.name}" cannot be scheduled`);
        }

        const operation = request.operation ?? this.defaultOperation;
        const execution = await this.deps.executions.create({
            workflow_id: workflow.id,
            status: deferred ? executionStatus.SCHEDULED : executionStatus.PENDING,
            inputs,
            context: { inputs, operation, meta: { workflow: workflow.name, requested_by: request.requestedBy ?? null } },
            targets: request.targets.map(ref => ({ kind: ref.kind, id: ref.id })),
            requested_operation: operation,
            requested_by: request.requestedBy ?? null,
            scheduled_for: scheduledFor,
        });

        console.log(`${TAG} execution ${execution.id} submitted for workflow ${workflow.name} (${execution.status})`);
        return execution;
    }

    async start(id: string): Promise<StartResult> {
        const execution = await this.load(id);
        const startable = execution.status === executionStatus.PENDING
            || (execution.status === executionStatus.SCHEDULED
                && execution.scheduled_for !== null
                && execution.scheduled_for.getTime() <= this.now().getTime());
        if (!startable) {
            return { outcome: 'conflict', execution, reason: `cannot start from ${execution.status}` };
        }

        const started = await this.deps.executions.transition(id, [execution.status], executionStatus.RUNNING, {
            started_at: execution.started_at ?? this.now(),
        });
        if (!started) {
            return { outcome: 'conflict', execution: await this.load(id), reason: 'status changed concurrently' };
        }
        return { outcome: 'started', execution: started };
    }

    async advance(id: string): Promise<AdvanceResult> {
        const locked = await this.deps.lock.withLock(id, () => this.advanceLocked(id));
        if (!locked.acquired) {
            return { outcome: 'conflict', execution: await this.load(id), reason: 'locked' };
        }
        return locked.value;
    }

    /** Starts the execution when it is startable, then advances until it stops making progress. */
    async run(id: string): Promise<AdvanceResult> {
        const execution = await this.load(id);
        if (execution.status === executionStatus.PENDING || execution.status === executionStatus.SCHEDULED) {
            const started = await this.start(id);
            if (started.outcome === 'conflict') return started;
        }

        let result = await this.advance(id);
        while (result.outcome === 'advanced') {
            result = await this.advance(id);
        }
        return result;
    }

    async approve(id: string, approvedBy: string): Promise<ChangeResult> {
        const execution = await this.load(id);
        if (isTerminal(execution.status)) return { changed: false, execution };

        const recorded = await this.deps.executions.recordApproval(id, approvedBy);
        const resumed = await this.deps.executions.transition(id, [executionStatus.AWAITING_APPROVAL], executionStatus.PENDING);
        if (recorded) console.log(`${TAG} execution ${id} approved by ${approvedBy}`);

        return { changed: recorded || resumed !== null, execution: resumed ?? await this.load(id) };
    }

    async cancel(id: string): Promise<ChangeResult> {
        // A parked wait step is closed with the execution; a step in flight is
        // finalized by the caller running it.
        const cancelled = await this.deps.unitOfWork.run(async (db) => {
            const moved = await this.deps.executions.transition(id, ACTIVE, executionStatus.CANCELLED, {
                completed_at: this.now(),
                wake_at: null,
            }, db);
            if (!moved) return null;
            for (const row of await this.deps.steps.listByExecution(id, db)) {
                if (row.status !== stepStatus.RUNNING || row.step_type !== stepType.WAIT) continue;
                await this.deps.steps.finalize(row.id, {
                    status: stepStatus.SKIPPED,
                    logs: [row.logs, 'cancelled before the step finished'].filter(Boolean).join('\n'),
                }, db);
            }
            return moved;
        });
        if (!cancelled) return { changed: false, execution: await this.load(id) };

        console.log(`${TAG} execution ${id} cancelled`);
        return { changed: true, execution: cancelled };
    }

    /**
     * Records the requested operation. Terminal executions keep their status;
     * an execution waiting for approval goes back to pending.
     */
    async requestOperation(id: string, operation: ProviderOperation): Promise<ChangeResult> {
        const execution = await this.load(id);
        await this.deps.executions.update(id, { requested_operation: operation });

        if (execution.status === executionStatus.AWAITING_APPROVAL) {
            const requeued = await this.deps.executions.transition(id, [executionStatus.AWAITING_APPROVAL], executionStatus.PENDING);
            if (requeued) return { changed: true, execution: requeued };
        }
        return { changed: false, execution: await this.load(id) };
    }

    async getExecution(id: string): Promise<ExecutionView> {
        const execution = await this.load(id);
        const steps = await this.deps.steps.listByExecution(id);
        return { execution, steps };
    }

    private async load(id: string): Promise<ExecutionEntity> {
        const execution = await this.deps.executions.findById(id);
        if (!execution) throw new ExecutionNotFoundError(id);
        return execution;
    }

    private async advanceLocked(id: string): Promise<AdvanceResult> {
        const execution = await this.load(id);
        if (execution.status !== executionStatus.RUNNING) {
            return { outcome: 'conflict', execution, reason: `cannot advance from ${execution.status}` };
        }

        const workflow = await this.deps.workflows.findById(execution.workflow_id);
        if (!workflow) throw new Error(`Workflow ${execution.workflow_id} of execution ${id} no longer exists`);

        const recorded = await this.deps.steps.listByExecution(id);
        const last = recorded[recorded.length - 1];
        if (last && last.status === stepStatus.RUNNING) {
            return this.resumeRunningStep(execution, workflow, last);
        }

        const position = recorded.length + 1;
        const step = workflow.steps[position - 1];
        if (!step) return this.finish(execution, recorded);

        if (execution.skip_remaining_after !== null && step.step_type !== stepType.NOTIFICATION) {
            const skipped = await this.recordSkipped(execution, step, position,
                `skipped after step ${execution.skip_remaining_after} failed`);
            return { outcome: 'advanced', execution, step: skipped };
        }

        if ((step.step_type === stepType.APPROVAL || workflow.approval_required) && !execution.approved_by) {
            const suspended = await this.deps.executions.transition(id, [executionStatus.RUNNING], executionStatus.AWAITING_APPROVAL);
            if (!suspended) return { outcome: 'conflict', execution: await this.load(id), reason: 'status changed concurrently' };
            console.log(`${TAG} execution ${id} awaiting approval before step ${position} "${step.name}"`);
            return { outcome: 'suspended', execution: suspended, reason: 'awaiting_approval' };
        }

        return this.runStep(execution, workflow, step, position);
    }

    private async runStep(
        execution: ExecutionEntity,
        workflow: WorkflowWithSteps,
        step: WorkflowStepEntity,
        position: number,
    ): Promise<AdvanceResult> {
        const row = await this.deps.steps.create({
            execution_id: execution.id,
            workflow_step_id: step.id,
            step_order: position,
            name: step.name,
            step_type: step.step_type,
            status: stepStatus.RUNNING,
            task_implementation_id: null,
            provider_instance_id: null,
            rendered_content: '',
            inputs: {},
            outputs: {},
            logs: '',
            error_message: null,
            error_kind: null,
            resume_at: null,
            started_at: this.now(),
            completed_at: null,
        });

        // The requested_operation column wins over a stale copy in the context.
        const context: JsonObject = { ...execution.context, operation: execution.requested_operation };
        const outcome = await this.deps.executor.execute({ execution, step, context });

        switch (outcome.status) {
            case 'waiting': {
                await this.deps.unitOfWork.run(async (db) => {
                    await this.deps.steps.setResumeAt(row.id, outcome.resumeAt, db);
                    await this.deps.executions.update(execution.id, { wake_at: outcome.resumeAt }, db);
                });
                return { outcome: 'waiting', execution: await this.load(execution.id), resumeAt: outcome.resumeAt };
            }
            case 'completed': {
                const finalized = await this.deps.unitOfWork.run(async (db) => {
                    const saved = await this.deps.steps.finalize(row.id, { status: stepStatus.COMPLETED, ...recordOf(outcome) }, db);
                    await this.deps.executions.update(execution.id, { context: outcome.context }, db);
                    return saved;
                });
                return { outcome: 'advanced', execution: await this.load(execution.id), step: finalized };
            }
            case 'skipped': {
                const finalized = await this.deps.steps.finalize(row.id, {
                    status: stepStatus.SKIPPED,
                    ...recordOf(outcome),
                    logs: [outcome.logs, outcome.reason].filter(Boolean).join('\n'),
                });
                return { outcome: 'advanced', execution, step: finalized };
            }
            case 'failed': {
                const finalized = await this.deps.steps.finalize(row.id, {
                    status: stepStatus.FAILED,
                    ...recordOf(outcome),
                    error_message: outcome.error.message,
                    error_kind: outcome.error.kind,
                });
                return this.applyFailurePolicy(execution, workflow, step, finalized, outcome.error);
            }
        }
    }

    // A step left running by an earlier pass: a due wait completes, anything
    // else was cut off by a crash and fails without being re-run.
    private async resumeRunningStep(
        execution: ExecutionEntity,
        workflow: WorkflowWithSteps,
        row: ExecutionStepEntity,
    ): Promise<AdvanceResult> {
        const step = workflow.steps[row.step_order - 1];
        if (!step) throw new Error(`Execution ${execution.id} has a step at position ${row.step_order} its workflow no longer defines`);

        if (row.step_type === stepType.WAIT && row.resume_at) {
            if (row.resume_at.getTime() > this.now().getTime()) {
                return { outcome: 'waiting', execution, resumeAt: row.resume_at };
            }
            const finalized = await this.deps.unitOfWork.run(async (db) => {
                const saved = await this.deps.steps.finalize(row.id, {
                    status: stepStatus.COMPLETED,
                    logs: `waited until ${row.resume_at?.toISOString()}`,
                }, db);
                await this.deps.executions.update(execution.id, { wake_at: null }, db);
                return saved;
            });
            return { outcome: 'advanced', execution: await this.load(execution.id), step: finalized };
        }

        const error = new StepError('DriverError', 'interrupted: the worker stopped before the step finished; it is not re-run automatically');
        console.warn(`${TAG} execution ${execution.id} step ${row.step_order} "${row.name}" was interrupted`);
        const finalized = await this.deps.steps.finalize(row.id, {
            status: stepStatus.FAILED,
            error_message: error.message,
            error_kind: error.kind,
        });
        return this.applyFailurePolicy(execution, workflow, step, finalized, error);
    }

    private async applyFailurePolicy(
        execution: ExecutionEntity,
        workflow: WorkflowWithSteps,
        step: WorkflowStepEntity,
        row: ExecutionStepEntity,
        error: StepError,
    ): Promise<AdvanceResult> {
        // A failed validation gates everything after it.
        const policy = step.step_type === stepType.VALIDATION ? failurePolicy.STOP : step.on_failure;
        const reason = describeFailure(step, error);

        switch (policy) {
            case failurePolicy.CONTINUE:
                return { outcome: 'advanced', execution, step: row };

            case failurePolicy.SKIP_REMAINING:
                if (execution.skip_remaining_after === null) {
                    await this.deps.executions.update(execution.id, {
                        skip_remaining_after: row.step_order,
                        failure_reason: `${reason}; remaining steps skipped`,
                    });
                }
                return { outcome: 'advanced', execution: await this.load(execution.id), step: row };

            case failurePolicy.STOP: {
                const failed = await this.deps.unitOfWork.run(async (db) => {
                    const moved = await this.deps.executions.transition(
                        execution.id,
                        [executionStatus.RUNNING],
                        executionStatus.FAILED,
                        { completed_at: this.now(), failure_reason: reason },
                        db,
                    );
                    if (!moved) return null;
                    for (let position = row.step_order + 1; position <= workflow.steps.length; position++) {
                        const remaining = workflow.steps[position - 1];
                        await this.deps.steps.create(
                            this.skippedRow(execution, remaining, position, `skipped: step ${row.step_order} failed`),
                            db,
                        );
                    }
                    return moved;
                });
                console.warn(`${TAG} execution ${execution.id} failed: ${reason}`);
                if (!failed) return { outcome: 'conflict', execution: await this.load(execution.id), reason: 'status changed concurrently' };
                return { outcome: 'finished', execution: failed };
            }
        }
    }

    private async finish(execution: ExecutionEntity, recorded: ExecutionStepEntity[]): Promise<AdvanceResult> {
        const cutoff = execution.skip_remaining_after;
        const workSkipped = cutoff !== null && recorded.some(s =>
            s.step_order > cutoff && s.status === stepStatus.SKIPPED && s.step_type !== stepType.NOTIFICATION);

        const finalStatus = workSkipped ? executionStatus.FAILED : executionStatus.COMPLETED;
        const finished = await this.deps.executions.transition(execution.id, [executionStatus.RUNNING], finalStatus, {
            completed_at: this.now(),
            failure_reason: workSkipped ? execution.failure_reason : null,
        });
        if (!finished) return { outcome: 'conflict', execution: await this.load(execution.id), reason: 'status changed concurrently' };

        console.log(`${TAG} execution ${execution.id} ${finalStatus}`);
        return { outcome: 'finished', execution: finished };
    }

    private async recordSkipped(
        execution: ExecutionEntity,
        step: WorkflowStepEntity,
        position: number,
        reason: string,
    ): Promise<ExecutionStepEntity> {
        return this.deps.steps.create(this.skippedRow(execution, step, position, reason));
    }

    private skippedRow(execution: ExecutionEntity, step: WorkflowStepEntity, position: number, reason: string): NewExecutionStep {
        return {
            execution_id: execution.id,
            workflow_step_id: step.id,
            step_order: position,
            name: step.name,
            step_type: step.step_type,
            status: stepStatus.SKIPPED,
            task_implementation_id: null,
            provider_instance_id: null,
            rendered_content: '',
            inputs: {},
            outputs: {},
            logs: reason,
            error_message: null,
            error_kind: null,
            resume_at: null,
            started_at: null,
            completed_at: this.now(),
        };
    }
}
