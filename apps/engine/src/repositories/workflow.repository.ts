import { Pool } from 'pg';
import {
    NewWorkflow,
    NewWorkflowStep,
    WorkflowEntity,
    WorkflowStepEntity,
    WorkflowWithSteps,
    failurePolicy,
    stepType,
} from '../db/workflow.entity';
import { PG_UNIQUE_VIOLATION, pgErrorCode } from '../db';
import { Queryable, TransactionManager } from '../db/transaction.manager';
import { DuplicateStepOrderError, WorkflowDefinitionError } from '../errors/catalog.error';

export interface WorkflowRepository {
    findById(id: string): Promise<WorkflowWithSteps | null>;
    findByName(name: string): Promise<WorkflowWithSteps | null>;
}

const TASK_BOUND: ReadonlySet<stepType> = new Set([stepType.TASK, stepType.VALIDATION]);

/**
 * Checks a set of steps before they are stored: positive, unique orders,
 * names usable as a context key (condition results land at
 * `conditions.<name>`) and a task binding on every task or validation step.
 */
export function validateWorkflowDefinition(steps: NewWorkflowStep[]): void {
    const seen = new Set<number>();
    for (const step of steps) {
        if (step.name === '' || step.name !== step.name.trim() || step.name.includes('.')) {
            throw new WorkflowDefinitionError(`Step name "${step.name}" is not a valid context key; names must be non-empty, have no surrounding spaces and contain no dots`);
        }
        if (!Number.isInteger(step.step_order) || step.step_order <= 0) {
            throw new WorkflowDefinitionError(`Step "${step.name}" has invalid order ${step.step_order}; orders must be positive integers`);
        }
        if (seen.has(step.step_order)) {
            throw new WorkflowDefinitionError(`Duplicate step order ${step.step_order}`);
        }
        seen.add(step.step_order);

        if (TASK_BOUND.has(step.step_type) && !step.task_id) {
            throw new WorkflowDefinitionError(`Step "${step.name}" of type ${step.step_type} needs a task`);
        }
    }
}

export class PgWorkflowRepository implements WorkflowRepository {
    constructor(private readonly pool: Queryable) { }

    async create(input: NewWorkflow, db: Queryable = this.pool): Promise<WorkflowEntity> {
        const res = await db.query<WorkflowEntity>(
            `INSERT INTO workflows (name, description, enabled, approval_required, schedule_allowed, input_schema, default_inputs)
             VALUES ($1, $2, $3, $4, $5, $6, $7)
             RETURNING *`,
            [
                input.name,
                input.description ?? '',
                input.enabled ?? true,
                input.approval_required ?? false,
                input.schedule_allowed ?? false,
                input.input_schema ? JSON.stringify(input.input_schema) : null,
                JSON.stringify(input.default_inputs ?? {}),
            ],
        );
        return res.rows[0];
    }

    async addStep(workflowId: string, step: NewWorkflowStep, db: Queryable = this.pool): Promise<WorkflowStepEntity> {
        validateWorkflowDefinition([step]);

        try {
            const res = await db.query<WorkflowStepEntity>(
                `INSERT INTO workflow_steps
                    (workflow_id, step_order, name, step_type, task_id, input_mapping, output_mapping, condition, on_failure, config)
                 VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
                 RETURNING *`,
                [
                    workflowId,
                    step.step_order,
                    step.name,
                    step.step_type,
                    step.task_id ?? null,
                    JSON.stringify(step.input_mapping ?? {}),
                    JSON.stringify(step.output_mapping ?? {}),
                    step.condition ?? null,
                    step.on_failure ?? failurePolicy.STOP,
                    JSON.stringify(step.config ?? {}),
                ],
            );
            return res.rows[0];
        } catch (err) {
            if (pgErrorCode(err) === PG_UNIQUE_VIOLATION) {
                throw new DuplicateStepOrderError(workflowId, step.step_order);
            }
            throw err;
        }
    }

    async findById(id: string): Promise<WorkflowWithSteps | null> {
        const res = await this.pool.query<WorkflowEntity>('SELECT * FROM workflows WHERE id = $1', [id]);
        const workflow = res.rows[0];
        return workflow ? this.withSteps(workflow) : null;
    }

    async findByName(name: string): Promise<WorkflowWithSteps | null> {
        const res = await this.pool.query<WorkflowEntity>('SELECT * FROM workflows WHERE name = $1', [name]);
        const workflow = res.rows[0];
        return workflow ? this.withSteps(workflow) : null;
    }

    private async withSteps(workflow: WorkflowEntity): Promise<WorkflowWithSteps> {
        const res = await this.pool.query<WorkflowStepEntity>(
            'SELECT * FROM workflow_steps WHERE workflow_id = $1 ORDER BY step_order ASC',
            [workflow.id],
        );
        return { ...workflow, steps: res.rows };
    }
}

/** Stores a workflow and its steps in one transaction. */
export async function createWorkflowWithSteps(
    pool: Pool,
    workflow: NewWorkflow,
    steps: NewWorkflowStep[],
): Promise<WorkflowWithSteps> {
    validateWorkflowDefinition(steps);

    return new TransactionManager(pool).run(async (client) => {
        const repo = new PgWorkflowRepository(client);
        const created = await repo.create(workflow);
        const stored: WorkflowStepEntity[] = [];
        for (const step of [...steps].sort((a, b) => a.step_order - b.step_order)) {
            stored.push(await repo.addStep(created.id, step));
        }
        return { ...created, steps: stored };
    });
}
