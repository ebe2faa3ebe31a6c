import { ExecutionStepEntity, NewExecutionStep, StepFinalization } from '../db/execution_step.entity';
import { Queryable } from '../db/transaction.manager';

export interface ExecutionStepRepository {
    listByExecution(executionId: string, db?: Queryable): Promise<ExecutionStepEntity[]>;
    create(step: NewExecutionStep, db?: Queryable): Promise<ExecutionStepEntity>;
    finalize(id: string, result: StepFinalization, db?: Queryable): Promise<ExecutionStepEntity>;
    setResumeAt(id: string, resumeAt: Date, db?: Queryable): Promise<void>;
}

const JSON_FIELDS = new Set(['inputs', 'outputs']);

export class PgExecutionStepRepository implements ExecutionStepRepository {
    constructor(private readonly pool: Queryable) { }

    async listByExecution(executionId: string, db: Queryable = this.pool): Promise<ExecutionStepEntity[]> {
        const res = await db.query<ExecutionStepEntity>(
            'SELECT * FROM execution_steps WHERE execution_id = $1 ORDER BY step_order ASC',
            [executionId],
        );
        return res.rows;
    }

    async create(step: NewExecutionStep, db: Queryable = this.pool): Promise<ExecutionStepEntity> {
        const res = await db.query<ExecutionStepEntity>(
            `INSERT INTO execution_steps
                (execution_id, workflow_step_id, step_order, name, step_type, status,
                 task_implementation_id, provider_instance_id, rendered_content, inputs, outputs,
                 logs, error_message, error_kind, resume_at, started_at, completed_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)
             RETURNING *`,
            [
                step.execution_id,
                step.workflow_step_id,
                step.step_order,
                step.name,
                step.step_type,
                step.status,
                step.task_implementation_id,
                step.provider_instance_id,
                step.rendered_content,
                JSON.stringify(step.inputs),
                JSON.stringify(step.outputs),
                step.logs,
                step.error_message,
                step.error_kind,
                step.resume_at,
                step.started_at,
                step.completed_at,
            ],
        );
        return res.rows[0];
    }

    async finalize(id: string, result: StepFinalization, db: Queryable = this.pool): Promise<ExecutionStepEntity> {
        const sets: string[] = [];
        const values: unknown[] = [id];
        for (const [column, value] of Object.entries(result)) {
            if (value === undefined) continue;
            values.push(JSON_FIELDS.has(column) ? JSON.stringify(value) : value);
            sets.push(`${column} = $${values.length}`);
        }

        const res = await db.query<ExecutionStepEntity>(
            `UPDATE execution_steps SET ${sets.join(', ')}, completed_at = NOW() WHERE id = $1 RETURNING *`,
            values,
        );
        const row = res.rows[0];
        if (!row) throw new Error(`Execution step ${id} vanished before finalization`);
        return row;
    }

    async setResumeAt(id: string, resumeAt: Date, db: Queryable = this.pool): Promise<void> {
        await db.query('UPDATE execution_steps SET resume_at = $2 WHERE id = $1', [id, resumeAt]);
    }
}
