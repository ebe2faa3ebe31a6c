import { ExecutionEntity, NewExecution, executionStatus } from '../db/execution.entity';
import { Queryable } from '../db/transaction.manager';

export type ExecutionPatch = Partial<Pick<ExecutionEntity,
    | 'context'
    | 'requested_operation'
    | 'approved_by'
    | 'started_at'
    | 'completed_at'
    | 'wake_at'
    | 'skip_remaining_after'
    | 'failure_reason'>>;

export interface ExecutionRepository {
    create(input: NewExecution): Promise<ExecutionEntity>;
    findById(id: string, db?: Queryable): Promise<ExecutionEntity | null>;
    update(id: string, patch: ExecutionPatch, db?: Queryable): Promise<void>;
    /**
     * Moves the execution to `to` only while its status is one of `from`.
     * Returns the updated row, or null when the status had already moved on.
     */
    transition(id: string, from: executionStatus[], to: executionStatus, patch?: ExecutionPatch, db?: Queryable): Promise<ExecutionEntity | null>;
    /** Sets approved_by unless someone already approved. Returns whether it was written. */
    recordApproval(id: string, approvedBy: string): Promise<boolean>;
    claim(batchSize: number, workerId: string): Promise<ExecutionEntity[]>;
    release(id: string, workerId: string): Promise<void>;
    updateHeartbeat(id: string): Promise<void>;
}

// JSONB columns are written as JSON text: pg would turn a JS array into a
// Postgres array literal otherwise.
const JSON_COLUMNS = new Set(['context', 'inputs', 'targets']);

function patchClauses(patch: ExecutionPatch, startIndex: number): { sql: string[]; values: unknown[] } {
    const sql: string[] = [];
    const values: unknown[] = [];
    for (const [column, value] of Object.entries(patch)) {
        if (value === undefined) continue;
        values.push(JSON_COLUMNS.has(column) ? JSON.stringify(value) : value);
        sql.push(`${column} = $${startIndex + values.length - 1}`);
    }
    return { sql, values };
}

export class PgExecutionRepository implements ExecutionRepository {
    constructor(private readonly pool: Queryable) { }

    async create(input: NewExecution): Promise<ExecutionEntity> {
        const res = await this.pool.query<ExecutionEntity>(
            `INSERT INTO executions
                (workflow_id, status, inputs, context, targets, requested_operation, requested_by, scheduled_for)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             RETURNING *`,
            [
                input.workflow_id,
                input.status,
                JSON.stringify(input.inputs),
                JSON.stringify(input.context),
                JSON.stringify(input.targets),
                input.requested_operation,
                input.requested_by,
                input.scheduled_for,
            ],
        );
        return res.rows[0];
    }

    async findById(id: string, db: Queryable = this.pool): Promise<ExecutionEntity | null> {
        const res = await db.query<ExecutionEntity>('SELECT * FROM executions WHERE id = $1', [id]);
        return res.rows[0] || null;
    }

    async update(id: string, patch: ExecutionPatch, db: Queryable = this.pool): Promise<void> {
        const { sql, values } = patchClauses(patch, 2);
        if (sql.length === 0) return;
        await db.query(
            `UPDATE executions SET ${sql.join(', ')}, updated_at = NOW() WHERE id = $1`,
            [id, ...values],
        );
    }

    async transition(
        id: string,
        from: executionStatus[],
        to: executionStatus,
        patch: ExecutionPatch = {},
        db: Queryable = this.pool,
    ): Promise<ExecutionEntity | null> {
        const { sql, values } = patchClauses(patch, 4);
        const extra = sql.length > 0 ? `, ${sql.join(', ')}` : '';
        const res = await db.query<ExecutionEntity>(
            `UPDATE executions
             SET status = $2, updated_at = NOW()${extra}
             WHERE id = $1 AND status = ANY($3)
             RETURNING *`,
            [id, to, from, ...values],
        );
        return res.rows[0] || null;
    }

    async recordApproval(id: string, approvedBy: string): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE executions SET approved_by = $2, updated_at = NOW()
             WHERE id = $1 AND approved_by IS NULL`,
            [id, approvedBy],
        );
        return (res.rowCount ?? 0) > 0;
    }

    // Claims pending work, scheduled work that is due, and running work that
    // nobody holds and that is not parked on a wait step.
    async claim(batchSize: number, workerId: string): Promise<ExecutionEntity[]> {
        const query = `
            WITH next_executions AS (
                SELECT id FROM executions
                WHERE worker_id IS NULL
                  AND (
                        status = $1
                     OR (status = $2 AND scheduled_for <= NOW())
                     OR (status = $3 AND (wake_at IS NULL OR wake_at <= NOW()))
                  )
                ORDER BY created_at ASC
                LIMIT $4
                FOR UPDATE SKIP LOCKED
            )
            UPDATE executions
            SET
                worker_id = $5,
                heartbeat_at = NOW()
            FROM next_executions
            WHERE executions.id = next_executions.id
            RETURNING executions.*
        `;
        const res = await this.pool.query<ExecutionEntity>(query, [
            executionStatus.PENDING,
            executionStatus.SCHEDULED,
            executionStatus.RUNNING,
            batchSize,
            workerId,
        ]);
        return res.rows;
    }

    async release(id: string, workerId: string): Promise<void> {
        await this.pool.query(
            'UPDATE executions SET worker_id = NULL, heartbeat_at = NULL WHERE id = $1 AND worker_id = $2',
            [id, workerId],
        );
    }

    async updateHeartbeat(id: string): Promise<void> {
        await this.pool.query('UPDATE executions SET heartbeat_at = NOW() WHERE id = $1', [id]);
    }
}
