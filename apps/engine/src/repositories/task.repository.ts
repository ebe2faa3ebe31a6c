import { JsonObject } from '@fabricflow/sdk';
import { PG_FOREIGN_KEY_VIOLATION, pgErrorCode } from '../db';
import { TaskDefinitionEntity, TaskImplementationEntity } from '../db/task.entity';
import { Queryable } from '../db/transaction.manager';
import { TaskDefinitionInUseError } from '../errors/catalog.error';

export interface TaskRepository {
    findDefinitionById(id: string): Promise<TaskDefinitionEntity | null>;
    listImplementations(taskId: string): Promise<TaskImplementationEntity[]>;
}

export interface NewTaskDefinition {
    name: string;
    category?: string;
    description?: string;
    input_schema?: JsonObject | null;
    output_schema?: JsonObject | null;
}

export type NewTaskImplementation = Pick<TaskImplementationEntity, 'task_id' | 'name' | 'manufacturer' | 'implementation_type'> &
    Partial<Omit<TaskImplementationEntity, 'id' | 'task_id' | 'name' | 'manufacturer' | 'implementation_type'>>;

export class PgTaskRepository implements TaskRepository {
    constructor(private readonly pool: Queryable) { }

    async createDefinition(input: NewTaskDefinition): Promise<TaskDefinitionEntity> {
        const res = await this.pool.query<TaskDefinitionEntity>(
            `INSERT INTO task_definitions (name, category, description, input_schema, output_schema)
             VALUES ($1, $2, $3, $4, $5)
             RETURNING *`,
            [
                input.name,
                input.category ?? 'general',
                input.description ?? '',
                input.input_schema ? JSON.stringify(input.input_schema) : null,
                input.output_schema ? JSON.stringify(input.output_schema) : null,
            ],
        );
        return res.rows[0];
    }

    async findDefinitionById(id: string): Promise<TaskDefinitionEntity | null> {
        const res = await this.pool.query<TaskDefinitionEntity>('SELECT * FROM task_definitions WHERE id = $1', [id]);
        return res.rows[0] || null;
    }

    async deleteDefinition(id: string): Promise<boolean> {
        try {
            const res = await this.pool.query('DELETE FROM task_definitions WHERE id = $1', [id]);
            return (res.rowCount ?? 0) > 0;
        } catch (err) {
            if (pgErrorCode(err) === PG_FOREIGN_KEY_VIOLATION) {
                throw new TaskDefinitionInUseError(id);
            }
            throw err;
        }
    }

    async createImplementation(input: NewTaskImplementation): Promise<TaskImplementationEntity> {
        const res = await this.pool.query<TaskImplementationEntity>(
            `INSERT INTO task_implementations
                (task_id, name, manufacturer, platform, software_versions, implementation_type,
                 template_content, action_config, provider_definition_id, provider_instance_id, priority, enabled)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
             RETURNING *`,
            [
                input.task_id,
                input.name,
                input.manufacturer,
                input.platform ?? null,
                input.software_versions ?? [],
                input.implementation_type,
                input.template_content ?? '',
                JSON.stringify(input.action_config ?? {}),
                input.provider_definition_id ?? null,
                input.provider_instance_id ?? null,
                input.priority ?? 0,
                input.enabled ?? true,
            ],
        );
        return res.rows[0];
    }

    async listImplementations(taskId: string): Promise<TaskImplementationEntity[]> {
        const res = await this.pool.query<TaskImplementationEntity>(
            'SELECT * FROM task_implementations WHERE task_id = $1',
            [taskId],
        );
        return res.rows;
    }
}
