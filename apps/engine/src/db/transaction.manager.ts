import { Pool, QueryResult, QueryResultRow } from 'pg';

/** Anything that can run a parameterised query: the pool or a transaction client. */
export interface Queryable {
    query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface UnitOfWork {
    run<T>(callback: (client: Queryable) => Promise<T>): Promise<T>;
}

/**
 * Runs multi-statement writes atomically with automatic rollback on errors.
 * The engine commits a step's final record together with the execution's
 * context update through this.
 */
export class TransactionManager implements UnitOfWork {
    constructor(private pool: Pool) { }

    /**
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('UPDATE execution_steps ...');
     *   await client.query('UPDATE executions ...');
     * });
     */
    async run<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
