/**
 * Database connection management for Postgres and Redis.
 */
import Redis from 'ioredis';
import { Pool } from 'pg';
import { EngineConfig } from '../config';

/**
 * Postgres connection pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(config: Pick<EngineConfig, 'databaseUrl'>): Pool {
    return new Pool({
        connectionString: config.databaseUrl,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Redis client for execution locks and reaper leader election */
export function createRedis(config: Pick<EngineConfig, 'redisUrl'>): Redis {
    return new Redis(config.redisUrl);
}

/** pg error codes the repositories translate into domain errors. */
export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';

export function pgErrorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}
