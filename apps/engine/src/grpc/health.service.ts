import { ServerUnaryCall, sendUnaryData, ServerWritableStream } from '@grpc/grpc-js';
import Redis from 'ioredis';
import { Queryable } from '../db/transaction.manager';

export interface HealthCheckRequest {
    service: string;
}

export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckResponse {
    status: ServingStatus;
}

/**
 * Standard gRPC health check service implementation.
 * Verifies Postgres and Redis connectivity.
 */
export class HealthService {
    constructor(
        private readonly pool: Queryable,
        private readonly redis: Pick<Redis, 'ping'>,
    ) { }

    async status(): Promise<ServingStatus> {
        try {
            await this.pool.query('SELECT 1');
            await this.redis.ping();
            return 'SERVING';
        } catch (error) {
            console.error('[grpc] health check failed:', error);
            return 'NOT_SERVING';
        }
    }

    async check(
        _call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>
    ) {
        callback(null, { status: await this.status() });
    }

    async watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>) {
        call.write({ status: await this.status() });
        call.end();
    }
}
