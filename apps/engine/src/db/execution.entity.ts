import { JsonObject, ProviderOperation, TargetRef } from '@fabricflow/sdk';

/**
 * Lifecycle states for executions.
 * PENDING → RUNNING → AWAITING_APPROVAL / COMPLETED / FAILED / CANCELLED,
 * SCHEDULED → PENDING once due, AWAITING_APPROVAL → PENDING on approval.
 */
export enum executionStatus {
    PENDING = 'pending',
    SCHEDULED = 'scheduled',
    RUNNING = 'running',
    AWAITING_APPROVAL = 'awaiting_approval',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELLED = 'cancelled'
}

const TERMINAL: ReadonlySet<executionStatus> = new Set([
    executionStatus.COMPLETED,
    executionStatus.FAILED,
    executionStatus.CANCELLED,
]);

export function isTerminal(status: executionStatus): boolean {
    return TERMINAL.has(status);
}

/**
 * One run of a workflow against one or more catalog targets.
 * `context` accumulates step outputs and is the scope for conditions,
 * templates and input mappings.
 */
export interface ExecutionEntity {
    id: string;
    workflow_id: string;
    status: executionStatus;
    inputs: JsonObject;
    context: JsonObject;
    targets: TargetRef[];
    requested_operation: ProviderOperation;
    requested_by: string | null;
    approved_by: string | null;
    scheduled_for: Date | null;
    started_at: Date | null;
    completed_at: Date | null;
    wake_at: Date | null;          // wait steps park the execution until this time
    skip_remaining_after: number | null;
    failure_reason: string | null;
    worker_id: string | null;
    heartbeat_at: Date | null;     // For dead worker detection
    recovery_count: number;
    created_at: Date;
    updated_at: Date;
}

export interface NewExecution {
    workflow_id: string;
    status: executionStatus.PENDING | executionStatus.SCHEDULED;
    inputs: JsonObject;
    context: JsonObject;
    targets: TargetRef[];
    requested_operation: ProviderOperation;
    requested_by: string | null;
    scheduled_for: Date | null;
}
