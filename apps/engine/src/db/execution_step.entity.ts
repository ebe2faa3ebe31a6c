import { JsonObject } from '@fabricflow/sdk';
import { stepType } from './workflow.entity';
import { StepErrorKind } from '../errors/step.error';

export enum stepStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    COMPLETED = 'completed',
    FAILED = 'failed',
    SKIPPED = 'skipped'
}

/**
 * Record of one workflow step having run within one execution.
 * `step_order` is the dense 1-based position of the workflow step.
 */
export interface ExecutionStepEntity {
    id: string;
    execution_id: string;
    workflow_step_id: string;
    step_order: number;
    name: string;
    step_type: stepType;
    status: stepStatus;
    task_implementation_id: string | null;
    provider_instance_id: string | null;
    rendered_content: string;
    inputs: JsonObject;
    outputs: JsonObject;
    logs: string;
    error_message: string | null;
    error_kind: StepErrorKind | null;
    resume_at: Date | null;
    started_at: Date | null;
    completed_at: Date | null;
}

export type NewExecutionStep = Omit<ExecutionStepEntity, 'id'>;

/** Fields written when a step reaches a final state. */
export interface StepFinalization {
    status: stepStatus.COMPLETED | stepStatus.FAILED | stepStatus.SKIPPED;
    task_implementation_id?: string | null;
    provider_instance_id?: string | null;
    rendered_content?: string;
    inputs?: JsonObject;
    outputs?: JsonObject;
    logs?: string;
    error_message?: string | null;
    error_kind?: StepErrorKind | null;
}
