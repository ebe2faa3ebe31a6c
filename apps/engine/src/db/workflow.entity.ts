import { JsonObject } from '@fabricflow/sdk';

export enum stepType {
    TASK = 'task',
    VALIDATION = 'validation',
    APPROVAL = 'approval',
    CONDITION = 'condition',
    NOTIFICATION = 'notification',
    WAIT = 'wait'
}

export enum failurePolicy {
    STOP = 'stop',
    CONTINUE = 'continue',
    SKIP_REMAINING = 'skip_remaining'
}

export interface WorkflowEntity {
    id: string;
    name: string;
    description: string;
    enabled: boolean;
    approval_required: boolean;
    schedule_allowed: boolean;
    input_schema: JsonObject | null;
    default_inputs: JsonObject;
    created_at: Date;
    updated_at: Date;
}

/**
 * input_mapping: input name → context path (required) or
 * `{ "from": path, "default": value }` (optional).
 * output_mapping: destination context path → path inside the step output.
 */
export interface WorkflowStepEntity {
    id: string;
    workflow_id: string;
    step_order: number;
    name: string;
    step_type: stepType;
    task_id: string | null;
    input_mapping: JsonObject;
    output_mapping: JsonObject;
    condition: string | null;
    on_failure: failurePolicy;
    config: JsonObject;
}

export interface WorkflowWithSteps extends WorkflowEntity {
    steps: WorkflowStepEntity[];  // ascending step_order
}

export type NewWorkflow = Pick<WorkflowEntity, 'name'> & Partial<Omit<WorkflowEntity, 'id' | 'name' | 'created_at' | 'updated_at'>>;
export type NewWorkflowStep = Pick<WorkflowStepEntity, 'step_order' | 'name' | 'step_type'> &
    Partial<Omit<WorkflowStepEntity, 'id' | 'workflow_id' | 'step_order' | 'name' | 'step_type'>>;
