export class WorkflowDefinitionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorkflowDefinitionError';
    }
}

export class DuplicateStepOrderError extends WorkflowDefinitionError {
    constructor(public readonly workflowId: string, public readonly order: number) {
        super(`Workflow ${workflowId} already has a step with order ${order}`);
        this.name = 'DuplicateStepOrderError';
    }
}

export class TaskDefinitionInUseError extends Error {
    constructor(public readonly taskId: string) {
        super(`Task definition ${taskId} is referenced by task implementations`);
        this.name = 'TaskDefinitionInUseError';
    }
}
