export class ExecutionNotFoundError extends Error {
    constructor(public readonly executionId: string) {
        super(`Execution ${executionId} not found`);
        this.name = 'ExecutionNotFoundError';
    }
}

export type SubmissionErrorKind =
    | 'WorkflowUnavailable'
    | 'InputMissing'
    | 'InputInvalid'
    | 'TargetUnresolved'
    | 'ScheduleNotAllowed';

/** Intake rejected the request; nothing was persisted. */
export class ExecutionSubmissionError extends Error {
    constructor(public readonly kind: SubmissionErrorKind, message: string) {
        super(message);
        this.name = 'ExecutionSubmissionError';
    }
}
