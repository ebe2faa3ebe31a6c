import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import { parseJsonObject, serialize, SerializationError, TargetRef } from '@fabricflow/sdk';
import { isOperation } from '../config';
import { ExecutionEntity } from '../db/execution.entity';
import { ExecutionStepEntity } from '../db/execution_step.entity';
import { WorkflowDefinitionError } from '../errors/catalog.error';
import { ExecutionNotFoundError, ExecutionSubmissionError } from '../errors/execution.error';
import { ExecutionEngine } from '../services/execution-engine';

const TAG = '[grpc]';

interface TargetReference {
    kind: string;
    id: string;
}

interface SubmitExecutionRequest {
    workflow_name: string;
    targets: TargetReference[];
    inputs: Buffer;
    requested_by: string;
    operation: string;
    scheduled_for: string;
}

interface SubmitExecutionResponse {
    execution_id: string;
    status: string;
}

interface ExecutionIdRequest {
    execution_id: string;
}

interface ExecutionStepView {
    id: string;
    order: number;
    step_type: string;
    status: string;
    error_kind: string;
    error_message: string;
    logs: string;
    rendered_content: string;
    outputs: Buffer;
}

interface GetExecutionResponse {
    execution_id: string;
    workflow_id: string;
    status: string;
    requested_operation: string;
    requested_by: string;
    approved_by: string;
    context: Buffer;
    steps: ExecutionStepView[];
}

interface ApproveExecutionRequest {
    execution_id: string;
    approved_by: string;
}

interface RequestOperationRequest {
    execution_id: string;
    operation: string;
}

interface ExecutionStatusResponse {
    execution_id: string;
    status: string;
    changed: boolean;
}

interface AdvanceExecutionResponse {
    outcome: string;
    status: string;
    reason: string;
}

/** A request the handler rejects before it reaches the engine. */
export class InvalidRequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidRequestError';
    }
}

class PreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PreconditionError';
    }
}

const TARGET_KINDS: readonly TargetRef['kind'][] = ['device', 'interface', 'object'];

function toTargetRef(ref: TargetReference): TargetRef {
    const kind = TARGET_KINDS.find(k => k === ref.kind);
    if (!kind || !ref.id) {
        throw new InvalidRequestError(`Invalid target reference ${ref.kind}:${ref.id}`);
    }
    return { kind, id: ref.id };
}

function parseSchedule(raw: string): Date | null {
    if (!raw) return null;
    const date = new Date(raw);
    if (Number.isNaN(date.getTime())) {
        throw new InvalidRequestError(`scheduled_for "${raw}" is not a valid timestamp`);
    }
    return date;
}

export function toStatusCode(err: unknown): grpc.status {
    if (err instanceof ExecutionNotFoundError) return grpc.status.NOT_FOUND;
    if (
        err instanceof ExecutionSubmissionError
        || err instanceof WorkflowDefinitionError
        || err instanceof SerializationError
        || err instanceof InvalidRequestError
    ) {
        return grpc.status.INVALID_ARGUMENT;
    }
    if (err instanceof PreconditionError) return grpc.status.FAILED_PRECONDITION;
    return grpc.status.INTERNAL;
}

function stepView(step: ExecutionStepEntity): ExecutionStepView {
    return {
        id: step.id,
        order: step.step_order,
        step_type: step.step_type,
        status: step.status,
        error_kind: step.error_kind ?? '',
        error_message: step.error_message ?? '',
        logs: step.logs,
        rendered_content: step.rendered_content,
        outputs: Buffer.from(serialize(step.outputs)),
    };
}

function statusResponse(execution: ExecutionEntity, changed: boolean): ExecutionStatusResponse {
    return { execution_id: execution.id, status: execution.status, changed };
}

/**
 * gRPC surface of the execution engine. Payloads cross the wire as bytes:
 * inputs as plain JSON, context and step outputs as superjson.
 */
export class ExecutionServiceImpl {
    constructor(private readonly engine: ExecutionEngine) { }

    private async handle<Req, Res>(
        method: string,
        call: Pick<ServerUnaryCall<Req, Res>, 'request'>,
        callback: sendUnaryData<Res>,
        fn: (request: Req) => Promise<Res>,
    ): Promise<void> {
        let response: Res;
        try {
            response = await fn(call.request);
        } catch (error) {
            const code = toStatusCode(error);
            if (code === grpc.status.INTERNAL) {
                console.error(`${TAG} ${method} error:`, error);
            }
            callback({
                code,
                message: error instanceof Error ? error.message : 'Unknown error',
            });
            return;
        }
        callback(null, response);
    }

    async submitExecution(
        call: Pick<ServerUnaryCall<SubmitExecutionRequest, SubmitExecutionResponse>, 'request'>,
        callback: sendUnaryData<SubmitExecutionResponse>
    ) {
        await this.handle('submitExecution', call, callback, async (request) => {
            const operation = request.operation || undefined;
            if (operation !== undefined && !isOperation(operation)) {
                throw new InvalidRequestError(`Unknown operation "${operation}"`);
            }

            const execution = await this.engine.submit({
                workflowName: request.workflow_name,
                targets: request.targets.map(toTargetRef),
                inputs: parseJsonObject(request.inputs),
                requestedBy: request.requested_by || null,
                operation,
                scheduledFor: parseSchedule(request.scheduled_for),
            });
            return { execution_id: execution.id, status: execution.status };
        });
    }

    async getExecution(
        call: Pick<ServerUnaryCall<ExecutionIdRequest, GetExecutionResponse>, 'request'>,
        callback: sendUnaryData<GetExecutionResponse>
    ) {
        await this.handle('getExecution', call, callback, async ({ execution_id }) => {
            const { execution, steps } = await this.engine.getExecution(execution_id);
            return {
                execution_id: execution.id,
                workflow_id: execution.workflow_id,
                status: execution.status,
                requested_operation: execution.requested_operation,
                requested_by: execution.requested_by ?? '',
                approved_by: execution.approved_by ?? '',
                context: Buffer.from(serialize(execution.context)),
                steps: steps.map(stepView),
            };
        });
    }

    async approveExecution(
        call: Pick<ServerUnaryCall<ApproveExecutionRequest, ExecutionStatusResponse>, 'request'>,
        callback: sendUnaryData<ExecutionStatusResponse>
    ) {
        await this.handle('approveExecution', call, callback, async ({ execution_id, approved_by }) => {
            if (!approved_by) throw new InvalidRequestError('approved_by is required');
            const result = await this.engine.approve(execution_id, approved_by);
            return statusResponse(result.execution, result.changed);
        });
    }

    /** Cancelling a finished execution is a failed precondition. */
    async cancelExecution(
        call: Pick<ServerUnaryCall<ExecutionIdRequest, ExecutionStatusResponse>, 'request'>,
        callback: sendUnaryData<ExecutionStatusResponse>
    ) {
        await this.handle('cancelExecution', call, callback, async ({ execution_id }) => {
            const result = await this.engine.cancel(execution_id);
            if (!result.changed) {
                throw new PreconditionError(`Execution ${execution_id} is already ${result.execution.status}`);
            }
            return statusResponse(result.execution, true);
        });
    }

    async requestOperation(
        call: Pick<ServerUnaryCall<RequestOperationRequest, ExecutionStatusResponse>, 'request'>,
        callback: sendUnaryData<ExecutionStatusResponse>
    ) {
        await this.handle('requestOperation', call, callback, async ({ execution_id, operation }) => {
            if (!isOperation(operation)) throw new InvalidRequestError(`Unknown operation "${operation}"`);
            const result = await this.engine.requestOperation(execution_id, operation);
            return statusResponse(result.execution, result.changed);
        });
    }

    async advanceExecution(
        call: Pick<ServerUnaryCall<ExecutionIdRequest, AdvanceExecutionResponse>, 'request'>,
        callback: sendUnaryData<AdvanceExecutionResponse>
    ) {
        await this.handle('advanceExecution', call, callback, async ({ execution_id }) => {
            const result = await this.engine.advance(execution_id);
            if (result.outcome === 'conflict') {
                throw new PreconditionError(`Execution ${execution_id} cannot advance: ${result.reason}`);
            }
            return {
                outcome: result.outcome,
                status: result.execution.status,
                reason: result.outcome === 'suspended' ? result.reason : '',
            };
        });
    }
}
