import {
    Credentials,
    DriverNotRegisteredError,
    DriverRegistry,
    HookRegistry,
    JsonObject,
    JsonValue,
    ProviderCapability,
    ProviderDriver,
    ProviderOperation,
    TargetRecord,
    driverRegistry,
    getPath,
    hookRegistry,
    isJsonObject,
    setPath,
} from '@fabricflow/sdk';
import { ExecutionEntity } from '../db/execution.entity';
import { TaskDefinitionEntity, TaskImplementationEntity, implementationType } from '../db/task.entity';
import { WorkflowStepEntity, stepType } from '../db/workflow.entity';
import { StepError } from '../errors/step.error';
import { CatalogRepository } from '../repositories/catalog.repository';
import { TaskRepository } from '../repositories/task.repository';
import { CredentialResolver } from './credentials';
import { ExpressionEvaluator } from './expression-evaluator';
import { ImplementationSelector } from './implementation-selector';
import { InputSchemaError, InputValidation, InputValidator } from './input-validator';
import { resolveIntent, targetFacts, targetName } from './intent-resolver';
import { Notifier } from './notifier';
import { ProviderSelector, ScoredCandidate } from './provider-selector';
import { TemplateRenderError, TemplateRenderer } from './template-renderer';

const TAG = '[step]';

export interface StepRequest {
    execution: ExecutionEntity;
    step: WorkflowStepEntity;
    context: JsonObject;
}

/** What the execution step row records, whatever the outcome. */
export interface StepRecord {
    inputs: JsonObject;
    outputs: JsonObject;
    logs: string;
    rendered_content: string;
    task_implementation_id: string | null;
    provider_instance_id: string | null;
}

export type StepOutcome =
    | ({ status: 'completed'; context: JsonObject } & StepRecord)
    | ({ status: 'failed'; error: StepError } & StepRecord)
    | ({ status: 'skipped'; reason: string } & StepRecord)
    | { status: 'waiting'; resumeAt: Date };

export interface StepExecutorDeps {
    catalog: CatalogRepository;
    tasks: TaskRepository;
    implementations: ImplementationSelector;
    providers: ProviderSelector;
    renderer: TemplateRenderer;
    evaluator: ExpressionEvaluator;
    validator: InputValidator;
    credentials: CredentialResolver;
    notifier: Notifier;
    drivers?: DriverRegistry;
    hooks?: HookRegistry;
    now?: () => Date;
}

// Progress through one target; on failure the step row records how far it got.
interface Trace {
    implementation: TaskImplementationEntity | null;
    provider: ScoredCandidate | null;
    rendered: string;
    logs: string[];
}

function emptyRecord(inputs: JsonObject = {}): StepRecord {
    return {
        inputs,
        outputs: {},
        logs: '',
        rendered_content: '',
        task_implementation_id: null,
        provider_instance_id: null,
    };
}

function message(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Resolves a step's input_mapping against the context. A string binding is
 * required; `{ "from": path, "default": value }` is optional.
 */
export function resolveStepInputs(mapping: JsonObject, context: JsonObject, base: JsonObject): JsonObject {
    const inputs: JsonObject = { ...base };
    for (const [name, binding] of Object.entries(mapping)) {
        if (typeof binding === 'string') {
            const value = readPath(context, binding);
            if (value === undefined) {
                throw new StepError('InputMissing', `Input "${name}" maps to "${binding}", which is not set in the context`);
            }
            inputs[name] = value;
        } else if (isJsonObject(binding) && typeof binding.from === 'string') {
            const value = readPath(context, binding.from);
            const fallback = binding.default;
            if (value !== undefined) inputs[name] = value;
            else if (fallback !== undefined) inputs[name] = fallback;
        } else {
            throw new StepError('ConfigurationError', `Input "${name}" has an invalid mapping; use a context path or { "from": path }`);
        }
    }
    return inputs;
}

function readPath(tree: JsonObject, path: string): JsonValue | undefined {
    try {
        return getPath(tree, path);
    } catch (err) {
        throw new StepError('ConfigurationError', message(err));
    }
}

function assertOutputMapping(mapping: JsonObject): void {
    for (const [destination, source] of Object.entries(mapping)) {
        if (typeof source !== 'string' || source.trim() === '' || destination.trim() === '') {
            throw new StepError('ConfigurationError', `Output mapping "${destination}" must name a path in the step output`);
        }
    }
}

/** Writes every output_mapping entry (destination path → output path) into the context. */
export function applyOutputMapping(mapping: JsonObject, outputs: JsonObject, context: JsonObject): { context: JsonObject; unmapped: string[] } {
    let next = context;
    const unmapped: string[] = [];
    for (const [destination, source] of Object.entries(mapping)) {
        if (typeof source !== 'string') continue;
        const value = readPath(outputs, source);
        if (value === undefined) {
            unmapped.push(source);
            continue;
        }
        try {
            next = setPath(next, destination, value);
        } catch (err) {
            throw new StepError('ConfigurationError', message(err));
        }
    }
    return { context: next, unmapped };
}

/**
 * Runs one workflow step for an execution and reports the outcome. Never
 * persists anything; the engine records the outcome.
 */
export class StepExecutor {
    private readonly drivers: DriverRegistry;
    private readonly hooks: HookRegistry;
    private readonly now: () => Date;

    constructor(private readonly deps: StepExecutorDeps) {
        this.drivers = deps.drivers ?? driverRegistry;
        this.hooks = deps.hooks ?? hookRegistry;
        this.now = deps.now ?? (() => new Date());
    }

    async execute(request: StepRequest): Promise<StepOutcome> {
        const { step } = request;
        switch (step.step_type) {
            case stepType.WAIT:
                return this.runWait(request);
            case stepType.CONDITION:
                return this.runCondition(request);
            case stepType.NOTIFICATION:
                return this.runNotification(request);
            case stepType.APPROVAL:
                return {
                    status: 'completed',
                    context: request.context,
                    ...emptyRecord(),
                    logs: `approved by ${request.execution.approved_by ?? 'unknown'}`,
                };
            case stepType.TASK:
            case stepType.VALIDATION:
                return this.runTask(request);
        }
    }

    private runWait({ step, context }: StepRequest): StepOutcome {
        const delay = step.config.delay_seconds;
        if (typeof delay === 'number' && delay > 0) {
            return { status: 'waiting', resumeAt: new Date(this.now().getTime() + delay * 1000) };
        }
        return { status: 'completed', context, ...emptyRecord(), logs: 'no delay configured' };
    }

    // Condition steps never fail: an expression that cannot be evaluated counts as false.
    private async runCondition({ step, context }: StepRequest): Promise<StepOutcome> {
        const configured = step.config.expression;
        const expression = step.condition ?? (typeof configured === 'string' ? configured : '');
        let result = false;
        let logs = '';
        try {
            result = await this.deps.evaluator.evaluate(expression, context);
            logs = `${expression} => ${result}`;
        } catch (err) {
            console.warn(`${TAG} condition "${step.name}" could not be evaluated:`, message(err));
            logs = `evaluation failed, treated as false: ${message(err)}`;
        }
        // The step name is a literal key here, never a path.
        const recorded = isJsonObject(context.conditions) ? context.conditions : {};
        return {
            status: 'completed',
            context: { ...context, conditions: { ...recorded, [step.name]: result } },
            ...emptyRecord(),
            outputs: { result },
            logs,
        };
    }

    private async runNotification({ execution, step, context }: StepRequest): Promise<StepOutcome> {
        const template = typeof step.config.message === 'string' ? step.config.message : `Step "${step.name}" reached`;
        let text = template;
        const logs: string[] = [];
        try {
            text = await this.deps.renderer.render(template, context);
        } catch (err) {
            logs.push(`message could not be rendered, sent as written: ${message(err)}`);
        }

        let delivered = true;
        try {
            await this.deps.notifier.notify({ execution_id: execution.id, step: step.name, message: text });
        } catch (err) {
            delivered = false;
            console.error(`${TAG} notification "${step.name}" for execution ${execution.id} failed:`, err);
            logs.push(`delivery failed: ${message(err)}`);
        }

        return {
            status: 'completed',
            context,
            ...emptyRecord(),
            outputs: { message: text, delivered },
            logs: logs.join('\n'),
        };
    }

    private async runTask({ execution, step, context }: StepRequest): Promise<StepOutcome> {
        const trace: Trace = { implementation: null, provider: null, rendered: '', logs: [] };
        let inputs: JsonObject = { ...execution.inputs };

        const record = (outputs: JsonObject = {}): StepRecord => ({
            inputs,
            outputs,
            logs: trace.logs.join('\n'),
            rendered_content: trace.rendered,
            task_implementation_id: trace.implementation?.id ?? null,
            provider_instance_id: trace.provider?.instance.id ?? null,
        });

        try {
            if (step.condition && step.condition.trim() !== '') {
                let proceed: boolean;
                try {
                    proceed = await this.deps.evaluator.evaluate(step.condition, context);
                } catch (err) {
                    throw new StepError('ConfigurationError', message(err));
                }
                if (!proceed) {
                    return { status: 'skipped', reason: `condition "${step.condition}" is false`, ...record() };
                }
            }

            assertOutputMapping(step.output_mapping);
            inputs = resolveStepInputs(step.input_mapping, context, execution.inputs);
            const task = await this.loadTask(step);
            this.validateInputs(task, inputs);

            const operation = this.operationFor(step, execution.requested_operation);
            const targets = await this.resolveTargets(execution);

            const perTarget: JsonObject = {};
            let first: JsonObject | null = null;
            for (const target of targets) {
                const name = targetName(target);
                trace.logs.push(`[${name}]`);
                const output = await this.runTarget({ task, target, inputs, context, operation, trace });
                perTarget[name] = output;
                first = first ?? output;
            }

            const outputs: JsonObject = { ...(first ?? {}), targets: perTarget };
            const mapped = applyOutputMapping(step.output_mapping, outputs, context);
            for (const source of mapped.unmapped) {
                trace.logs.push(`output "${source}" not present, mapping skipped`);
            }
            return { status: 'completed', context: mapped.context, ...record(outputs) };
        } catch (err) {
            const error = err instanceof StepError
                ? err
                : new StepError('DriverError', message(err));
            if (error.logs) trace.logs.push(error.logs);
            console.warn(`${TAG} step "${step.name}" of execution ${execution.id} failed (${error.kind}): ${error.message}`);
            return { status: 'failed', error, ...record() };
        }
    }

    // Validation steps and read-only work never push configuration.
    private operationFor(step: WorkflowStepEntity, requested: ProviderOperation): ProviderOperation {
        if (step.step_type === stepType.VALIDATION && requested === 'apply') return 'diff';
        return requested;
    }

    private async loadTask(step: WorkflowStepEntity): Promise<TaskDefinitionEntity> {
        if (!step.task_id) {
            throw new StepError('ConfigurationError', `Step "${step.name}" has no task`);
        }
        const task = await this.deps.tasks.findDefinitionById(step.task_id);
        if (!task) {
            throw new StepError('ConfigurationError', `Task definition ${step.task_id} does not exist`);
        }
        return task;
    }

    private validateInputs(task: TaskDefinitionEntity, inputs: JsonObject): void {
        let result: InputValidation;
        try {
            result = this.deps.validator.validate(task.input_schema, inputs);
        } catch (err) {
            if (err instanceof InputSchemaError) throw new StepError('ConfigurationError', `Task "${task.name}": ${err.message}`);
            throw err;
        }
        if (result.ok) return;
        if (result.missing.length > 0) {
            throw new StepError('InputMissing', `Task "${task.name}" is missing inputs: ${result.missing.join(', ')}`);
        }
        throw new StepError('InputInvalid', `Task "${task.name}" inputs are invalid: ${result.message}`);
    }

    private async resolveTargets(execution: ExecutionEntity): Promise<TargetRecord[]> {
        if (execution.targets.length === 0) {
            throw new StepError('TargetUnresolved', 'Execution has no targets');
        }
        const records: TargetRecord[] = [];
        for (const ref of execution.targets) {
            const record = await this.deps.catalog.findTarget(ref);
            if (!record) {
                throw new StepError('TargetUnresolved', `Target ${ref.kind} ${ref.id} does not exist in the catalog`);
            }
            records.push(record);
        }
        return records;
    }

    private async runTarget(args: {
        task: TaskDefinitionEntity;
        target: TargetRecord;
        inputs: JsonObject;
        context: JsonObject;
        operation: ProviderOperation;
        trace: Trace;
    }): Promise<JsonObject> {
        const { task, target, inputs, context, trace } = args;
        const facts = targetFacts(target);
        const intent = resolveIntent(target, inputs);
        const implementation = await this.deps.implementations.select(task.id, facts);
        trace.implementation = implementation;
        trace.provider = null;

        const scope: JsonObject = {
            ...context,
            intent,
            inputs,
            target: { kind: target.kind, id: target.id, name: targetName(target) },
        };
        const base: JsonObject = {
            ok: true,
            target: targetName(target),
            implementation: implementation.name,
            provider: null,
            rendered: '',
            diff: '',
            details: {},
            logs: '',
        };

        if (implementation.implementation_type === implementationType.HOOK) {
            const details = await this.runHook(implementation, target, intent, context);
            trace.logs.push(`hook ${String(implementation.action_config.hook)} ran`);
            return { ...base, details };
        }

        const rendered = await this.render(implementation, scope);
        trace.rendered = rendered;

        const operation = implementation.implementation_type === implementationType.QUERY && args.operation === 'apply'
            ? 'diff'
            : args.operation;
        if (operation === 'render') {
            trace.logs.push(`rendered ${rendered.length} characters with ${implementation.name}`);
            return { ...base, rendered };
        }

        const provider = await this.deps.providers.select(facts, implementation);
        trace.provider = provider;
        trace.logs.push(`provider ${provider.instance.name} (score ${provider.score})`);

        if (!provider.definition.capabilities.includes(operation)) {
            throw new StepError(
                'CapabilityNotSupported',
                `Provider "${provider.definition.name}" does not support ${operation}`,
            );
        }

        const result = await this.dispatch(provider, target, rendered, { ...scope }, operation);
        trace.logs.push(result.logs);
        return {
            ...base,
            provider: provider.instance.name,
            rendered,
            diff: result.diff,
            details: result.details,
            logs: result.logs,
        };
    }

    private async runHook(
        implementation: TaskImplementationEntity,
        target: TargetRecord,
        intent: JsonObject,
        context: JsonObject,
    ): Promise<JsonObject> {
        const name = implementation.action_config.hook;
        const hook = typeof name === 'string' ? this.hooks.get(name) : undefined;
        if (!hook) {
            throw new StepError('ConfigurationError', `Hook "${String(name)}" of implementation "${implementation.name}" is not registered`);
        }
        try {
            return await hook({ target, intent, context, config: implementation.action_config });
        } catch (err) {
            throw new StepError('DriverError', `Hook "${name}" failed: ${message(err)}`);
        }
    }

    private async render(implementation: TaskImplementationEntity, scope: JsonObject): Promise<string> {
        try {
            switch (implementation.implementation_type) {
                case implementationType.TEMPLATE_CONFIG:
                    return await this.deps.renderer.render(implementation.template_content, scope);
                case implementationType.TEMPLATE_PAYLOAD: {
                    const rendered = await this.deps.renderer.render(implementation.template_content, scope);
                    try {
                        JSON.parse(rendered);
                    } catch (err) {
                        throw new StepError('RenderFailed', `Payload of "${implementation.name}" is not valid JSON: ${message(err)}`);
                    }
                    return rendered;
                }
                case implementationType.API_CALL:
                case implementationType.QUERY:
                    return JSON.stringify(await this.renderStrings(implementation.action_config, scope), null, 2);
                case implementationType.HOOK:
                    return '';
            }
        } catch (err) {
            if (err instanceof StepError) throw err;
            if (err instanceof TemplateRenderError) {
                throw new StepError('RenderFailed', `Template of "${implementation.name}" failed to render: ${err.message}`);
            }
            throw err;
        }
    }

    private async renderStrings(value: JsonValue, scope: JsonObject): Promise<JsonValue> {
        if (typeof value === 'string') return this.deps.renderer.render(value, scope);
        if (Array.isArray(value)) {
            const items: JsonValue[] = [];
            for (const item of value) items.push(await this.renderStrings(item, scope));
            return items;
        }
        if (isJsonObject(value)) {
            const out: JsonObject = {};
            for (const [key, item] of Object.entries(value)) out[key] = await this.renderStrings(item, scope);
            return out;
        }
        return value;
    }

    private async dispatch(
        provider: ScoredCandidate,
        target: TargetRecord,
        rendered: string,
        context: JsonObject,
        operation: Exclude<ProviderCapability, 'render'>,
    ): Promise<{ diff: string; details: JsonObject; logs: string }> {
        const { instance, definition } = provider;

        let credentials: Credentials | null = null;
        if (instance.credential_ref) {
            credentials = await this.deps.credentials.resolve(instance.credential_ref);
            if (!credentials) {
                throw new StepError('CredentialMissing', `Credential "${instance.credential_ref}" of provider instance "${instance.name}" is not available`);
            }
        }

        let driver: ProviderDriver;
        try {
            const factory = this.drivers.resolve(definition.driver);
            driver = factory({
                id: instance.id,
                name: instance.name,
                provider: definition.name,
                settings: instance.settings,
                credentials,
            });
        } catch (err) {
            const detail = err instanceof DriverNotRegisteredError ? err.message : `Driver "${definition.driver}" rejected its settings: ${message(err)}`;
            throw new StepError('ConfigurationError', detail);
        }

        try {
            const validation = await driver.validateTarget(target);
            if (!validation.ok) {
                throw new StepError('DriverError', `Provider "${instance.name}" rejected target: ${validation.error}`);
            }

            const outcome = operation === 'diff'
                ? await driver.diff(target, rendered, context)
                : await driver.apply(target, rendered, context);

            if (outcome.kind === 'unsupported') {
                throw new StepError('CapabilityNotSupported', outcome.message);
            }
            const { result } = outcome;
            if (!result.ok) {
                const error = result.details.error;
                throw new StepError(
                    'DriverError',
                    typeof error === 'string' && error !== '' ? error : `Provider "${instance.name}" reported a failed ${operation}`,
                    result.logs,
                );
            }
            return { diff: result.diff, details: result.details, logs: result.logs };
        } catch (err) {
            if (err instanceof StepError) throw err;
            throw new StepError('DriverError', `Provider "${instance.name}" ${operation} failed: ${message(err)}`);
        } finally {
            try {
                await driver.close();
            } catch (err) {
                console.error(`${TAG} closing driver of "${instance.name}" failed:`, err);
            }
        }
    }
}
