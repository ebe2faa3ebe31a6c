export { ExecutionEngine } from './execution-engine';
export type { AdvanceResult, ExecutionEngineDeps, ExecutionView, SubmitRequest } from './execution-engine';
export { StepExecutor } from './step-executor';
export type { StepOutcome, StepRequest } from './step-executor';
export { ImplementationSelector } from './implementation-selector';
export { ProviderSelector } from './provider-selector';
export { LiquidTemplateRenderer } from './template-renderer';
export { LiquidExpressionEvaluator } from './expression-evaluator';
export { InputSchemaError, InputValidator } from './input-validator';
export { EnvCredentialResolver } from './credentials';
export { ConsoleNotifier, WebhookNotifier } from './notifier';
export { RedisExecutionLock, InProcessExecutionLock } from './execution-lock';
export { RedisLease } from './redis-lease';
export { HeartbeatService } from './heartbeat.service';
export { Poller } from './poller';
export { Reaper } from './reaper';
export type { ReapedExecution } from './reaper';
export { EventLoopMonitor, createBackpressureCheck } from './event-loop-monitor';
