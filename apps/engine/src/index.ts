import "dotenv/config";
import { loadConfig } from "./config";
import { createPool, createRedis } from "./db";
import { TransactionManager } from "./db/transaction.manager";
import { createGrpcServer, startGrpcServer } from "./grpc/server";
import { registerBuiltinDrivers } from "./providers";
import { PgCatalogRepository } from "./repositories/catalog.repository";
import { PgExecutionRepository } from "./repositories/execution.repository";
import { PgExecutionStepRepository } from "./repositories/execution-step.repository";
import { PgProviderRepository } from "./repositories/provider.repository";
import { PgTaskRepository } from "./repositories/task.repository";
import { PgWorkflowRepository } from "./repositories/workflow.repository";
import { runExecution } from "./run-execution";
import {
  ConsoleNotifier,
  createBackpressureCheck,
  EnvCredentialResolver,
  EventLoopMonitor,
  ExecutionEngine,
  HeartbeatService,
  ImplementationSelector,
  InputValidator,
  LiquidExpressionEvaluator,
  LiquidTemplateRenderer,
  Poller,
  ProviderSelector,
  Reaper,
  RedisExecutionLock,
  StepExecutor,
  WebhookNotifier,
} from "./services";

const TAG = "[fabricflow]";

const config = loadConfig();

// Wiring
const pool = createPool(config);
const redis = createRedis(config);

pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));

registerBuiltinDrivers();

const executions = new PgExecutionRepository(pool);
const steps = new PgExecutionStepRepository(pool);
const workflows = new PgWorkflowRepository(pool);
const tasks = new PgTaskRepository(pool);
const catalog = new PgCatalogRepository(pool);
const validator = new InputValidator();

const executor = new StepExecutor({
  catalog,
  tasks,
  implementations: new ImplementationSelector(tasks),
  providers: new ProviderSelector(new PgProviderRepository(pool)),
  renderer: new LiquidTemplateRenderer(),
  evaluator: new LiquidExpressionEvaluator(),
  validator,
  credentials: new EnvCredentialResolver(),
  notifier: config.notifyWebhookUrl
    ? new WebhookNotifier(config.notifyWebhookUrl)
    : new ConsoleNotifier(),
});

const engine = new ExecutionEngine({
  executions,
  steps,
  workflows,
  catalog,
  executor,
  lock: new RedisExecutionLock(redis, config.lockTtlMs),
  unitOfWork: new TransactionManager(pool),
  validator,
  defaultOperation: config.defaultOperation,
});

const heartbeat = new HeartbeatService(executions);

// Components
let poller: Poller | null = null;
let reaper: Reaper | null = null;
let monitor: EventLoopMonitor | null = null;

async function main() {
  console.log(`${TAG} starting engine... (worker: ${config.workerId})`);

  if (!config.databaseUrl) {
    console.warn(`${TAG} WARNING: DATABASE_URL is not set, using libpq defaults.`);
  }

  // Health checks
  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  await redis.ping();
  console.log(`${TAG} redis connected`);

  // gRPC
  const grpcServer = createGrpcServer({ pool, redis, engine });
  await startGrpcServer(grpcServer, config.port);

  // Reaper
  reaper = new Reaper(pool, redis, {
    staleThresholdSeconds: config.reaperStale,
    intervalMs: config.reaperInterval,
    maxRecoveries: config.maxRecoveries,
    workerId: config.workerId,
  });
  reaper.start();

  // Backpressure
  const lagMonitor = new EventLoopMonitor();
  monitor = lagMonitor;
  const checkBackpressure = createBackpressureCheck(
    config,
    () => heartbeat.activeCount,
    () => lagMonitor.lag,
  );

  // Poller
  poller = new Poller(executions, {
    workerId: config.workerId,
    batchSize: config.pollBatchSize,
    checkBackpressure,
    onExecutionClaimed: (execution) =>
      runExecution(engine, heartbeat, executions, config.workerId, execution),
  });
  poller.start();

  console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  heartbeat.stopAll();
  if (poller) await poller.stop();
  if (reaper) await reaper.stop();
  if (monitor) monitor.disable();

  await pool.end();
  await redis.quit();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
process.on("SIGUSR2", () => onSignal("SIGUSR2"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
