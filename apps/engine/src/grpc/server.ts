import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { ReflectionService } from "@grpc/reflection";
import path from "path";
import Redis from "ioredis";
import { Queryable } from "../db/transaction.manager";
import { ExecutionEngine } from "../services/execution-engine";
import { HealthService } from "./health.service";
import { ExecutionServiceImpl } from "./execution.service";

const PROTO_DIR = path.join(__dirname, "../../../..", "packages/proto");

const protoOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

const healthPackageDef = protoLoader.loadSync(
  path.join(PROTO_DIR, "health.service.proto"),
  protoOptions,
);
const executionPackageDef = protoLoader.loadSync(
  path.join(PROTO_DIR, "execution.service.proto"),
  protoOptions,
);

const healthProto = grpc.loadPackageDefinition(healthPackageDef);
const executionProto = grpc.loadPackageDefinition(executionPackageDef);

/** Walks a loaded package to the service definition at `servicePath`. */
export function lookupService(
  root: grpc.GrpcObject,
  servicePath: string,
): grpc.ServiceDefinition {
  let node: grpc.GrpcObject | grpc.GrpcObject[string] = root;
  for (const segment of servicePath.split(".")) {
    if (typeof node === "function" || "format" in node) {
      throw new Error(`${servicePath} is not a service in the loaded protos`);
    }
    node = node[segment];
    if (node === undefined) {
      throw new Error(`${servicePath} is not a service in the loaded protos`);
    }
  }
  if (typeof node !== "function") {
    throw new Error(`${servicePath} is not a service in the loaded protos`);
  }
  return node.service;
}

export interface GrpcDependencies {
  pool: Queryable;
  redis: Pick<Redis, "ping">;
  engine: ExecutionEngine;
}

export function createGrpcServer(deps: GrpcDependencies): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const healthService = new HealthService(deps.pool, deps.redis);
  server.addService(lookupService(healthProto, "grpc.health.v1.Health"), {
    check: healthService.check.bind(healthService),
    watch: healthService.watch.bind(healthService),
  });

  const executionService = new ExecutionServiceImpl(deps.engine);
  server.addService(lookupService(executionProto, "fabricflow.ExecutionService"), {
    submitExecution: executionService.submitExecution.bind(executionService),
    getExecution: executionService.getExecution.bind(executionService),
    approveExecution: executionService.approveExecution.bind(executionService),
    cancelExecution: executionService.cancelExecution.bind(executionService),
    requestOperation: executionService.requestOperation.bind(executionService),
    advanceExecution: executionService.advanceExecution.bind(executionService),
  });

  // reflection for grpcurl debugging
  const reflectionService = new ReflectionService({
    ...healthPackageDef,
    ...executionPackageDef,
  });
  reflectionService.addToServer(server);

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[grpc] server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}
