export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
    [key: string]: JsonValue;
}

export type ProviderCapability = 'render' | 'diff' | 'apply';
export type ProviderOperation = 'render' | 'diff' | 'apply';

/**
 * Catalog objects the engine can target. Records are snapshots supplied by the
 * host catalog; the engine never writes them.
 */
export interface DeviceRecord {
    kind: 'device';
    id: string;
    name: string;
    manufacturer: string | null;
    platform: string | null;
    software_version: string | null;
    location: string | null;
    tenant: string | null;
    tags: string[];
    primary_ip: string | null;
    config_context: JsonObject;
    local_context: JsonObject;
}

export type InterfaceMode = 'access' | 'tagged' | 'tagged-all';

export interface InterfaceRecord {
    kind: 'interface';
    id: string;
    name: string;
    description: string;
    enabled: boolean;
    mode: InterfaceMode | null;
    untagged_vlan: number | null;
    tagged_vlans: number[];
    device: DeviceRecord;
}

/** Any other catalog object: only its attributes are visible. */
export interface GenericRecord {
    kind: 'object';
    id: string;
    object_type: string;
    attributes: JsonObject;
}

export type TargetRecord = DeviceRecord | InterfaceRecord | GenericRecord;

export interface TargetRef {
    kind: TargetRecord['kind'];
    id: string;
}

export interface ProviderOperationResult {
    ok: boolean;
    details: JsonObject;
    logs: string;
    diff: string;
}

// Drivers answer an operation they cannot perform with `unsupported`
// instead of throwing.
export type DriverOutcome =
    | { kind: 'result'; result: ProviderOperationResult }
    | { kind: 'unsupported'; capability: ProviderCapability; message: string };

export type TargetValidation = { ok: true } | { ok: false; error: string };

export interface Credentials {
    username?: string;
    password?: string;
    token?: string;
    [key: string]: string | undefined;
}

export interface ProviderInstanceConfig {
    id: string;
    name: string;
    provider: string;
    settings: JsonObject;
    credentials: Credentials | null;
}

/**
 * Capability interface every provider driver implements. A driver instance
 * lives for one step invocation; `close` releases its session and is called
 * on every exit path.
 */
export interface ProviderDriver {
    validateTarget(target: TargetRecord): Promise<TargetValidation>;
    diff(target: TargetRecord, renderedContent: string, context: JsonObject): Promise<DriverOutcome>;
    apply(target: TargetRecord, renderedContent: string, context: JsonObject): Promise<DriverOutcome>;
    close(): Promise<void>;
}

export type DriverFactory = (instance: ProviderInstanceConfig) => ProviderDriver;

export interface HookInvocation {
    target: TargetRecord;
    intent: JsonObject;
    context: JsonObject;
    config: JsonObject;
}

export type HookFn = (invocation: HookInvocation) => Promise<JsonObject>;
