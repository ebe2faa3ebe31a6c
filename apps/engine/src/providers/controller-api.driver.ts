import { z } from 'zod';
import {
    DriverOutcome,
    JsonObject,
    JsonValue,
    ProviderDriver,
    ProviderInstanceConfig,
    TargetRecord,
    TargetValidation,
    failed,
    succeeded,
} from '@fabricflow/sdk';

export const CONTROLLER_REST_DRIVER = 'controller.rest';

const settingsSchema = z.object({
    base_url: z.string().url(),
    diff_path: z.string().default('/diff'),
    apply_path: z.string().default('/apply'),
    timeout_ms: z.number().int().positive().default(30_000),
});

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const responseSchema = z.object({
    ok: z.boolean(),
    diff: z.string().default(''),
    details: z.record(jsonValueSchema).default({}),
    logs: z.string().default(''),
    error: z.string().optional(),
});

export type ControllerSettings = z.infer<typeof settingsSchema>;

/**
 * Talks to a controller REST API:
 *
 *   POST {base_url}{diff_path|apply_path}
 *   { "target": {...}, "content": "<rendered>", "context": {...} }
 *
 * and expects `{ ok, diff?, details?, logs?, error? }` back. A credential
 * `token` is sent as a bearer token.
 */
export class ControllerApiDriver implements ProviderDriver {
    private readonly settings: ControllerSettings;
    private readonly inflight = new Set<AbortController>();

    constructor(private readonly instance: ProviderInstanceConfig) {
        this.settings = settingsSchema.parse(instance.settings);
    }

    async validateTarget(_target: TargetRecord): Promise<TargetValidation> {
        return { ok: true };
    }

    diff(target: TargetRecord, renderedContent: string, context: JsonObject): Promise<DriverOutcome> {
        return this.post(this.settings.diff_path, target, renderedContent, context);
    }

    apply(target: TargetRecord, renderedContent: string, context: JsonObject): Promise<DriverOutcome> {
        return this.post(this.settings.apply_path, target, renderedContent, context);
    }

    async close(): Promise<void> {
        for (const controller of this.inflight) controller.abort();
        this.inflight.clear();
    }

    private async post(path: string, target: TargetRecord, content: string, context: JsonObject): Promise<DriverOutcome> {
        const url = new URL(path, this.settings.base_url).toString();
        const headers: Record<string, string> = { 'content-type': 'application/json', accept: 'application/json' };
        const token = this.instance.credentials?.token;
        if (token) headers.authorization = `Bearer ${token}`;

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.settings.timeout_ms);
        this.inflight.add(controller);

        let status: number;
        let body: string;
        try {
            const res = await fetch(url, {
                method: 'POST',
                headers,
                body: JSON.stringify({ target, content, context }),
                signal: controller.signal,
            });
            status = res.status;
            body = await res.text();
        } catch (err) {
            return failed(`${this.instance.name} unreachable at ${url}: ${err instanceof Error ? err.message : String(err)}`);
        } finally {
            clearTimeout(timer);
            this.inflight.delete(controller);
        }

        if (status < 200 || status >= 300) {
            return failed(`${this.instance.name} answered HTTP ${status}`, body, { status });
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch {
            return failed(`${this.instance.name} answered with a body that is not JSON`, body, { status });
        }
        const result = responseSchema.safeParse(parsed);
        if (!result.success) {
            return failed(`${this.instance.name} answered with an unexpected shape: ${result.error.issues[0]?.message ?? 'invalid'}`, body, { status });
        }

        const { ok, diff, details, logs, error } = result.data;
        if (!ok) return failed(error ?? `${this.instance.name} rejected the request`, logs, details);
        return succeeded(details, logs, diff);
    }
}

export function createControllerApiDriver(instance: ProviderInstanceConfig): ProviderDriver {
    return new ControllerApiDriver(instance);
}
