import { ChildProcess, spawn } from 'child_process';
import { z } from 'zod';
import {
    DriverOutcome,
    JsonObject,
    ProviderDriver,
    ProviderInstanceConfig,
    TargetRecord,
    TargetValidation,
    failed,
    succeeded,
    unsupported,
} from '@fabricflow/sdk';

export const CLI_SESSION_DRIVER = 'cli.command-session';

const settingsSchema = z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    timeout_ms: z.number().int().positive().default(30_000),
});

export type CliSessionSettings = z.infer<typeof settingsSchema>;

interface SessionResult {
    exitCode: number | null;
    stdout: string;
    stderr: string;
}

function hostOf(target: TargetRecord): string | null {
    const device = target.kind === 'interface' ? target.device : target;
    if (device.kind !== 'device') return null;
    return device.primary_ip ? device.primary_ip.split('/')[0] : device.name;
}

/**
 * Pushes rendered configuration lines through a command-line session. The
 * configured command gets the lines on stdin and the target host and
 * credentials through FABRICFLOW_* environment variables.
 *
 * Line-by-line pushes cannot preview changes, so `diff` is unsupported.
 */
export class CliSessionDriver implements ProviderDriver {
    private readonly settings: CliSessionSettings;
    private child: ChildProcess | null = null;

    constructor(private readonly instance: ProviderInstanceConfig) {
        this.settings = settingsSchema.parse(instance.settings);
    }

    async validateTarget(target: TargetRecord): Promise<TargetValidation> {
        if (!hostOf(target)) {
            return { ok: false, error: `${this.instance.name} can only reach devices and their interfaces` };
        }
        return { ok: true };
    }

    async diff(): Promise<DriverOutcome> {
        return unsupported('diff', `${this.instance.name} pushes commands line by line and cannot compute a diff`);
    }

    async apply(target: TargetRecord, renderedContent: string, _context: JsonObject): Promise<DriverOutcome> {
        const lines = renderedContent
            .split(/\r?\n/)
            .map(line => line.trimEnd())
            .filter(line => line.trim() !== '');
        if (lines.length === 0) {
            return succeeded({ commands: 0 }, 'nothing to apply');
        }

        const host = hostOf(target) ?? '';
        const result = await this.runSession(host, target, lines);
        const logs = [result.stdout, result.stderr].filter(Boolean).join('\n');

        if (result.exitCode !== 0) {
            const reason = result.stderr.trim() || `session exited with code ${result.exitCode ?? 'null'}`;
            return failed(reason, logs, { exit_code: result.exitCode, host });
        }
        return succeeded({ commands: lines.length, exit_code: 0, host }, logs);
    }

    async close(): Promise<void> {
        if (this.child && this.child.exitCode === null) {
            this.child.kill();
        }
        this.child = null;
    }

    private runSession(host: string, target: TargetRecord, lines: string[]): Promise<SessionResult> {
        const credentials = this.instance.credentials ?? {};

        return new Promise((resolve) => {
            const child = spawn(this.settings.command, this.settings.args, {
                env: {
                    ...process.env,
                    FABRICFLOW_HOST: host,
                    FABRICFLOW_TARGET: target.id,
                    FABRICFLOW_USERNAME: credentials.username ?? '',
                    FABRICFLOW_PASSWORD: credentials.password ?? '',
                },
                stdio: ['pipe', 'pipe', 'pipe'],
            });
            this.child = child;

            let stdout = '';
            let stderr = '';
            const timer = setTimeout(() => {
                stderr += `\nsession timed out after ${this.settings.timeout_ms}ms`;
                child.kill();
            }, this.settings.timeout_ms);

            child.stdout?.on('data', (chunk) => {
                stdout += chunk.toString();
            });
            child.stderr?.on('data', (chunk) => {
                stderr += chunk.toString();
            });

            child.on('close', (code) => {
                clearTimeout(timer);
                resolve({ exitCode: code, stdout, stderr });
            });

            child.on('error', (err) => {
                clearTimeout(timer);
                resolve({ exitCode: null, stdout, stderr: `${stderr}\n${err.message}`.trim() });
            });

            // A session that exits before reading stdin raises EPIPE here; the
            // exit code already reports the failure.
            child.stdin?.on('error', (err) => {
                stderr += `\nstdin: ${err.message}`;
            });
            child.stdin?.end(lines.join('\n') + '\n');
        });
    }
}

export function createCliSessionDriver(instance: ProviderInstanceConfig): ProviderDriver {
    return new CliSessionDriver(instance);
}
