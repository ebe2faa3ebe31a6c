import {
    DriverOutcome,
    JsonObject,
    ProviderDriver,
    TargetRecord,
    TargetValidation,
    succeeded,
} from '@fabricflow/sdk';

export const NULL_RECORDER_DRIVER = 'null.recorder';

function contentLines(content: string): string[] {
    return content.split(/\r?\n/).filter(line => line.trim() !== '');
}

/** Touches nothing. Diff shows every rendered line as added; apply always succeeds. */
export class NullRecorderDriver implements ProviderDriver {
    async validateTarget(_target: TargetRecord): Promise<TargetValidation> {
        return { ok: true };
    }

    async diff(_target: TargetRecord, renderedContent: string, _context: JsonObject): Promise<DriverOutcome> {
        const lines = contentLines(renderedContent);
        return succeeded({ lines: lines.length }, '', lines.map(line => `+ ${line}`).join('\n'));
    }

    async apply(_target: TargetRecord, renderedContent: string, _context: JsonObject): Promise<DriverOutcome> {
        const lines = contentLines(renderedContent);
        return succeeded({ applied_lines: lines.length }, `recorded ${lines.length} lines`);
    }

    async close(): Promise<void> { }
}
