import { Liquid } from 'liquidjs';
import { JsonObject, cloneJson } from '@fabricflow/sdk';

export interface TemplateRenderer {
    render(template: string, scope: JsonObject): Promise<string>;
}

function formatLiquidError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return 'Failed to render template';
}

export class TemplateRenderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TemplateRenderError';
    }
}

/** Liquid templates: `{{ intent.name }}`, `{% for vlan in intent.tagged_vlans %}`. */
export class LiquidTemplateRenderer implements TemplateRenderer {
    private readonly engine = new Liquid({ cache: false, strictFilters: true, strictVariables: false });

    async render(template: string, scope: JsonObject): Promise<string> {
        if (!template.includes('{{') && !template.includes('{%')) return template;
        try {
            return await this.engine.parseAndRender(template, cloneJson(scope));
        } catch (err) {
            throw new TemplateRenderError(formatLiquidError(err));
        }
    }
}
