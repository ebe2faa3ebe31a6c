import { Liquid } from 'liquidjs';
import { JsonObject, cloneJson } from '@fabricflow/sdk';

/**
 * Evaluates a boolean condition against the execution context. Evaluation
 * sees a copy of the context and cannot write to it.
 */
export interface ExpressionEvaluator {
    evaluate(expression: string, context: JsonObject): Promise<boolean>;
}

export class ExpressionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ExpressionError';
    }
}

const DELIMITERS = ['{%', '%}', '{{', '}}'];

/**
 * Liquid condition syntax, e.g. `inputs.vlan_id > 100 and operation == "apply"`.
 * Only the expression of an `if` tag is accepted; tag or output delimiters
 * are rejected so an expression cannot smuggle in other tags.
 */
export class LiquidExpressionEvaluator implements ExpressionEvaluator {
    private readonly engine = new Liquid({ cache: false, strictFilters: true, strictVariables: false, jsTruthy: true });

    async evaluate(expression: string, context: JsonObject): Promise<boolean> {
        const trimmed = expression.trim();
        if (trimmed === '') throw new ExpressionError('Empty condition expression');
        if (DELIMITERS.some(d => trimmed.includes(d))) {
            throw new ExpressionError(`Condition "${trimmed}" must be a bare expression without template delimiters`);
        }

        let output: string;
        try {
            output = await this.engine.parseAndRender(
                `{% if ${trimmed} %}true{% else %}false{% endif %}`,
                cloneJson(context),
            );
        } catch (err) {
            throw new ExpressionError(`Condition "${trimmed}" failed: ${err instanceof Error ? err.message : String(err)}`);
        }
        return output === 'true';
    }
}
