import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import { JsonObject } from '@fabricflow/sdk';

export class InputSchemaError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InputSchemaError';
    }
}

export type InputValidation =
    | { ok: true }
    | { ok: false; missing: string[]; message: string };

/**
 * JSON Schema (2020-12) validation of execution and step inputs. Compiled
 * schemas are cached by their serialized form. A schema Ajv cannot compile
 * raises InputSchemaError.
 */
export class InputValidator {
    private readonly ajv = new Ajv2020({ allErrors: true, strict: false });
    private readonly compiled = new Map<string, ValidateFunction>();

    validate(schema: JsonObject | null, inputs: JsonObject): InputValidation {
        if (!schema || Object.keys(schema).length === 0) return { ok: true };

        const validate = this.compile(schema);
        if (validate(inputs)) return { ok: true };

        const errors = validate.errors ?? [];
        const missing = errors
            .filter(error => error.keyword === 'required')
            .map(error => {
                const property = String(error.params.missingProperty);
                return error.instancePath ? `${error.instancePath.slice(1).replace(/\//g, '.')}.${property}` : property;
            });
        const message = errors
            .map(error => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`)
            .join('; ');

        return { ok: false, missing, message: message.trim() || 'Input schema validation failed' };
    }

    private compile(schema: JsonObject): ValidateFunction {
        const key = JSON.stringify(schema);
        let validate = this.compiled.get(key);
        if (!validate) {
            try {
                validate = this.ajv.compile(schema);
            } catch (err) {
                throw new InputSchemaError(`Input schema does not compile: ${err instanceof Error ? err.message : String(err)}`);
            }
            this.compiled.set(key, validate);
        }
        return validate;
    }
}
