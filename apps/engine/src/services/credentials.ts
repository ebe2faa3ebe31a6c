import { z } from 'zod';
import { Credentials } from '@fabricflow/sdk';
import { StepError } from '../errors/step.error';

export interface CredentialResolver {
    /** Returns null when the reference is not known. */
    resolve(ref: string): Promise<Credentials | null>;
}

const credentialSchema = z.record(z.string());

export function credentialEnvKey(ref: string): string {
    return `FABRICFLOW_CREDENTIAL_${ref.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

/**
 * Credentials stored as JSON objects in environment variables, e.g.
 * FABRICFLOW_CREDENTIAL_LAB_SWITCHES={"username":"netops","password":"..."}
 */
export class EnvCredentialResolver implements CredentialResolver {
    constructor(private readonly env: NodeJS.ProcessEnv = process.env) { }

    async resolve(ref: string): Promise<Credentials | null> {
        const key = credentialEnvKey(ref);
        const raw = this.env[key];
        if (!raw) return null;

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            throw new StepError('ConfigurationError', `${key} is not valid JSON`);
        }
        const result = credentialSchema.safeParse(parsed);
        if (!result.success) {
            throw new StepError('ConfigurationError', `${key} must be a JSON object of strings`);
        }
        return result.data;
    }
}
