import { DriverOutcome, JsonObject, ProviderCapability } from './types';

export function succeeded(details: JsonObject = {}, logs = '', diff = ''): DriverOutcome {
    return { kind: 'result', result: { ok: true, details, logs, diff } };
}

export function failed(error: string, logs = '', details: JsonObject = {}): DriverOutcome {
    return { kind: 'result', result: { ok: false, details: { ...details, error }, logs, diff: '' } };
}

export function unsupported(capability: ProviderCapability, message: string): DriverOutcome {
    return { kind: 'unsupported', capability, message };
}
