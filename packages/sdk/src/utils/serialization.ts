import superjson from 'superjson';
import { isJsonObject } from '../context';
import { JsonObject, JsonValue } from '../types';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

function assertSize(encoded: string): void {
    const size = Buffer.byteLength(encoded);
    if (size > MAX_PAYLOAD_SIZE) {
        throw new SerializationError(
            `Payload size exceeds maximum limit of 1MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`
        );
    }
}

/** superjson-encodes a payload so dates and maps survive the wire. */
export function serialize(value: unknown): string {
    if (value === undefined) return '';

    try {
        const encoded = superjson.stringify(value);
        assertSize(encoded);
        return encoded;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Parses caller-supplied JSON bytes (intake inputs, operation payloads).
 * Empty input is an empty mapping; anything but a JSON object is rejected.
 */
export function parseJsonObject(raw: Buffer | string | null | undefined): JsonObject {
    const text = raw === null || raw === undefined ? '' : raw.toString();
    if (text.trim() === '') return {};
    assertSize(text);

    let parsed: JsonValue;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        throw new SerializationError(`Invalid JSON payload: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!isJsonObject(parsed)) {
        throw new SerializationError('Payload must be a JSON object');
    }
    return parsed;
}
