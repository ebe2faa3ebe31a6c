import { JsonObject, JsonValue } from './types';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function splitPath(path: string): string[] {
    const parts = path.split('.');
    if (path.trim() === '' || parts.some(p => p === '')) {
        throw new Error(`Invalid context path "${path}"`);
    }
    return parts;
}

/**
 * Reads a dotted path from a context tree. Numeric segments index into
 * arrays. Returns undefined when any segment is absent.
 */
export function getPath(tree: JsonObject, path: string): JsonValue | undefined {
    let current: JsonValue | undefined = tree;
    for (const part of splitPath(path)) {
        if (Array.isArray(current)) {
            const index = Number(part);
            current = Number.isInteger(index) ? current[index] : undefined;
        } else if (isJsonObject(current)) {
            current = Object.prototype.hasOwnProperty.call(current, part) ? current[part] : undefined;
        } else {
            return undefined;
        }
        if (current === undefined) return undefined;
    }
    return current;
}

/**
 * Writes `value` at a dotted path and returns a new tree; `tree` is left
 * untouched. Missing or non-mapping intermediates become mappings.
 */
export function setPath(tree: JsonObject, path: string, value: JsonValue): JsonObject {
    const [head, ...rest] = splitPath(path);
    if (rest.length === 0) {
        return { ...tree, [head]: cloneJson(value) };
    }
    const child = tree[head];
    const next = isJsonObject(child) ? child : {};
    return { ...tree, [head]: setPath(next, rest.join('.'), value) };
}

/** Shallow key overwrite, later layers win. */
export function mergeLayers(...layers: JsonObject[]): JsonObject {
    const merged: JsonObject = {};
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            merged[key] = cloneJson(value);
        }
    }
    return merged;
}

export function cloneJson<T extends JsonValue>(value: T): T {
    return structuredClone(value);
}
