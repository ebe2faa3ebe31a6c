import { DriverFactory, HookFn } from './types';

export class DriverNotRegisteredError extends Error {
    constructor(public readonly key: string, registered: string[]) {
        super(`Provider driver "${key}" is not registered. Registered: [${registered.join(', ')}]`);
        this.name = 'DriverNotRegisteredError';
    }
}

// Keys are dotted identifiers such as "cli.command-session", matching the
// `driver` column of a provider definition.
class DriverRegistry {
    private factories = new Map<string, DriverFactory>();
    private static readonly KEY_PATTERN = /^[a-z0-9_-]+(\.[a-z0-9_-]+)+$/;

    register(key: string, factory: DriverFactory): void {
        if (!DriverRegistry.KEY_PATTERN.test(key)) {
            throw new Error(`Driver key "${key}" must be a dotted identifier (e.g. "vendor.driver")`);
        }
        if (this.factories.has(key)) {
            throw new Error(`Driver "${key}" is already registered.`);
        }
        this.factories.set(key, factory);
    }

    resolve(key: string): DriverFactory {
        const factory = this.factories.get(key.trim());
        if (!factory) throw new DriverNotRegisteredError(key, this.list());
        return factory;
    }

    has(key: string): boolean {
        return this.factories.has(key);
    }

    list(): string[] {
        return Array.from(this.factories.keys()).sort();
    }

    unregister(key: string): boolean {
        return this.factories.delete(key);
    }
}

// Hooks back the "hook" implementation type. Re-registering a name replaces
// the previous function so reloads stay idempotent.
class HookRegistry {
    private hooks = new Map<string, HookFn>();

    register(name: string, fn: HookFn): void {
        this.hooks.set(name, fn);
    }

    get(name: string): HookFn | undefined {
        return this.hooks.get(name);
    }

    list(): string[] {
        return Array.from(this.hooks.keys()).sort();
    }
}

export const driverRegistry = new DriverRegistry();
export const hookRegistry = new HookRegistry();
export type { DriverRegistry, HookRegistry };

/** A registry detached from the process-wide one, for embedding and tests. */
export function createDriverRegistry(): DriverRegistry {
    return new DriverRegistry();
}

export function createHookRegistry(): HookRegistry {
    return new HookRegistry();
}

/**
 * Register a provider driver factory under a dotted key. Call once at
 * process start, before the engine selects providers.
 *
 * @example
 * registerDriver('acme.controller', (instance) => new AcmeDriver(instance));
 */
export function registerDriver(key: string, factory: DriverFactory): void {
    driverRegistry.register(key, factory);
}

export function registerHook(name: string, fn: HookFn): void {
    hookRegistry.register(name, fn);
}
