// public api for @fabricflow/sdk
// usage:
//   import { registerDriver, succeeded, unsupported } from '@fabricflow/sdk';
//   registerDriver('acme.controller', (instance) => new AcmeDriver(instance));

export * from './types';
export { getPath, setPath, mergeLayers, cloneJson, isJsonObject } from './context';
export {
    driverRegistry,
    hookRegistry,
    registerDriver,
    registerHook,
    createDriverRegistry,
    createHookRegistry,
    DriverNotRegisteredError,
} from './registry';
export type { DriverRegistry, HookRegistry } from './registry';
export { succeeded, failed, unsupported } from './results';
export { serialize, deserialize, parseJsonObject, SerializationError } from './utils/serialization';
