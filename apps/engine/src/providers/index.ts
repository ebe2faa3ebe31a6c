import { DriverRegistry, driverRegistry } from '@fabricflow/sdk';
import { CLI_SESSION_DRIVER, createCliSessionDriver } from './cli-session.driver';
import { CONTROLLER_REST_DRIVER, createControllerApiDriver } from './controller-api.driver';
import { NULL_RECORDER_DRIVER, NullRecorderDriver } from './null.driver';

export { CliSessionDriver, CLI_SESSION_DRIVER } from './cli-session.driver';
export { ControllerApiDriver, CONTROLLER_REST_DRIVER } from './controller-api.driver';
export { NullRecorderDriver, NULL_RECORDER_DRIVER } from './null.driver';

/** Registers the drivers that ship with the engine. Safe to call more than once. */
export function registerBuiltinDrivers(registry: DriverRegistry = driverRegistry): void {
    if (!registry.has(CLI_SESSION_DRIVER)) registry.register(CLI_SESSION_DRIVER, createCliSessionDriver);
    if (!registry.has(CONTROLLER_REST_DRIVER)) registry.register(CONTROLLER_REST_DRIVER, createControllerApiDriver);
    if (!registry.has(NULL_RECORDER_DRIVER)) registry.register(NULL_RECORDER_DRIVER, () => new NullRecorderDriver());
}
