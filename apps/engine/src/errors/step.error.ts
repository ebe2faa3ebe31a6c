export type StepErrorKind =
    | 'InputMissing'
    | 'InputInvalid'
    | 'TargetUnresolved'
    | 'CredentialMissing'
    | 'NoImplementationMatched'
    | 'NoProviderMatched'
    | 'CapabilityNotSupported'
    | 'ConfigurationError'
    | 'RenderFailed'
    | 'DriverError';

/**
 * A step failure. The kind is recorded on the execution step next to the
 * message and whatever the driver logged before failing.
 */
export class StepError extends Error {
    constructor(
        public readonly kind: StepErrorKind,
        message: string,
        public readonly logs: string = '',
    ) {
        super(message);
        this.name = 'StepError';
    }
}
