/**
 * Failure taxonomy of the bridge.
 * None of these ever reaches a caller of the public operations: each one is
 * converted into a CapabilityReport reason, an empty plan list or a SetupOutcome.
 */

export type BridgeErrorCode =
    | 'UNSUPPORTED_PLATFORM'
    | 'SERVICE_UNAVAILABLE'
    | 'PERMISSION_DENIED'
    | 'INPUT_INVALID'
    | 'OS_REJECTED'
    | 'REGISTRATION_FAILED'
    | 'DEVICE_UNREACHABLE'
    | 'AGENT_ERROR'
    | 'CONFIG_INVALID';

export class BridgeError extends Error {
    constructor(message: string, public readonly code: BridgeErrorCode) {
        super(message);
        this.name = 'BridgeError';
    }
}

export class UnsupportedPlatformError extends BridgeError {
    constructor(message: string) {
        super(message, 'UNSUPPORTED_PLATFORM');
        this.name = 'UnsupportedPlatformError';
    }
}

export class ServiceUnavailableError extends BridgeError {
    constructor(public readonly service: string) {
        super(`${service} service not available`, 'SERVICE_UNAVAILABLE');
        this.name = 'ServiceUnavailableError';
    }
}

/**
 * Equivalent of a SecurityException: the caller lacks a telephony permission.
 */
export class PermissionDeniedError extends BridgeError {
    constructor(message = 'Permission denied') {
        super(message, 'PERMISSION_DENIED');
        this.name = 'PermissionDeniedError';
    }
}

export class InvalidActivationCodeError extends BridgeError {
    constructor(message: string) {
        super(message, 'INPUT_INVALID');
        this.name = 'InvalidActivationCodeError';
    }
}

export class OsRejectedError extends BridgeError {
    constructor(message: string) {
        super(message, 'OS_REJECTED');
        this.name = 'OsRejectedError';
    }
}

export class CallbackRegistrationError extends BridgeError {
    constructor(message: string) {
        super(message, 'REGISTRATION_FAILED');
        this.name = 'CallbackRegistrationError';
    }
}

export class DeviceUnreachableError extends BridgeError {
    constructor(message: string) {
        super(message, 'DEVICE_UNREACHABLE');
        this.name = 'DeviceUnreachableError';
    }
}

/**
 * The device agent answered with a status or a body the bridge cannot use.
 */
export class DeviceAgentApiError extends BridgeError {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly data?: unknown
    ) {
        super(message, 'AGENT_ERROR');
        this.name = 'DeviceAgentApiError';
    }
}

export class ConfigError extends BridgeError {
    constructor(public readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`, 'CONFIG_INVALID');
        this.name = 'ConfigError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
