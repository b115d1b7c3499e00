export type BurnMonitorErrorCode =
    | 'TRANSIENT_RPC'
    | 'MALFORMED_RESPONSE'
    | 'CONFIGURATION'
    | 'STATE_FILE'
    | 'ABORTED';

export class BurnMonitorError extends Error {
    constructor(
        message: string,
        public readonly code: BurnMonitorErrorCode,
        public readonly originalError?: unknown
    ) {
        super(message);
        this.name = 'BurnMonitorError';
    }
}

/** Network or RPC-layer failure. Always retried with backoff. */
export class TransientRpcError extends BurnMonitorError {
    constructor(
        public readonly method: string,
        originalError?: unknown
    ) {
        super(`${method} failed: ${describeError(originalError)}`, 'TRANSIENT_RPC', originalError);
        this.name = 'TransientRpcError';
    }
}

/** The node answered, but not with anything we can parse. Never retried. */
export class MalformedResponseError extends BurnMonitorError {
    constructor(
        public readonly method: string,
        originalError?: unknown
    ) {
        super(`${method} returned an unparseable result: ${describeError(originalError)}`, 'MALFORMED_RESPONSE', originalError);
        this.name = 'MalformedResponseError';
    }
}

/** Bad operator input. Fatal, raised before the poll loop starts. */
export class ConfigurationError extends BurnMonitorError {
    constructor(message: string, originalError?: unknown) {
        super(message, 'CONFIGURATION', originalError);
        this.name = 'ConfigurationError';
    }
}

export class StateFileError extends BurnMonitorError {
    constructor(
        public readonly filePath: string,
        message: string,
        originalError?: unknown
    ) {
        super(`${filePath}: ${message}`, 'STATE_FILE', originalError);
        this.name = 'StateFileError';
    }
}

export class AbortError extends BurnMonitorError {
    constructor(message = 'Operation aborted') {
        super(message, 'ABORTED');
        this.name = 'AbortError';
    }
}

export function isTransient(error: unknown): error is TransientRpcError {
    return error instanceof TransientRpcError;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (error === undefined) return 'unknown error';
    return String(error);
}
