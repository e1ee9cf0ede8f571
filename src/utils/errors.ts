/**
 * Error Types
 */

export type WrappedErrorCode = 'input_error' | 'config_error' | 'sentiment_unavailable';

export class WrappedError extends Error {
    readonly code: WrappedErrorCode;
    readonly details?: string;

    constructor(message: string, code: WrappedErrorCode, details?: string) {
        super(message);
        this.name = 'WrappedError';
        this.code = code;
        this.details = details;
    }
}

/**
 * The export file cannot be turned into a two-person conversation. Fatal.
 */
export class InputError extends WrappedError {
    constructor(message: string, details?: string) {
        super(message, 'input_error', details);
        this.name = 'InputError';
    }
}

/**
 * Invalid command-line configuration. Fatal, raised before any computation.
 */
export class ConfigError extends WrappedError {
    constructor(message: string, details?: string) {
        super(message, 'config_error', details);
        this.name = 'ConfigError';
    }
}

/**
 * A sentiment backend could not be used. Callers degrade instead of aborting.
 */
export class SentimentUnavailableError extends WrappedError {
    constructor(message: string, cause?: unknown) {
        super(message, 'sentiment_unavailable', cause === undefined ? undefined : describeError(cause));
        this.name = 'SentimentUnavailableError';
        this.cause = cause;
    }
}

/**
 * One-line description of any thrown value, including details where present
 */
export function describeError(error: unknown): string {
    if (error instanceof WrappedError && error.details) {
        return `${error.message}: ${error.details}`;
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
