import { DispatchStatusCode, ProviderModelName } from '../types';

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

/**
 * Base class for every failure the dispatcher knows how to report.
 * `publicMessage` is the only text that leaves the process.
 */
export class DispatchError extends Error {
    readonly statusCode: DispatchStatusCode;
    readonly publicMessage: string;

    constructor(statusCode: DispatchStatusCode, message: string, options?: { cause?: unknown; publicMessage?: string }) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.publicMessage = options?.publicMessage ?? message;
    }
}

export class ValidationError extends DispatchError {
    constructor(message: string) {
        super(400, message);
    }
}

export class MethodNotAllowedError extends DispatchError {
    constructor(readonly method: string) {
        super(405, 'Method Not Allowed, only POST supported');
    }
}

export class CredentialLookupError extends DispatchError {
    constructor(message: string, cause?: unknown) {
        super(500, message, { cause, publicMessage: INTERNAL_ERROR_MESSAGE });
    }
}

export class CredentialFormatError extends DispatchError {
    constructor(message: string, cause?: unknown) {
        super(500, message, { cause, publicMessage: INTERNAL_ERROR_MESSAGE });
    }
}

export class ProviderInvocationError extends DispatchError {
    constructor(readonly provider: ProviderModelName, message: string, cause?: unknown) {
        super(500, `${provider}: ${message}`, { cause, publicMessage: INTERNAL_ERROR_MESSAGE });
    }
}

export function isDispatchError(err: unknown): err is DispatchError {
    return err instanceof DispatchError;
}

/**
 * Best-effort message extraction for logging.
 */
export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
