export type ErrorContext = {
    [key: string]: unknown;
};

/**
 * Base class for every error raised by the nestwise packages. The code is a stable, dotted
 * identifier (package.reason) that callers can match on without parsing the message.
 */
export class StandardError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly context: ErrorContext = {},
        cause: unknown = undefined,
    ) {
        super(message, cause === undefined ? undefined : {cause});
        this.name = new.target.name;
    }
}

export function errorToMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }

    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }

    return String(error);
}
