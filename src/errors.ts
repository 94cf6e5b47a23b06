export type ShccnErrorCode = 'SOURCE_READ_ERROR' | 'NO_INPUT' | 'INVALID_OPTION';

/**
 * Base error for everything shccn reports to the user.
 */
export class ShccnError extends Error {
    constructor(
        message: string,
        public readonly code: ShccnErrorCode,
        public readonly context?: Record<string, unknown>,
    ) {
        super(message);
        this.name = 'ShccnError';
    }

    toJSON() {
        return {
            error: this.message,
            code: this.code,
            context: this.context,
        };
    }
}

/** A script could not be read. Only that file is skipped. */
export class SourceReadError extends ShccnError {
    constructor(path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Cannot read ${path}: ${reason}`, 'SOURCE_READ_ERROR', {
            path,
            errno: errnoCode(cause),
        });
        this.name = 'SourceReadError';
        this.cause = cause;
    }
}

export class NoInputError extends ShccnError {
    constructor(patterns: readonly string[]) {
        super(`No shell scripts found in: ${patterns.join(', ')}`, 'NO_INPUT', { patterns });
        this.name = 'NoInputError';
    }
}

export class InvalidOptionError extends ShccnError {
    constructor(option: string, value: string, expected: string) {
        super(`Invalid ${option} value "${value}". Expected ${expected}`, 'INVALID_OPTION', { option, value });
        this.name = 'InvalidOptionError';
    }
}

function errnoCode(cause: unknown): string | undefined {
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
        return cause.code;
    }
    return undefined;
}

/** Exit status for a failed command. */
export function exitCodeFor(error: unknown): number {
    return error instanceof InvalidOptionError ? 2 : 1;
}
