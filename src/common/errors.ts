/**
 * Error kinds raised while converting a file to an outline.
 *
 * Node-local kinds (NameExtractionFailed, NodeExtractionFailed) never
 * leave the normalizer; the others fail a single request.
 */

export type OutlineErrorCode =
    | 'InputUnavailable'
    | 'ParseFailed'
    | 'NameExtractionFailed'
    | 'NodeExtractionFailed'
    | 'RootExtractionFailed'
    | 'OutputWriteFailed'
    | 'InvalidOutlineDocument'
    | 'InvalidConfiguration';

export class OutlineError extends Error {
    readonly code: OutlineErrorCode;

    constructor(code: OutlineErrorCode, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'OutlineError';
        this.code = code;
    }
}

export function isOutlineError(value: unknown): value is OutlineError {
    return value instanceof OutlineError;
}

/**
 * Render any thrown value as a single line.
 */
export function describeError(error: unknown): string {
    if (error instanceof OutlineError) {
        return `${error.code}: ${error.message}`;
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Node.js system error code (ENOENT, EACCES, ...), if any.
 */
export function systemErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}
