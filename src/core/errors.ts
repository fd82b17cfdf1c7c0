/**
 * Error kinds raised while resolving or querying the project root.
 */

export type RootErrorCode =
    | 'EmptyInput'
    | 'BadEntryMarker'
    | 'BadAuxFilesDefined'
    | 'NoRootFound'
    | 'NoGitRootFound'
    | 'NotADirectory'
    | 'RootNotSet'
    | 'RelativePath'
    | 'NoEnvDefined'
    | 'MissingEnvs'
    | 'EntryFileNotFound'
    | 'ProjectDirUnresolvable'
    | 'BadPattern'
    | 'EnvLoadFailed'
    | 'Io';

export interface RootErrorOptions {
    cause?: unknown;
    details?: Record<string, unknown>;
}

export class RootError extends Error {
    readonly code: RootErrorCode;
    readonly details: Record<string, unknown>;

    constructor(code: RootErrorCode, message: string, options: RootErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'RootError';
        this.code = code;
        this.details = options.details || {};
    }
}

/**
 * True for a RootError, optionally of a given code.
 */
export function isRootError(err: unknown, code?: RootErrorCode): err is RootError {
    if (!(err instanceof RootError)) return false;
    return code === undefined || err.code === code;
}

/** Node's `code` on filesystem errors (ENOENT, ENOTDIR, ...), if any. */
export function errnoCode(err: unknown): string | undefined {
    if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a filesystem failure with the operation and path it came from.
 * RootErrors pass through untouched.
 */
export function wrapIo(err: unknown, operation: string, target: string): RootError {
    if (err instanceof RootError) return err;
    return new RootError('Io', `${operation} ${target}: ${describeError(err)}`, {
        cause: err,
        details: { operation, path: target, errno: errnoCode(err) },
    });
}
