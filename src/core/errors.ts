/**
 * Conversion Errors
 *
 * Fatal failures of the conversion pipeline. Each carries a `code` so the
 * CLI can report which collaborator and which input failed.
 */

export type ConversionErrorCode =
    | 'MissingDirectory'
    | 'NoResourceFiles'
    | 'ResourceParseError'
    | 'InputReadError'
    | 'WriteError';

/**
 * Base class for all fatal pipeline errors
 */
export class ConversionError extends Error {
    public readonly code: ConversionErrorCode;

    constructor(code: ConversionErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConversionError';
        this.code = code;
    }
}

/**
 * The resource directory does not exist (or is not a directory)
 */
export class MissingDirectoryError extends ConversionError {
    public readonly directory: string;

    constructor(directory: string) {
        super('MissingDirectory', `Resource directory not found: ${directory}`);
        this.name = 'MissingDirectoryError';
        this.directory = directory;
    }
}

/**
 * The resource directory holds no file with the resource extension
 */
export class NoResourceFilesError extends ConversionError {
    public readonly directory: string;
    public readonly extension: string;

    constructor(directory: string, extension: string) {
        super('NoResourceFiles', `No ${extension} files found in resource directory: ${directory}`);
        this.name = 'NoResourceFilesError';
        this.directory = directory;
        this.extension = extension;
    }
}

/**
 * A resource document cannot be read or is not well-formed XML
 */
export class ResourceParseError extends ConversionError {
    public readonly file: string;
    public readonly line?: number;
    public readonly column?: number;

    constructor(file: string, reason: string, line?: number, column?: number) {
        const position = line !== undefined ? ` (line ${line}, column ${column ?? 0})` : '';
        super('ResourceParseError', `Failed to parse resource file ${file}${position}: ${reason}`);
        this.name = 'ResourceParseError';
        this.file = file;
        this.line = line;
        this.column = column;
    }
}

/**
 * The policy export could not be read
 */
export class InputReadError extends ConversionError {
    public readonly file: string;

    constructor(file: string, cause: unknown) {
        super('InputReadError', `Failed to read policy file ${file}: ${describeCause(cause)}`, { cause });
        this.name = 'InputReadError';
        this.file = file;
    }
}

/**
 * The destination audit file could not be created or written
 */
export class WriteError extends ConversionError {
    public readonly destination: string;
    /** System error code (EACCES, ENOSPC, EEXIST, ...) when one is known */
    public readonly systemCode?: string;

    constructor(destination: string, cause: unknown) {
        const systemCode = errnoCode(cause);
        super('WriteError', `Failed to write audit file ${destination}: ${describeCause(cause)}`, { cause });
        this.name = 'WriteError';
        this.destination = destination;
        this.systemCode = systemCode;
    }
}

function errnoCode(cause: unknown): string | undefined {
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
        return cause.code;
    }
    return undefined;
}

export function describeCause(cause: unknown): string {
    const code = errnoCode(cause);
    switch (code) {
        case 'EACCES':
        case 'EPERM':
            return `permission denied (${code})`;
        case 'ENOSPC':
            return 'disk full (ENOSPC)';
        case 'EROFS':
            return 'read-only filesystem (EROFS)';
        case 'EEXIST':
            return 'file already exists (EEXIST)';
        case 'ENOENT':
            return 'no such file or directory (ENOENT)';
        case 'EISDIR':
            return 'path is a directory (EISDIR)';
        default:
            return cause instanceof Error ? cause.message : String(cause);
    }
}
