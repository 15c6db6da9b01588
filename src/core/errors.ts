/**
 * Error codes carried by every error this library throws
 */
export const VsFileErrorCode = {
    NOT_FOUND: 'VSFILE_NOT_FOUND',
    WRONG_EXTENSION: 'VSFILE_WRONG_EXTENSION',
    MALFORMED_SOLUTION_FILE: 'VSFILE_MALFORMED_SOLUTION_FILE',
    MALFORMED_HEADER: 'VSFILE_MALFORMED_HEADER',
    MALFORMED_PROJECT_REFERENCE: 'VSFILE_MALFORMED_PROJECT_REFERENCE',
    INVALID_ARGUMENT: 'VSFILE_INVALID_ARGUMENT',
    END_OF_INPUT: 'VSFILE_END_OF_INPUT',
} as const;

export type VsFileErrorCodeType = (typeof VsFileErrorCode)[keyof typeof VsFileErrorCode];

/**
 * Base class of all errors raised while locating or reading Visual Studio files.
 */
export class VsFileError extends Error {
    constructor(
        message: string,
        public readonly code: VsFileErrorCodeType,
        public readonly filePath?: string,
        public readonly line?: number
    ) {
        super(message);
        this.name = 'VsFileError';
    }
}

/** A file or directory does not exist. */
export class NotFoundError extends VsFileError {
    constructor(filePath: string, kind: 'File' | 'Directory' = 'File') {
        super(`${kind} not found at path: ${filePath}`, VsFileErrorCode.NOT_FOUND, filePath);
        this.name = 'NotFoundError';
    }
}

export class WrongExtensionError extends VsFileError {
    constructor(filePath: string, public readonly expectedExtension: string) {
        super(`Expected a ${expectedExtension} file: ${filePath}`, VsFileErrorCode.WRONG_EXTENSION, filePath);
        this.name = 'WrongExtensionError';
    }
}

/** No solution header within the first two lines. */
export class MalformedSolutionFileError extends VsFileError {
    constructor(message: string, filePath?: string, line?: number) {
        super(message, VsFileErrorCode.MALFORMED_SOLUTION_FILE, filePath, line);
        this.name = 'MalformedSolutionFileError';
    }
}

/** Header present but its format version cannot be parsed. */
export class MalformedHeaderError extends VsFileError {
    constructor(message: string, filePath?: string, line?: number) {
        super(message, VsFileErrorCode.MALFORMED_HEADER, filePath, line);
        this.name = 'MalformedHeaderError';
    }
}

export class MalformedProjectReferenceError extends VsFileError {
    constructor(message: string, filePath?: string, line?: number) {
        super(message, VsFileErrorCode.MALFORMED_PROJECT_REFERENCE, filePath, line);
        this.name = 'MalformedProjectReferenceError';
    }
}

export class InvalidArgumentError extends VsFileError {
    constructor(public readonly argumentName: string, message = `Invalid ${argumentName}: must not be empty`) {
        super(message, VsFileErrorCode.INVALID_ARGUMENT);
        this.name = 'InvalidArgumentError';
    }
}

/** A line was requested from a reader that has none left. */
export class EndOfInputError extends VsFileError {
    constructor(filePath?: string, line?: number) {
        super('Attempted to read past the end of input', VsFileErrorCode.END_OF_INPUT, filePath, line);
        this.name = 'EndOfInputError';
    }
}

/**
 * Throws InvalidArgumentError when the value is missing or only white space
 */
export function requireText(value: string | undefined | null, argumentName: string): string {
    if (value === undefined || value === null || value.trim().length === 0) {
        throw new InvalidArgumentError(argumentName);
    }
    return value;
}
