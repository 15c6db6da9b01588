import { SOLUTION_FILE_HEADER_PREFIX } from '../core/constants';
import { MalformedHeaderError, MalformedSolutionFileError } from '../core/errors';
import { TextFileReader } from '../system/textFileReader';

const MAXIMUM_LINES_TO_READ = 2;

// Two to four dot-separated non-negative integers, e.g. 12.00
const VERSION_PATTERN = /^(\d+)(?:\.\d+){1,3}$/;

/**
 * Reads the solution file header and returns the major format version.
 * The header must be on the first or second line.
 */
export function readSolutionHeader(reader: TextFileReader): number {
    for (let line = 0; line < MAXIMUM_LINES_TO_READ && reader.hasMore(); line++) {
        const inputLine = reader.readLine();

        if (hasHeader(inputLine)) {
            return parseFormatVersion(inputLine, reader);
        }
    }

    throw new MalformedSolutionFileError(
        `Missing "${SOLUTION_FILE_HEADER_PREFIX}" header in the first ${MAXIMUM_LINES_TO_READ} lines`,
        reader.source,
        reader.lineNumber
    );
}

export function hasHeader(inputLine: string): boolean {
    return normalizeHeaderLine(inputLine).startsWith(SOLUTION_FILE_HEADER_PREFIX);
}

/**
 * Major component of the version that follows the header prefix
 */
export function getFormatVersion(inputLine: string): number | undefined {
    const versionInHeader = normalizeHeaderLine(inputLine)
        .substring(SOLUTION_FILE_HEADER_PREFIX.length)
        .trim();

    const match = VERSION_PATTERN.exec(versionInHeader);
    if (!match) {
        return undefined;
    }

    const major = Number(match[1]);
    return Number.isSafeInteger(major) ? major : undefined;
}

function parseFormatVersion(inputLine: string, reader: TextFileReader): number {
    const version = getFormatVersion(inputLine);

    if (version === undefined) {
        throw new MalformedHeaderError(
            `Invalid solution file format version: "${inputLine.trim()}"`,
            reader.source,
            reader.lineNumber
        );
    }

    return version;
}

// trimStart also removes a byte order mark
function normalizeHeaderLine(inputLine: string): string {
    return inputLine.trimStart();
}
