import { SolutionFileMarker } from '../core/constants';
import { MalformedProjectReferenceError } from '../core/errors';
import { TextFileReader } from '../system/textFileReader';
import { SolutionFileProject, SolutionProjectHeader } from '../types/solution';
import { DEFAULT_PATH_RESOLVERS, ProjectPathResolverRegistration, findPathResolver } from './projectPathResolvers';

const GUID = '\\{([A-Fa-f\\d-]+)\\}';
const PROJECT_HEADER_PATTERN = new RegExp(`^Project\\("${GUID}"\\) = "(.+)", "(.+)", "${GUID}"$`);

/**
 * Parses a project reference line, or returns undefined when it does not match the grammar
 */
export function parseProjectHeader(inputLine: string): SolutionProjectHeader | undefined {
    const match = PROJECT_HEADER_PATTERN.exec(inputLine);
    if (!match) {
        return undefined;
    }

    const [, typeGuid, name, path, uniqueGuid] = match;
    return { name, path, typeGuid, uniqueGuid };
}

/**
 * Reads the next project reference block.
 *
 * Lines outside a block are skipped. Returns undefined when the input ends
 * before another block starts; throws MalformedProjectReferenceError for a
 * block that is opened but not closed, closed but not opened, or whose
 * opening line does not match the grammar.
 */
export function readSolutionProject(
    reader: TextFileReader,
    formatVersion: number,
    pathResolvers: readonly ProjectPathResolverRegistration[] = DEFAULT_PATH_RESOLVERS
): SolutionFileProject | undefined {
    let header: SolutionProjectHeader | undefined;

    while (reader.hasMore()) {
        const inputLine = reader.readLine();

        if (inputLine.startsWith(SolutionFileMarker.ProjectBegin)) {
            if (header) {
                throw malformed(`Missing ${SolutionFileMarker.ProjectEnd} for project "${header.name}"`, reader);
            }

            header = parseProjectHeader(inputLine);
            if (!header) {
                throw malformed(`Invalid project reference: ${inputLine}`, reader);
            }

            // A resolver consumes the remainder of the block itself
            const resolver = findPathResolver(header.typeGuid, formatVersion, pathResolvers);
            if (resolver) {
                return createProject(header, resolver.getPath(reader));
            }
        } else if (inputLine.trimEnd() === SolutionFileMarker.ProjectEnd) {
            if (!header) {
                throw malformed(`${SolutionFileMarker.ProjectEnd} without a project reference`, reader);
            }

            return createProject(header, header.path);
        }
    }

    if (header) {
        throw malformed(`Missing ${SolutionFileMarker.ProjectEnd} for project "${header.name}"`, reader);
    }

    return undefined;
}

function createProject(header: SolutionProjectHeader, path: string): SolutionFileProject {
    return Object.freeze({
        name: header.name,
        path,
        typeGuid: header.typeGuid,
        uniqueGuid: header.uniqueGuid
    });
}

function malformed(message: string, reader: TextFileReader): MalformedProjectReferenceError {
    return new MalformedProjectReferenceError(message, reader.source, reader.lineNumber);
}
