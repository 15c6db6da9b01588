import { ProjectTypeGuid, SolutionFileFormatVersion, SolutionFileMarker } from '../core/constants';
import { MalformedProjectReferenceError } from '../core/errors';
import { TextFileReader } from '../system/textFileReader';

/**
 * Recovers the real relative path of a project whose reference line does not hold it.
 *
 * The reader is positioned just after the `Project(...)` line. A resolver consumes
 * the rest of the block, including its `EndProject` line, and returns the path.
 */
export interface ProjectPathResolver {
    getPath(reader: TextFileReader): string;
}

export interface ProjectPathResolverRegistration {
    readonly typeGuid: string;
    readonly minimumFormatVersion: number;
    create(): ProjectPathResolver;
}

export function definePathResolver(
    typeGuid: string,
    minimumFormatVersion: number,
    create: () => ProjectPathResolver
): ProjectPathResolverRegistration {
    return Object.freeze({
        typeGuid: typeGuid.toUpperCase(),
        minimumFormatVersion: Math.max(minimumFormatVersion, SolutionFileFormatVersion.Minimum),
        create
    });
}

export function isMatch(registration: ProjectPathResolverRegistration, typeGuid: string, formatVersion: number): boolean {
    return registration.typeGuid === typeGuid.toUpperCase() && formatVersion >= registration.minimumFormatVersion;
}

/**
 * Web sites are listed by URL or display name; the solution-relative
 * directory is the `SlnRelativePath` entry of the block's project section.
 */
export class WebSitePathResolver implements ProjectPathResolver {
    private static readonly RELATIVE_PATH_KEY = 'SlnRelativePath';
    private static readonly KEY_VALUE_PATTERN = /^(.+) = "(.+)"$/;

    getPath(reader: TextFileReader): string {
        let relativePath: string | undefined;

        while (reader.hasMore()) {
            const rawLine = reader.readLine();

            // Another reference starts before this block was closed
            if (rawLine.startsWith(SolutionFileMarker.ProjectBegin)) {
                throw new MalformedProjectReferenceError(
                    `Missing ${SolutionFileMarker.ProjectEnd} before next project reference`,
                    reader.source,
                    reader.lineNumber
                );
            }

            const inputLine = rawLine.trim();

            if (inputLine === SolutionFileMarker.ProjectEnd) {
                if (relativePath !== undefined) {
                    return relativePath;
                }
                break;
            }

            // Key already found; skip to the end of the block
            if (relativePath !== undefined) {
                continue;
            }

            if (inputLine === SolutionFileMarker.ProjectSectionEnd) {
                break;
            }

            const match = WebSitePathResolver.KEY_VALUE_PATTERN.exec(inputLine);
            if (match && match[1].trim() === WebSitePathResolver.RELATIVE_PATH_KEY) {
                relativePath = match[2];
            }
        }

        const message = relativePath === undefined
            ? `Web site project reference has no ${WebSitePathResolver.RELATIVE_PATH_KEY} entry`
            : `Missing ${SolutionFileMarker.ProjectEnd} after web site project reference`;

        throw new MalformedProjectReferenceError(message, reader.source, reader.lineNumber);
    }
}

export const DEFAULT_PATH_RESOLVERS: readonly ProjectPathResolverRegistration[] = Object.freeze([
    definePathResolver(ProjectTypeGuid.WebSite, SolutionFileFormatVersion.VisualStudio2012, () => new WebSitePathResolver())
]);

/**
 * Resolver for the project type at the given format version, or undefined when
 * the path in the reference line is already correct
 */
export function findPathResolver(
    typeGuid: string,
    formatVersion: number,
    registrations: readonly ProjectPathResolverRegistration[] = DEFAULT_PATH_RESOLVERS
): ProjectPathResolver | undefined {
    return registrations.find(registration => isMatch(registration, typeGuid, formatVersion))?.create();
}
