import * as path from 'path';
import { minimatch } from 'minimatch';

/**
 * Common constants used throughout the library
 */

/**
 * Project type GUIDs of the project kinds a solution can resolve.
 * Stored without braces, as captured from a project reference line.
 */
export const ProjectTypeGuid = {
    Basic: 'F184B08F-C81C-45F6-A57F-5ABD9991F28F',
    CSharp: 'FAE04EC0-301F-11D3-BF4B-00C04F79EFBC',
    FSharp: 'F2A71F9B-5D33-465A-A702-920D77279786',
    WebSite: 'E24C65DC-7377-472B-9ABA-BC803B73C61A'
} as const;

export type ProjectTypeGuidValue = (typeof ProjectTypeGuid)[keyof typeof ProjectTypeGuid];

/**
 * Major format versions written by each Visual Studio release
 */
export const SolutionFileFormatVersion = {
    VisualStudio2002: 7,
    VisualStudio2003: 8,
    VisualStudio2005: 9,
    VisualStudio2008: 10,
    VisualStudio2010: 11,
    VisualStudio2012: 12,
    Minimum: 7
} as const;

export const SOLUTION_FILE_HEADER_PREFIX = 'Microsoft Visual Studio Solution File, Format Version';

/**
 * Directories that are skipped when a wildcard search recurses
 */
export const SKIP_DIRECTORIES = [
    'bin', 'obj', 'node_modules', '.git', '.vs', '.vscode',
    'packages', '.nuget', 'TestResults'
];

export function createExcludePatterns(directories: readonly string[]): string[] {
    return directories.map(dir => `**/${dir}/**`);
}

export const excludePatterns = createExcludePatterns(SKIP_DIRECTORIES);

export function isExcluded(filePath: string, searchRoot?: string, patterns: readonly string[] = excludePatterns): boolean {
    let relPath = filePath;

    // If we have a search root, make path relative to it
    if (searchRoot) {
        relPath = path.relative(searchRoot, filePath);
    }
    relPath = relPath.replace(/\\/g, '/');

    return patterns.some(pattern =>
        minimatch(relPath, pattern, { dot: true })
    );
}

/**
 * Check if a path contains a file name wildcard
 */
export function hasWildcard(filePath: string): boolean {
    return filePath.includes('*') || filePath.includes('?');
}

/**
 * Line markers of a project reference block in a solution file
 */
export const SolutionFileMarker = {
    ProjectBegin: 'Project',
    ProjectEnd: 'EndProject',
    ProjectSectionEnd: 'EndProjectSection'
} as const;
