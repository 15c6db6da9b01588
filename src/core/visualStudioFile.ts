import * as path from 'path';
import { InvalidArgumentError, NotFoundError, WrongExtensionError, requireText } from './errors';
import { IFileSystem } from '../system/fileSystem';

export type SourceFileKind = 'basicSource' | 'cSharpSource' | 'fSharpSource';
export type ProjectFileKind = 'basicProject' | 'cSharpProject' | 'fSharpProject';
export type VisualStudioFileKind = 'solution' | ProjectFileKind | SourceFileKind;

/**
 * The fixed extension of every file kind
 */
export const FILE_EXTENSIONS: Readonly<Record<VisualStudioFileKind, string>> = {
    solution: '.sln',
    basicProject: '.vbproj',
    cSharpProject: '.csproj',
    fSharpProject: '.fsproj',
    basicSource: '.vb',
    cSharpSource: '.cs',
    fSharpSource: '.fs'
};

/**
 * Source file kind compiled by each project kind
 */
export const PROJECT_SOURCE_KINDS: Readonly<Record<ProjectFileKind, SourceFileKind>> = {
    basicProject: 'basicSource',
    cSharpProject: 'cSharpSource',
    fSharpProject: 'fSharpSource'
};

const KINDS = Object.keys(FILE_EXTENSIONS).filter(isFileKind);

function isFileKind(value: string): value is VisualStudioFileKind {
    return Object.prototype.hasOwnProperty.call(FILE_EXTENSIONS, value);
}

/**
 * A located file: its kind, path and the parts derived from the path
 */
export interface VisualStudioFileInfo<K extends VisualStudioFileKind = VisualStudioFileKind> {
    readonly kind: K;
    readonly filePath: string;
    readonly directoryPath: string;
    readonly fileName: string;
    readonly fileNameNoExtension: string;
    /** Extension expected for the kind, not necessarily the one the path has */
    readonly fileExtension: string;
}

export type SourceFile = VisualStudioFileInfo<SourceFileKind>;

export function createFileInfo<K extends VisualStudioFileKind>(kind: K, filePath: string, fileSystem: IFileSystem): VisualStudioFileInfo<K> {
    const normalized = toPlatformSeparators(requireText(filePath, 'filePath'));
    const fileName = path.basename(normalized);

    // A bare file name lives in the current directory
    const directoryPath = fileName === normalized
        ? fileSystem.currentDirectory()
        : path.dirname(normalized);

    if (fileName.length === 0) {
        throw new InvalidArgumentError('filePath', `Invalid filePath: no file name in ${filePath}`);
    }

    return Object.freeze({
        kind,
        filePath: normalized,
        directoryPath,
        fileName,
        fileNameNoExtension: path.basename(normalized, path.extname(normalized)),
        fileExtension: FILE_EXTENSIONS[kind]
    });
}

/**
 * Fails unless the file exists and has the extension of its kind
 */
export function checkFile(info: VisualStudioFileInfo, fileSystem: IFileSystem): void {
    if (!fileSystem.fileExists(info.filePath)) {
        throw new NotFoundError(info.filePath);
    }

    if (!hasExtension(info.filePath, info.fileExtension)) {
        throw new WrongExtensionError(info.filePath, info.fileExtension);
    }
}

export function hasExtension(filePath: string, extension: string): boolean {
    return path.extname(filePath).toLowerCase() === extension.toLowerCase();
}

export function kindFromExtension(extension: string): VisualStudioFileKind | undefined {
    const normalized = extension.toLowerCase();
    return KINDS.find(kind => FILE_EXTENSIONS[kind] === normalized);
}

export function toPlatformSeparators(filePath: string): string {
    return filePath.replace(/\\/g, path.sep);
}

/**
 * Joins a path written in a Visual Studio file (Windows separators) with the
 * directory of that file. Absolute paths are kept; trailing separators are removed.
 */
export function resolveRelativePath(directoryPath: string, relativePath: string): string {
    const normalized = toPlatformSeparators(relativePath);
    const joined = path.isAbsolute(normalized)
        ? path.normalize(normalized)
        : path.join(directoryPath, normalized);
    const root = path.parse(joined).root;

    let end = joined.length;
    while (end > root.length && (joined[end - 1] === path.sep || joined[end - 1] === '/')) {
        end--;
    }
    return joined.slice(0, end);
}
