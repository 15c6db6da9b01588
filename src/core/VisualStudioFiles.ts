import * as path from 'path';
import { hasWildcard } from './constants';
import { NotFoundError, requireText } from './errors';
import { logger } from './logger';
import { ProjectFile, ProjectFileOptions } from './ProjectFile';
import { SolutionFile, SolutionFileOptions } from './SolutionFile';
import { VisualStudioFileInfo, VisualStudioFileKind, createFileInfo, kindFromExtension, toPlatformSeparators } from './visualStudioFile';
import { SettingsService } from '../services/settingsService';
import { IFileSystem, NodeFileSystem } from '../system/fileSystem';

export interface VisualStudioFilesOptions extends SolutionFileOptions, ProjectFileOptions {
    /** Expand wildcards in subdirectories as well; defaults to the `recursiveSearch` setting */
    recursiveSearch?: boolean;
}

const log = logger('VisualStudioFiles');

/**
 * Sorts a list of file paths into solution, project and source files.
 *
 * A `*` or `?` in the file name part of a path is expanded; a path with a
 * wildcard in its directory part is skipped, as is any file whose extension
 * is not a Visual Studio one. Nothing is loaded.
 */
export class VisualStudioFiles {
    private readonly _options: VisualStudioFilesOptions;
    private readonly _fileSystem: IFileSystem;
    private readonly _recursiveSearch: boolean;

    private readonly _solutionFiles: SolutionFile[] = [];
    private readonly _basicProjectFiles: ProjectFile<'basicProject'>[] = [];
    private readonly _cSharpProjectFiles: ProjectFile<'cSharpProject'>[] = [];
    private readonly _fSharpProjectFiles: ProjectFile<'fSharpProject'>[] = [];
    private readonly _basicSourceFiles: VisualStudioFileInfo<'basicSource'>[] = [];
    private readonly _cSharpSourceFiles: VisualStudioFileInfo<'cSharpSource'>[] = [];
    private readonly _fSharpSourceFiles: VisualStudioFileInfo<'fSharpSource'>[] = [];

    constructor(filePaths: readonly string[], options: VisualStudioFilesOptions = {}) {
        this._fileSystem = options.fileSystem ?? new NodeFileSystem();
        this._options = { ...options, fileSystem: this._fileSystem };
        this._recursiveSearch = options.recursiveSearch ?? SettingsService.current().recursiveSearch;

        for (const filePath of filePaths) {
            this.addPath(filePath);
        }
    }

    get recursiveSearch(): boolean {
        return this._recursiveSearch;
    }

    get solutionFiles(): readonly SolutionFile[] {
        return this._solutionFiles;
    }

    get basicProjectFiles(): readonly ProjectFile<'basicProject'>[] {
        return this._basicProjectFiles;
    }

    get cSharpProjectFiles(): readonly ProjectFile<'cSharpProject'>[] {
        return this._cSharpProjectFiles;
    }

    get fSharpProjectFiles(): readonly ProjectFile<'fSharpProject'>[] {
        return this._fSharpProjectFiles;
    }

    get basicSourceFiles(): readonly VisualStudioFileInfo<'basicSource'>[] {
        return this._basicSourceFiles;
    }

    get cSharpSourceFiles(): readonly VisualStudioFileInfo<'cSharpSource'>[] {
        return this._cSharpSourceFiles;
    }

    get fSharpSourceFiles(): readonly VisualStudioFileInfo<'fSharpSource'>[] {
        return this._fSharpSourceFiles;
    }

    private addPath(filePath: string): void {
        const normalized = toPlatformSeparators(requireText(filePath, 'filePath'));
        const fileName = path.basename(normalized);

        const directoryPath = fileName === normalized
            ? this._fileSystem.currentDirectory()
            : path.dirname(normalized);

        if (hasWildcard(directoryPath)) {
            log.debug(`Skipping ${filePath}: wildcards are only expanded in file names`);
            return;
        }

        if (hasWildcard(fileName)) {
            const matches = this._fileSystem.listFiles(directoryPath, fileName, this._recursiveSearch);
            for (const match of matches) {
                this.addFilePath(match);
            }
            return;
        }

        this.addFilePath(normalized);
    }

    private addFilePath(filePath: string): void {
        const kind = kindFromExtension(path.extname(filePath));
        if (kind === undefined) {
            return;
        }

        if (!this._fileSystem.fileExists(filePath)) {
            throw new NotFoundError(filePath);
        }

        this.addFile(kind, filePath);
    }

    private addFile(kind: VisualStudioFileKind, filePath: string): void {
        const fileSystem = this._fileSystem;

        switch (kind) {
            case 'solution':
                this._solutionFiles.push(new SolutionFile(filePath, this._options));
                break;
            case 'basicProject':
                this._basicProjectFiles.push(new ProjectFile(kind, filePath, undefined, this._options));
                break;
            case 'cSharpProject':
                this._cSharpProjectFiles.push(new ProjectFile(kind, filePath, undefined, this._options));
                break;
            case 'fSharpProject':
                this._fSharpProjectFiles.push(new ProjectFile(kind, filePath, undefined, this._options));
                break;
            case 'basicSource':
                this._basicSourceFiles.push(createFileInfo(kind, filePath, fileSystem));
                break;
            case 'cSharpSource':
                this._cSharpSourceFiles.push(createFileInfo(kind, filePath, fileSystem));
                break;
            case 'fSharpSource':
                this._fSharpSourceFiles.push(createFileInfo(kind, filePath, fileSystem));
                break;
        }
    }
}
