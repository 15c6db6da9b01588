import { NotFoundError, requireText } from './errors';
import { logger } from './logger';
import { FILE_EXTENSIONS, SourceFile, VisualStudioFileInfo, createFileInfo, hasExtension } from './visualStudioFile';
import { IFileSystem, NodeFileSystem } from '../system/fileSystem';

export interface WebSiteDirectoryOptions {
    fileSystem?: IFileSystem;
}

const log = logger('WebSiteDirectory');

/**
 * A web site referenced by a solution. It has no project file; its Visual Basic
 * and C# source files are the ones at the top level of its directory.
 */
export class WebSiteDirectory {
    private readonly _name: string;
    private readonly _directoryPath: string;
    private readonly _fileSystem: IFileSystem;
    private _basicSourceFiles: VisualStudioFileInfo<'basicSource'>[] = [];
    private _cSharpSourceFiles: VisualStudioFileInfo<'cSharpSource'>[] = [];

    constructor(name: string, directoryPath: string, options: WebSiteDirectoryOptions = {}) {
        this._name = requireText(name, 'name');
        this._directoryPath = requireText(directoryPath, 'directoryPath');
        this._fileSystem = options.fileSystem ?? new NodeFileSystem();
    }

    get name(): string {
        return this._name;
    }

    get directoryPath(): string {
        return this._directoryPath;
    }

    get basicSourceFiles(): readonly VisualStudioFileInfo<'basicSource'>[] {
        return this._basicSourceFiles;
    }

    get cSharpSourceFiles(): readonly VisualStudioFileInfo<'cSharpSource'>[] {
        return this._cSharpSourceFiles;
    }

    get sourceFiles(): readonly SourceFile[] {
        return [...this._basicSourceFiles, ...this._cSharpSourceFiles];
    }

    load(): void {
        if (!this._fileSystem.directoryExists(this._directoryPath)) {
            throw new NotFoundError(this._directoryPath, 'Directory');
        }

        this._basicSourceFiles = this.listSourceFiles('basicSource');
        this._cSharpSourceFiles = this.listSourceFiles('cSharpSource');

        log.debug(`Web site ${this._name} has ${this._basicSourceFiles.length + this._cSharpSourceFiles.length} source files`);
    }

    private listSourceFiles<K extends 'basicSource' | 'cSharpSource'>(kind: K): VisualStudioFileInfo<K>[] {
        const extension = FILE_EXTENSIONS[kind];

        return this._fileSystem.listFiles(this._directoryPath, `*${extension}`, false)
            .filter(filePath => hasExtension(filePath, extension))
            .map(filePath => createFileInfo(kind, filePath, this._fileSystem));
    }
}
