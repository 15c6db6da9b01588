import { logger } from './logger';
import {
    FILE_EXTENSIONS,
    PROJECT_SOURCE_KINDS,
    ProjectFileKind,
    SourceFile,
    VisualStudioFileInfo,
    checkFile,
    createFileInfo,
    hasExtension,
    resolveRelativePath
} from './visualStudioFile';
import { ProjectFileParser } from '../parsers/projectFileParser';
import { IFileSystem, NodeFileSystem } from '../system/fileSystem';
import { IXmlFileReader, XmlFileReader } from '../system/xmlFileReader';

export interface ProjectFileOptions {
    fileSystem?: IFileSystem;
    xmlFileReader?: IXmlFileReader;
}

const log = logger('ProjectFile');

/**
 * A Visual Basic, C# or F# project file and the source files it compiles.
 * Source files are empty until `load()` succeeds.
 */
export class ProjectFile<K extends ProjectFileKind = ProjectFileKind> {
    private readonly _info: VisualStudioFileInfo<K>;
    private readonly _projectName: string;
    private readonly _fileSystem: IFileSystem;
    private readonly _parser: ProjectFileParser;
    private _sourceFiles: SourceFile[] = [];

    /**
     * @param projectName - name shown in the solution; defaults to the file name without extension
     */
    constructor(kind: K, filePath: string, projectName?: string, options: ProjectFileOptions = {}) {
        this._fileSystem = options.fileSystem ?? new NodeFileSystem();
        this._parser = new ProjectFileParser(options.xmlFileReader ?? new XmlFileReader());
        this._info = createFileInfo(kind, filePath, this._fileSystem);
        this._projectName = projectName && projectName.trim().length > 0
            ? projectName
            : this._info.fileNameNoExtension;
    }

    get kind(): K {
        return this._info.kind;
    }

    get info(): VisualStudioFileInfo<K> {
        return this._info;
    }

    get projectName(): string {
        return this._projectName;
    }

    get filePath(): string {
        return this._info.filePath;
    }

    get directoryPath(): string {
        return this._info.directoryPath;
    }

    get fileName(): string {
        return this._info.fileName;
    }

    get fileNameNoExtension(): string {
        return this._info.fileNameNoExtension;
    }

    get fileExtension(): string {
        return this._info.fileExtension;
    }

    get sourceFileExtension(): string {
        return FILE_EXTENSIONS[PROJECT_SOURCE_KINDS[this.kind]];
    }

    get sourceFiles(): readonly SourceFile[] {
        return this._sourceFiles;
    }

    /**
     * Reads the compile items of the project, skipping auto-generated items and
     * files of other languages. Replaces the result of any earlier load.
     */
    async load(): Promise<void> {
        checkFile(this._info, this._fileSystem);
        this._sourceFiles = [];

        const sourceKind = PROJECT_SOURCE_KINDS[this.kind];
        const items = await this._parser.parseCompileItems(this.filePath);

        this._sourceFiles = items
            .filter(item => !item.autoGenerated && hasExtension(item.include, this.sourceFileExtension))
            .map(item => createFileInfo(sourceKind, resolveRelativePath(this.directoryPath, item.include), this._fileSystem));

        log.debug(`Project ${this._projectName} compiles ${this._sourceFiles.length} source files`);
    }
}
