import * as path from 'path';
import { ProjectTypeGuid } from './constants';
import { logger } from './logger';
import { ProjectFile } from './ProjectFile';
import { FILE_EXTENSIONS, VisualStudioFileInfo, checkFile, createFileInfo, resolveRelativePath } from './visualStudioFile';
import { WebSiteDirectory } from './WebSiteDirectory';
import { DEFAULT_PATH_RESOLVERS, ProjectPathResolverRegistration } from '../parsers/projectPathResolvers';
import { readSolutionHeader } from '../parsers/solutionHeaderReader';
import { readSolutionProject } from '../parsers/solutionProjectReader';
import { IFileSystem, NodeFileSystem } from '../system/fileSystem';
import { FileTextReaderFactory, TextFileReader, TextFileReaderFactory } from '../system/textFileReader';
import { IXmlFileReader, XmlFileReader } from '../system/xmlFileReader';
import { SolutionFileProject } from '../types/solution';

export interface SolutionFileOptions {
    fileSystem?: IFileSystem;
    textFileReaderFactory?: TextFileReaderFactory;
    /** Given to the project files the solution references */
    xmlFileReader?: IXmlFileReader;
    /** Replaces the built-in project path resolvers */
    pathResolvers?: readonly ProjectPathResolverRegistration[];
}

interface SolutionContents {
    formatVersion: number;
    projects: SolutionFileProject[];
    basicProjectFiles: ProjectFile<'basicProject'>[];
    cSharpProjectFiles: ProjectFile<'cSharpProject'>[];
    fSharpProjectFiles: ProjectFile<'fSharpProject'>[];
    webSiteDirectories: WebSiteDirectory[];
}

function emptyContents(formatVersion = 0): SolutionContents {
    return {
        formatVersion,
        projects: [],
        basicProjectFiles: [],
        cSharpProjectFiles: [],
        fSharpProjectFiles: [],
        webSiteDirectories: []
    };
}

const log = logger('SolutionFile');

/**
 * A Visual Studio solution file and the projects and web sites it references.
 *
 * Every collection is empty until `load()` succeeds, and each `load()` replaces
 * the previous result in full. A failed load leaves every collection empty and
 * the format version at 0. The referenced projects are not loaded.
 */
export class SolutionFile {
    static readonly extension = FILE_EXTENSIONS.solution;

    private readonly _info: VisualStudioFileInfo<'solution'>;
    private readonly _fileSystem: IFileSystem;
    private readonly _textFileReaderFactory: TextFileReaderFactory;
    private readonly _xmlFileReader: IXmlFileReader;
    private readonly _pathResolvers: readonly ProjectPathResolverRegistration[];
    private _contents: SolutionContents = emptyContents();

    constructor(filePath: string, options: SolutionFileOptions = {}) {
        this._fileSystem = options.fileSystem ?? new NodeFileSystem();
        this._textFileReaderFactory = options.textFileReaderFactory ?? new FileTextReaderFactory();
        this._xmlFileReader = options.xmlFileReader ?? new XmlFileReader();
        this._pathResolvers = options.pathResolvers ?? DEFAULT_PATH_RESOLVERS;
        this._info = createFileInfo('solution', filePath, this._fileSystem);
    }

    get info(): VisualStudioFileInfo<'solution'> {
        return this._info;
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

    /** Major format version from the header of the last loaded file, 0 before that */
    get formatVersion(): number {
        return this._contents.formatVersion;
    }

    /** Every project reference in file order, including types with no typed collection */
    get projects(): readonly SolutionFileProject[] {
        return this._contents.projects;
    }

    get basicProjectFiles(): readonly ProjectFile<'basicProject'>[] {
        return this._contents.basicProjectFiles;
    }

    get cSharpProjectFiles(): readonly ProjectFile<'cSharpProject'>[] {
        return this._contents.cSharpProjectFiles;
    }

    get fSharpProjectFiles(): readonly ProjectFile<'fSharpProject'>[] {
        return this._contents.fSharpProjectFiles;
    }

    get webSiteDirectories(): readonly WebSiteDirectory[] {
        return this._contents.webSiteDirectories;
    }

    load(): void {
        checkFile(this._info, this._fileSystem);

        // Cleared before reading, so a failed load does not keep the previous result
        this._contents = emptyContents();

        const reader = this._textFileReaderFactory.create(this.filePath);
        try {
            this._contents = this.read(reader);
        } catch (error) {
            log.debug(`Failed to load solution ${this.filePath}:`, error);
            throw error;
        } finally {
            reader.close();
        }

        log.debug(`Loaded solution ${this.fileName} (format version ${this.formatVersion}) with ${this.projects.length} project references`);
    }

    private read(reader: TextFileReader): SolutionContents {
        const formatVersion = readSolutionHeader(reader);
        const contents = emptyContents(formatVersion);

        let project: SolutionFileProject | undefined;
        while ((project = readSolutionProject(reader, formatVersion, this._pathResolvers)) !== undefined) {
            contents.projects.push(project);
            this.addProject(contents, project);
        }

        return contents;
    }

    private addProject(contents: SolutionContents, project: SolutionFileProject): void {
        const fullPath = resolveRelativePath(this.directoryPath, project.path);
        const projectOptions = { fileSystem: this._fileSystem, xmlFileReader: this._xmlFileReader };

        switch (project.typeGuid.toUpperCase()) {
            case ProjectTypeGuid.Basic:
                contents.basicProjectFiles.push(new ProjectFile('basicProject', fullPath, project.name, projectOptions));
                break;
            case ProjectTypeGuid.CSharp:
                contents.cSharpProjectFiles.push(new ProjectFile('cSharpProject', fullPath, project.name, projectOptions));
                break;
            case ProjectTypeGuid.FSharp:
                contents.fSharpProjectFiles.push(new ProjectFile('fSharpProject', fullPath, project.name, projectOptions));
                break;
            case ProjectTypeGuid.WebSite:
                contents.webSiteDirectories.push(new WebSiteDirectory(webSiteName(project.name, fullPath), fullPath, { fileSystem: this._fileSystem }));
                break;
            default:
                log.debug(`Skipping project ${project.name} of unsupported type {${project.typeGuid}}`);
        }
    }
}

// A blank name falls back to the directory name
function webSiteName(name: string, directoryPath: string): string {
    return name.trim().length > 0 ? name : path.basename(directoryPath);
}
