export { SolutionFile, SolutionFileOptions } from './core/SolutionFile';
export { ProjectFile, ProjectFileOptions } from './core/ProjectFile';
export { WebSiteDirectory, WebSiteDirectoryOptions } from './core/WebSiteDirectory';
export { VisualStudioFiles, VisualStudioFilesOptions } from './core/VisualStudioFiles';
export {
    FILE_EXTENSIONS,
    PROJECT_SOURCE_KINDS,
    ProjectFileKind,
    SourceFile,
    SourceFileKind,
    VisualStudioFileInfo,
    VisualStudioFileKind,
    checkFile,
    createFileInfo,
    kindFromExtension,
    resolveRelativePath
} from './core/visualStudioFile';
export {
    EndOfInputError,
    InvalidArgumentError,
    MalformedHeaderError,
    MalformedProjectReferenceError,
    MalformedSolutionFileError,
    NotFoundError,
    VsFileError,
    VsFileErrorCode,
    VsFileErrorCodeType,
    WrongExtensionError
} from './core/errors';
export { ProjectTypeGuid, SolutionFileFormatVersion } from './core/constants';
export { Logger, LogLevel, logger } from './core/logger';
export { SettingsService, VsFileSettings } from './services/settingsService';
export {
    DEFAULT_PATH_RESOLVERS,
    ProjectPathResolver,
    ProjectPathResolverRegistration,
    WebSitePathResolver,
    definePathResolver,
    findPathResolver
} from './parsers/projectPathResolvers';
export { readSolutionHeader } from './parsers/solutionHeaderReader';
export { parseProjectHeader, readSolutionProject } from './parsers/solutionProjectReader';
export { CompileItem, ProjectFileParser, getCompileItems } from './parsers/projectFileParser';
export { IFileSystem, NodeFileSystem } from './system/fileSystem';
export { FileTextReader, FileTextReaderFactory, StringTextReader, TextFileReader, TextFileReaderFactory } from './system/textFileReader';
export { IXmlFileReader, XmlElement, XmlFileReader, parseXml } from './system/xmlFileReader';
export { SolutionFileProject, SolutionProjectHeader } from './types/solution';
