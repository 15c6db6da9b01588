import * as path from 'path';
import { NotFoundError, WrongExtensionError } from './errors';
import { ProjectFile } from './ProjectFile';
import { IFileSystem } from '../system/fileSystem';
import { IXmlFileReader, parseXml } from '../system/xmlFileReader';

describe('ProjectFile', () => {
  const fixturePath = path.join(__dirname, '..', '__fixtures__', 'sample-solution', 'src');

  describe('with project files on disk', () => {
    it('should list hand-written sources of its own language', async () => {
      const directory = path.join(fixturePath, 'CSharpApp');
      const project = new ProjectFile('cSharpProject', path.join(directory, 'CSharpApp.csproj'));

      await project.load();

      expect(project.sourceFiles.map(file => file.filePath)).toEqual([
        path.join(directory, 'Program.cs'),
        path.join(directory, 'Properties', 'AssemblyInfo.cs')
      ]);
      expect(project.sourceFiles.map(file => file.kind)).toEqual(['cSharpSource', 'cSharpSource']);
    });

    it('should keep directory names with spaces', async () => {
      const directory = path.join(fixturePath, 'BasicApp');
      const project = new ProjectFile('basicProject', path.join(directory, 'BasicApp.vbproj'));

      await project.load();

      expect(project.sourceFiles.map(file => file.filePath)).toEqual([
        path.join(directory, 'Module1.vb'),
        path.join(directory, 'My Project', 'AssemblyInfo.vb')
      ]);
    });

    it('should read SDK-style project files', async () => {
      const project = new ProjectFile('fSharpProject', path.join(fixturePath, 'FSharpApp', 'FSharpApp.fsproj'));

      await project.load();

      expect(project.sourceFiles.map(file => file.fileName)).toEqual(['Library.fs', 'Program.fs']);
    });

    it('should fail for a missing file', async () => {
      const project = new ProjectFile('cSharpProject', path.join(fixturePath, 'Missing', 'Missing.csproj'));

      await expect(project.load()).rejects.toThrow(NotFoundError);
    });

    it('should fail for a file of another project kind', async () => {
      const project = new ProjectFile('cSharpProject', path.join(fixturePath, 'BasicApp', 'BasicApp.vbproj'));

      await expect(project.load()).rejects.toThrow(WrongExtensionError);
    });
  });

  describe('with a fake reader', () => {
    const projectPath = path.join(path.sep, 'work', 'App', 'App.csproj');
    const fileSystem: IFileSystem = {
      fileExists: jest.fn(() => true),
      directoryExists: jest.fn(() => true),
      currentDirectory: jest.fn(() => path.sep),
      listFiles: jest.fn(() => [])
    };

    function readerOf(xml: string): IXmlFileReader {
      return { load: jest.fn(() => parseXml(xml)) };
    }

    it('should default the project name to the file name', () => {
      expect(new ProjectFile('cSharpProject', projectPath, undefined, { fileSystem }).projectName).toBe('App');
      expect(new ProjectFile('cSharpProject', projectPath, ' ', { fileSystem }).projectName).toBe('App');
      expect(new ProjectFile('cSharpProject', projectPath, 'Web App', { fileSystem }).projectName).toBe('Web App');
    });

    it('should expose the file parts and source extension', () => {
      const project = new ProjectFile('fSharpProject', 'Lib\\Lib.fsproj', undefined, { fileSystem });

      expect(project.kind).toBe('fSharpProject');
      expect(project.filePath).toBe(path.join('Lib', 'Lib.fsproj'));
      expect(project.directoryPath).toBe('Lib');
      expect(project.fileName).toBe('Lib.fsproj');
      expect(project.fileNameNoExtension).toBe('Lib');
      expect(project.fileExtension).toBe('.fsproj');
      expect(project.sourceFileExtension).toBe('.fs');
      expect(project.sourceFiles).toEqual([]);
    });

    it('should match source extensions ignoring case and resolve nested paths', async () => {
      const xmlFileReader = readerOf(`<Project><ItemGroup>
  <Compile Include="Main.CS" />
  <Compile Include="..\\Shared\\Util.cs" />
  <Compile Include="Notes.txt" />
</ItemGroup></Project>`);
      const project = new ProjectFile('cSharpProject', projectPath, undefined, { fileSystem, xmlFileReader });

      await project.load();

      expect(xmlFileReader.load).toHaveBeenCalledWith(projectPath);
      expect(project.sourceFiles.map(file => file.filePath)).toEqual([
        path.join(path.sep, 'work', 'App', 'Main.CS'),
        path.join(path.sep, 'work', 'Shared', 'Util.cs')
      ]);
    });

    it('should replace the sources of an earlier load', async () => {
      const xmlFileReader = readerOf('<Project><ItemGroup><Compile Include="A.cs" /></ItemGroup></Project>');
      const project = new ProjectFile('cSharpProject', projectPath, undefined, { fileSystem, xmlFileReader });

      await project.load();
      await project.load();

      expect(project.sourceFiles).toHaveLength(1);
    });
  });
});
