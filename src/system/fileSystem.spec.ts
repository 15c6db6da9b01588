import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { NodeFileSystem } from './fileSystem';

describe('NodeFileSystem', () => {
  let tempDir: string;
  const fileSystem = new NodeFileSystem(['bin', 'obj']);

  function touch(...segments: string[]): string {
    const filePath = path.join(tempDir, ...segments);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '');
    return filePath;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vsfile-fs-'));
    touch('one.cs');
    touch('two.cs');
    touch('three.vb');
    touch('sub', 'four.cs');
    touch('bin', 'Debug', 'Generated.cs');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('fileExists', () => {
    it('should be true only for existing files', () => {
      expect(fileSystem.fileExists(path.join(tempDir, 'one.cs'))).toBe(true);
      expect(fileSystem.fileExists(path.join(tempDir, 'sub'))).toBe(false);
      expect(fileSystem.fileExists(path.join(tempDir, 'missing.cs'))).toBe(false);
    });
  });

  describe('directoryExists', () => {
    it('should be true only for existing directories', () => {
      expect(fileSystem.directoryExists(path.join(tempDir, 'sub'))).toBe(true);
      expect(fileSystem.directoryExists(path.join(tempDir, 'one.cs'))).toBe(false);
      expect(fileSystem.directoryExists(path.join(tempDir, 'missing'))).toBe(false);
    });
  });

  describe('currentDirectory', () => {
    it('should return the working directory of the process', () => {
      expect(fileSystem.currentDirectory()).toBe(process.cwd());
    });
  });

  describe('listFiles', () => {
    it('should list matching files in the top directory only', () => {
      expect(fileSystem.listFiles(tempDir, '*.cs')).toEqual([
        path.join(tempDir, 'one.cs'),
        path.join(tempDir, 'two.cs')
      ]);
    });

    it('should match single characters with ?', () => {
      expect(fileSystem.listFiles(tempDir, 't??.*')).toEqual([
        path.join(tempDir, 'two.cs')
      ]);
    });

    it('should search subdirectories but skip excluded ones when recursive', () => {
      expect(fileSystem.listFiles(tempDir, '*.cs', true)).toEqual([
        path.join(tempDir, 'one.cs'),
        path.join(tempDir, 'sub', 'four.cs'),
        path.join(tempDir, 'two.cs')
      ]);
    });

    it('should return nothing when no file matches', () => {
      expect(fileSystem.listFiles(tempDir, '*.fs')).toEqual([]);
    });
  });
});
