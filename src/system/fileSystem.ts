import * as fs from 'fs';
import * as path from 'path';
import { globSync } from 'glob';
import { createExcludePatterns, isExcluded } from '../core/constants';
import { SettingsService } from '../services/settingsService';

/**
 * File system operations used to locate Visual Studio files
 */
export interface IFileSystem {
    fileExists(filePath: string): boolean;
    directoryExists(directoryPath: string): boolean;
    currentDirectory(): string;
    /**
     * Lists files in a directory whose names match a `*`/`?` pattern,
     * optionally searching subdirectories too. Returns absolute paths in sorted order.
     */
    listFiles(directoryPath: string, pattern: string, recursive?: boolean): string[];
}

export class NodeFileSystem implements IFileSystem {
    constructor(private readonly excludeDirectories?: readonly string[]) { }

    fileExists(filePath: string): boolean {
        return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
    }

    directoryExists(directoryPath: string): boolean {
        return fs.existsSync(directoryPath) && fs.statSync(directoryPath).isDirectory();
    }

    currentDirectory(): string {
        return process.cwd();
    }

    listFiles(directoryPath: string, pattern: string, recursive = false): string[] {
        const files = globSync(recursive ? `**/${pattern}` : pattern, {
            cwd: directoryPath,
            absolute: true,
            nodir: true,
            nocase: true,
            dot: true
        });

        const patterns = createExcludePatterns(this.excludeDirectories ?? SettingsService.current().excludeDirectories);

        return files
            .filter(file => !recursive || !isExcluded(file, directoryPath, patterns))
            .map(file => path.normalize(file))
            .sort();
    }
}
