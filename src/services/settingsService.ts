import { SKIP_DIRECTORIES } from '../core/constants';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Library-wide settings. Every value has a default, so an empty environment is valid.
 */
export interface VsFileSettings {
    logLevel: LogLevel;
    /** Whether wildcard paths given to VisualStudioFiles also match in subdirectories. */
    recursiveSearch: boolean;
    /** Directory names skipped when a wildcard search recurses. */
    excludeDirectories: string[];
}

export type SettingsSource = Record<string, string | undefined>;

/**
 * Service for reading settings from environment variables
 */
export class SettingsService {
    private static readonly PREFIX = 'VSFILE_';
    private static cached: VsFileSettings | undefined;

    static defaults(): VsFileSettings {
        return {
            logLevel: 'warn',
            recursiveSearch: false,
            excludeDirectories: [...SKIP_DIRECTORIES]
        };
    }

    /**
     * Reads settings from the given source. Unrecognised values fall back to their defaults.
     */
    static load(source: SettingsSource = process.env): VsFileSettings {
        const defaults = this.defaults();

        return {
            logLevel: this.parseLogLevel(source[`${this.PREFIX}LOG_LEVEL`]) ?? defaults.logLevel,
            recursiveSearch: this.parseBoolean(source[`${this.PREFIX}RECURSIVE_SEARCH`]) ?? defaults.recursiveSearch,
            excludeDirectories: this.parseList(source[`${this.PREFIX}EXCLUDE_DIRECTORIES`]) ?? defaults.excludeDirectories
        };
    }

    /**
     * Settings of the current process, read once from the environment
     */
    static current(): VsFileSettings {
        if (!this.cached) {
            this.cached = this.load();
        }
        return this.cached;
    }

    /**
     * Replaces (or, without an argument, forgets) the cached process settings
     */
    static reset(settings?: Partial<VsFileSettings>): void {
        this.cached = settings ? { ...this.load(), ...settings } : undefined;
    }

    private static parseLogLevel(value: string | undefined): LogLevel | undefined {
        const normalized = value?.trim().toLowerCase();
        return LOG_LEVELS.find(level => level === normalized);
    }

    private static parseBoolean(value: string | undefined): boolean | undefined {
        switch (value?.trim().toLowerCase()) {
            case 'true':
            case '1':
                return true;
            case 'false':
            case '0':
                return false;
            default:
                return undefined;
        }
    }

    private static parseList(value: string | undefined): string[] | undefined {
        if (value === undefined) {
            return undefined;
        }

        const items = value.split(',')
            .map(item => item.trim())
            .filter(item => item.length > 0);

        return items.length > 0 ? items : undefined;
    }
}
