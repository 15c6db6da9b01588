import { LogLevel, SettingsService } from '../services/settingsService';

export type { LogLevel };

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

type EmittedLevel = Exclude<LogLevel, 'silent'>;

const severity: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

class ConsoleLogger implements Logger {
    constructor(private readonly name: string) { }

    private static levelMap: Record<EmittedLevel, string> = {
        debug: "DBG",
        info: "INF",
        warn: "WRN",
        error: "ERR",
    };

    private isEnabled(level: EmittedLevel): boolean {
        return severity[level] >= severity[SettingsService.current().logLevel];
    }

    private formatMessage(level: EmittedLevel, message: string): string {
        const now = new Date();
        const timestamp = now.toLocaleTimeString("en-GB", {
            hour: "2-digit",
            minute: "2-digit",
            second: "2-digit",
            hour12: false,
        });
        const ms = now.getMilliseconds().toString().padStart(3, "0");

        const lvl = ConsoleLogger.levelMap[level];
        return `vsfile ${timestamp}.${ms} [${lvl}] ${this.name}: ${message}`;
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.isEnabled("debug")) {
            console.debug(this.formatMessage("debug", message), ...args);
        }
    }

    info(message: string, ...args: unknown[]): void {
        if (this.isEnabled("info")) {
            console.log(this.formatMessage("info", message), ...args);
        }
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.isEnabled("warn")) {
            console.warn(this.formatMessage("warn", message), ...args);
        }
    }

    error(message: string, ...args: unknown[]): void {
        if (this.isEnabled("error")) {
            console.error(this.formatMessage("error", message), ...args);
        }
    }
}

/**
 * Creates a named logger. The level is read from settings on every call.
 */
export function logger(name: string): Logger {
    return new ConsoleLogger(name);
}
