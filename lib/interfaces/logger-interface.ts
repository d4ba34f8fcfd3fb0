export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Logger abstraction interface for testability
 */
export interface ILogger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Default implementation writing to the console
 */
export class ConsoleLogger implements ILogger {
    constructor(private readonly level: LogLevel = 'info') {}

    debug(message: string): void {
        if (this.enabled('debug')) console.debug(message);
    }

    info(message: string): void {
        if (this.enabled('info')) console.log(message);
    }

    warn(message: string): void {
        if (this.enabled('warn')) console.warn(`Warning: ${message}`);
    }

    error(message: string): void {
        if (this.enabled('error')) console.error(`Error: ${message}`);
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }
}
