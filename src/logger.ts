/**
 * Console logging with verbosity levels
 */
import chalk from 'chalk';
import type { Verbosity } from './types/options.js';

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    success(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const LEVELS: Record<Verbosity, ReadonlySet<LogLevel>> = {
    minimal: new Set<LogLevel>(['warn', 'error']),
    standard: new Set<LogLevel>(['info', 'success', 'warn', 'error']),
    detailed: new Set<LogLevel>(['debug', 'info', 'success', 'warn', 'error']),
};

export function isEnabled(verbosity: Verbosity, level: LogLevel): boolean {
    return LEVELS[verbosity].has(level);
}

export function createConsoleLogger(verbosity: Verbosity = 'standard'): Logger {
    const when = (level: LogLevel, write: (message: string) => void) =>
        (message: string) => {
            if (isEnabled(verbosity, level)) write(message);
        };

    return {
        debug: when('debug', m => console.log(chalk.dim(m))),
        info: when('info', m => console.log(m)),
        success: when('success', m => console.log(chalk.green(m))),
        warn: when('warn', m => console.warn(chalk.yellow(`Warning: ${m}`))),
        error: when('error', m => console.error(chalk.red(`Error: ${m}`))),
    };
}

export interface LogEntry {
    level: LogLevel;
    message: string;
}

export interface MemoryLogger extends Logger {
    entries: LogEntry[];
    messages(level: LogLevel): string[];
}

/**
 * Collects entries instead of printing; used by tests.
 */
export function createMemoryLogger(verbosity: Verbosity = 'detailed'): MemoryLogger {
    const entries: LogEntry[] = [];
    const at = (level: LogLevel) => (message: string) => {
        if (isEnabled(verbosity, level)) entries.push({ level, message });
    };
    return {
        entries,
        messages: (level) => entries.filter(e => e.level === level).map(e => e.message),
        debug: at('debug'),
        info: at('info'),
        success: at('success'),
        warn: at('warn'),
        error: at('error'),
    };
}
