// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.js';

import chalk from 'chalk';

const loggerMap: Record<string, Logger> = {};

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

const levelStyles: Record<LogLevel, { label: string; paint: (text: string) => string; channel: keyof ILogFacility }> = {
    info: { label: 'INFO', paint: chalk.blue, channel: 'log' },
    success: { label: 'SUCCESS', paint: chalk.green, channel: 'log' },
    warn: { label: 'WARNING', paint: chalk.yellow, channel: 'warn' },
    error: { label: 'ERROR', paint: chalk.red, channel: 'error' },
    debug: { label: 'DEBUG', paint: chalk.magenta, channel: 'log' },
};

/**
 * Logger handed to the converter and batch runs. Every message is kept per level
 * for callers to inspect after a run; debug lines reach the facility only in
 * verbose mode.
 */
class Logger implements ILogger {
    readonly messages: Record<LogLevel, string[]> = { info: [], success: [], warn: [], error: [], debug: [] };

    constructor(
        readonly name: string,
        readonly facility: ILogFacility,
        readonly verbose = false,
    ) {}

    get debugMessages(): string[] {
        return this.messages.debug;
    }

    get errorMessages(): string[] {
        return this.messages.error;
    }

    info(message: string) {
        this.write('info', message);
    }

    success(message: string) {
        this.write('success', message);
    }

    warn(message: string) {
        this.write('warn', message);
    }

    error(message: string) {
        this.write('error', message);
    }

    debug(message: string) {
        this.write('debug', message, this.verbose);
    }

    private write(level: LogLevel, message: string, print = true): void {
        this.messages[level].push(message);
        if (!print) {
            return;
        }
        const { label, paint, channel } = levelStyles[level];
        this.facility[channel](paint(`[${label}] ${this.name} :: ${message}`));
    }
}

/**
 * Retrieves a logger by name, creating it on first use. A cached logger is replaced
 * when it was created with a different facility or verbosity.
 *
 * @param name - The name printed in front of every line.
 * @param logFacility - Where the lines go; defaults to the console.
 * @param verbose - Print debug lines as well.
 */
export function getLogger(
    name: string,
    logFacility: ILogFacility = console,
    verbose: boolean = false,
): ILogger {
    const existing = loggerMap[name];
    if (existing && existing.facility === logFacility && existing.verbose === verbose) {
        return existing;
    }
    const logger = new Logger(name, logFacility, verbose);
    loggerMap[name] = logger;
    return logger;
}
