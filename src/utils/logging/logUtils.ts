// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.ts';

import chalk from 'chalk';

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

const LEVELS: Record<LogLevel, { tag: string; colour: (text: string) => string; sink: keyof ILogFacility }> = {
    info: { tag: 'INFO', colour: chalk.blue, sink: 'log' },
    success: { tag: 'SUCCESS', colour: chalk.green, sink: 'log' },
    warn: { tag: 'WARNING', colour: chalk.yellow, sink: 'warn' },
    error: { tag: 'ERROR', colour: chalk.red, sink: 'error' },
    debug: { tag: 'DEBUG', colour: chalk.magenta, sink: 'log' },
};

const loggers = new Map<string, ChunkLogger>();

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing chalk-coloured `[LEVEL] name :: message` lines to a facility.
 * Messages are kept per level so callers can inspect what a command reported.
 */
class ChunkLogger implements ILogger {
    readonly messages: Record<LogLevel, string[]> = { info: [], success: [], warn: [], error: [], debug: [] };

    constructor(
        readonly name: string,
        readonly facility: ILogFacility,
        readonly verbose: boolean,
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

    /** Kept always, printed only when verbose. */
    debug(message: string) {
        this.write('debug', message, this.verbose);
    }

    private write(level: LogLevel, message: string, print = true) {
        this.messages[level].push(message);
        if (!print) return;
        const { tag, colour, sink } = LEVELS[level];
        this.facility[sink](colour(`[${tag}] ${this.name} :: ${message}`));
    }
}

/**
 * Returns the logger registered under `name`. A logger with the same facility and verbosity is reused;
 * asking for different settings replaces the registered one, so each command run logs the way it was invoked.
 */
export function getLogger(name: string, logFacility: ILogFacility = console, verbose = false): ILogger {
    const existing = loggers.get(name);
    if (existing && existing.facility === logFacility && existing.verbose === verbose) {
        return existing;
    }
    const logger = new ChunkLogger(name, logFacility, verbose);
    loggers.set(name, logger);
    return logger;
}
