/**
 * Console Transport
 *
 * Human-readable terminal output, coloured with chalk.
 * Warnings and errors go to stderr so they stay visible when stdout is piped to a results file.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
    silly: chalk.dim,
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

export class ConsoleTransport implements LoggerTransport {
    private colorize: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
    }

    write(entry: LogEntry): void {
        const line = this.format(entry);
        if (entry.level === 'error' || entry.level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    format(entry: LogEntry): string {
        const timestamp = new Date(entry.timestamp).toLocaleTimeString();
        const head = `${timestamp} [${entry.level.toUpperCase()}] [${entry.component}:${entry.agentId}] ${entry.message}`;
        let line = this.colorize ? LEVEL_COLORS[entry.level](head) : head;

        if (entry.context && Object.keys(entry.context).length > 0) {
            line += '\n' + JSON.stringify(entry.context, null, 2);
        }
        return line;
    }
}
