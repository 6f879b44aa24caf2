/**
 * Parley Logger
 *
 * Main logger implementation with multi-transport support.
 * Supports structured logging, component-based categorization, and per-agent isolation.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, ParleyLogComponent } from './types.js';
import { FileTransport } from './transports/file-transport.js';
import { redactSensitiveData } from '../utils/redactor.js';

export interface ParleyLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    /** Component identifier */
    component: ParleyLogComponent;
    /** Agent ID for multi-agent isolation */
    agentId: string;
    /** Transport instances */
    transports: LoggerTransport[];
    /** Redact secrets from structured context (default: true) */
    redact?: boolean;
}

/**
 * Level holder shared between a logger and its children so setLevel() applies to all of them
 */
interface LevelRef {
    current: LogLevel;
}

/**
 * ParleyLogger - Multi-transport logger with structured logging
 */
export class ParleyLogger implements Logger {
    private levelRef: LevelRef;
    private component: ParleyLogComponent;
    private agentId: string;
    private transports: LoggerTransport[];
    private redact: boolean;

    // Lower number = more severe. If level is 'debug', logs error(0) through debug(3) but not silly(4)
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: ParleyLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.agentId = config.agentId;
        this.transports = config.transports;
        this.redact = config.redact ?? true;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.log('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            agentId: this.agentId,
            context: context && this.redact ? this.redactContext(context) : context,
        };

        for (const transport of this.transports) {
            try {
                const result = transport.write(entry);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // Don't let transport errors break logging
                console.error('Logger transport error:', error);
            }
        }
    }

    private redactContext(context: Record<string, unknown>): Record<string, unknown> {
        const redacted = redactSensitiveData(context);
        return typeof redacted === 'object' && redacted !== null && !Array.isArray(redacted)
            ? { ...redacted }
            : {};
    }

    private shouldLog(level: LogLevel): boolean {
        return ParleyLogger.LEVELS[level] <= ParleyLogger.LEVELS[this.levelRef.current];
    }

    /**
     * Create a child logger for a different component
     * Shares the same transports and level reference but uses a different component identifier
     */
    createChild(component: ParleyLogComponent): ParleyLogger {
        return new ParleyLogger(
            {
                level: this.levelRef.current,
                component,
                agentId: this.agentId,
                transports: this.transports,
                redact: this.redact,
            },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    getLogFilePath(): string | null {
        for (const transport of this.transports) {
            if (transport instanceof FileTransport) {
                return transport.getFilePath();
            }
        }
        return null;
    }

    /**
     * Cleanup all transports
     */
    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}
