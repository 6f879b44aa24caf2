/**
 * Logger Types and Interfaces
 *
 * Defines the core abstractions for the multi-transport logger architecture.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silly'] as const;

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope, with additional execution context components
 */
export enum ParleyLogComponent {
    A2A = 'a2a',
    CLIENT = 'client',
    TRANSLATION = 'translation',
    METRICS = 'metrics',
    AGENT = 'agent',
    BRIDGE = 'bridge',
    CONFIG = 'config',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    /** Log level */
    level: LogLevel;
    /** Primary log message */
    message: string;
    /** ISO timestamp */
    timestamp: string;
    /** Component that generated the log */
    component: ParleyLogComponent;
    /** Agent ID for multi-agent isolation */
    agentId: string;
    /** Optional structured context data */
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;

    /**
     * Most verbose level, used for full request/response payload dumps
     */
    silly(message: string, context?: Record<string, unknown>): void;

    info(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Track exception with stack trace
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component
     * Shares the same transports, agentId, and level but uses a different component identifier
     */
    createChild(component: ParleyLogComponent): Logger;

    /**
     * Set the log level dynamically
     * Affects this logger and all child loggers created from it (shared level reference)
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * Get the log file path if file logging is enabled
     * @returns Log file path or null if file logging is not configured
     */
    getLogFilePath(): string | null;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 * All transport implementations must implement this interface
 */
export type LoggerTransport = {
    /**
     * Write a log entry to the transport
     */
    write(entry: LogEntry): void | Promise<void>;

    /**
     * Cleanup resources when logger is destroyed
     */
    destroy?(): void | Promise<void>;
};
