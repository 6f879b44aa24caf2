/**
 * Logger Factory
 *
 * Creates logger instances from (unvalidated) logger configuration.
 */

import { LoggerConfigSchema, type LoggerConfig } from './schemas.js';
import type { Logger } from './types.js';
import { ParleyLogComponent } from './types.js';
import { ParleyLogger } from './parley-logger.js';
import { createTransport } from './transport-factory.js';
import { ensureOk } from '../errors/result-bridge.js';
import { ErrorScope } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

export interface CreateLoggerOptions {
    /** Logger configuration; defaults apply for omitted fields */
    config?: LoggerConfig;
    /** Agent ID for multi-agent isolation */
    agentId: string;
    /** Component identifier (defaults to A2A) */
    component?: ParleyLogComponent;
}

/**
 * Create a logger instance from configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: { level: 'debug', transports: [{ type: 'console' }] },
 *   agentId: 'airline-task-12',
 * });
 *
 * logger.info('Harness started');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { agentId, component = ParleyLogComponent.A2A } = options;
    const config = ensureOk(
        LoggerConfigSchema.safeParse(options.config ?? {}),
        ErrorScope.LOGGER,
        LoggerErrorCode.INVALID_CONFIG
    );

    return new ParleyLogger({
        level: config.level,
        component,
        agentId,
        transports: config.transports.map(createTransport),
    });
}
