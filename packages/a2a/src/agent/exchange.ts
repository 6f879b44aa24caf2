/**
 * One discovery-plus-send exchange, in a form that can run on a worker thread.
 * Requests and outcomes are plain data so they survive structured cloning.
 */

import { ParleyLogComponent, createLogger, type Logger } from '@parley/core';
import { A2AClient } from '../client/client.js';
import { isPlainObject } from '../client/response-parser.js';
import type { A2ATransport } from '../client/transport.js';
import { createA2AConfig, type A2AConfig } from '../config/schemas.js';
import { A2AError, A2AProtocolError, type SerializedA2AError } from '../errors.js';
import type { ProtocolMetricRecord } from '../metrics/metrics.js';
import type { AgentCard } from '../types.js';

export interface ExchangeRequest {
    config: A2AConfig;
    content: string;
    contextId: string | null;
    /** Fetch the agent card before sending */
    discover: boolean;
}

interface ExchangeOutcomeBase {
    /** Every metric the exchange recorded, in order */
    metrics: ProtocolMetricRecord[];
    agentCard: AgentCard | null;
}

export interface ExchangeSuccess extends ExchangeOutcomeBase {
    ok: true;
    content: string;
    contextId: string | null;
}

export interface ExchangeFailure extends ExchangeOutcomeBase {
    ok: false;
    error: SerializedA2AError;
}

export type ExchangeOutcome = ExchangeSuccess | ExchangeFailure;

export function isExchangeRequest(value: unknown): value is ExchangeRequest {
    return (
        isPlainObject(value) &&
        isPlainObject(value.config) &&
        typeof value.content === 'string' &&
        (value.contextId === null || typeof value.contextId === 'string') &&
        typeof value.discover === 'boolean'
    );
}

export function isExchangeOutcome(value: unknown): value is ExchangeOutcome {
    if (!isPlainObject(value) || !Array.isArray(value.metrics)) {
        return false;
    }
    if (value.ok === true) {
        return typeof value.content === 'string';
    }
    return value.ok === false && isPlainObject(value.error);
}

function serializeFailure(error: unknown): SerializedA2AError {
    if (error instanceof A2AProtocolError) {
        return error.serialize();
    }
    const reason = error instanceof Error ? error.message : String(error);
    return A2AError.bridgeFailed(reason, error).serialize();
}

/**
 * Run one exchange with a client of its own and close it afterwards.
 * Never throws: failures come back as a serialized error alongside the metrics recorded so far.
 */
export async function runExchange(
    request: ExchangeRequest,
    transport?: A2ATransport,
    logger?: Logger
): Promise<ExchangeOutcome> {
    let client: A2AClient | null = null;
    try {
        const config = createA2AConfig(request.config);
        client = new A2AClient(config, {
            ...(transport && { transport }),
            logger:
                logger ??
                createLogger({
                    agentId: 'a2a-bridge',
                    component: ParleyLogComponent.BRIDGE,
                    config: { level: config.debug ? 'silly' : 'info' },
                }),
        });
        const agentCard = request.discover ? await client.discover() : null;
        const result = await client.sendMessage(request.content, request.contextId);
        return {
            ok: true,
            content: result.content,
            contextId: result.contextId,
            metrics: client.getMetrics(),
            agentCard,
        };
    } catch (error) {
        return {
            ok: false,
            error: serializeFailure(error),
            metrics: client ? client.getMetrics() : [],
            agentCard: client ? client.getCachedAgentCard() : null,
        };
    } finally {
        await client?.close();
    }
}
