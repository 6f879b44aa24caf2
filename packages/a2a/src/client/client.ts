import { randomUUID } from 'crypto';
import { performance } from 'perf_hooks';
import { createLogger, truncate, type Logger, ParleyLogComponent } from '@parley/core';
import type { A2AConfig } from '../config/schemas.js';
import { parseAgentCard } from '../agent-card/schemas.js';
import { A2AError, A2AProtocolError } from '../errors.js';
import {
    AGENT_CARD_PATH,
    MESSAGE_SEND_METHOD,
    type AgentCard,
    type MessageSendRequest,
} from '../types.js';
import {
    createMetricRecord,
    estimateTokens,
    type ProtocolMetricRecord,
} from '../metrics/metrics.js';
import {
    createHttpTransport,
    isTimeoutError,
    type A2ATransport,
    type HttpMethod,
    type TransportFactory,
} from './transport.js';
import {
    extractContextId,
    extractResponseText,
    isPlainObject,
    type JsonRecord,
} from './response-parser.js';

export interface A2AClientOptions {
    /**
     * Borrowed transport. When given, the client never closes it.
     * When omitted, the client creates its own pool and closes it in close().
     */
    transport?: A2ATransport;
    /** Builds the owned pool when no transport is borrowed; defaults to an undici pool */
    transportFactory?: TransportFactory;
    logger?: Logger;
}

export interface SendMessageResult {
    /** Agent reply text; empty when no known response shape carried text */
    content: string;
    /** Context token returned by the server, or null when it sent none */
    contextId: string | null;
}

interface RawExchange {
    status: number;
    body: string;
}

/**
 * Build the JSON-RPC `message/send` envelope for one user turn
 */
export function buildMessageSendRequest(
    content: string,
    contextId: string | null
): MessageSendRequest {
    return {
        jsonrpc: '2.0',
        id: randomUUID(),
        method: MESSAGE_SEND_METHOD,
        params: {
            message: {
                kind: 'message',
                messageId: randomUUID(),
                role: 'user',
                parts: [{ kind: 'text', text: content }],
                contextId,
            },
        },
    };
}

function parseJson(body: string): { ok: true; value: unknown } | { ok: false; error: unknown } {
    try {
        const value: unknown = JSON.parse(body);
        return { ok: true, value };
    } catch (error) {
        return { ok: false, error };
    }
}

/**
 * HTTP client for one remote A2A agent.
 *
 * Handles discovery (cached for the client's lifetime), `message/send` exchanges,
 * authentication headers, error classification and per-request metrics.
 * Records exactly one metric per sendMessage() call, success or failure.
 */
export class A2AClient {
    readonly config: A2AConfig;
    private readonly logger: Logger;
    private readonly ownsTransport: boolean;
    private readonly transportFactory: TransportFactory;
    private transport: A2ATransport | null;
    private agentCard: AgentCard | null = null;
    private metrics: ProtocolMetricRecord[] = [];

    constructor(config: A2AConfig, options: A2AClientOptions = {}) {
        this.config = config;
        this.transport = options.transport ?? null;
        this.ownsTransport = options.transport === undefined;
        this.transportFactory = options.transportFactory ?? createHttpTransport;
        this.logger = (
            options.logger ??
            createLogger({
                agentId: 'a2a-client',
                config: { level: config.debug ? 'silly' : 'info' },
            })
        ).createChild(ParleyLogComponent.CLIENT);
    }

    /**
     * Run `fn` with a fresh client and close it afterwards, whether `fn` resolves or throws
     */
    static async withClient<T>(
        config: A2AConfig,
        fn: (client: A2AClient) => Promise<T>,
        options: A2AClientOptions = {}
    ): Promise<T> {
        const client = new A2AClient(config, options);
        try {
            return await fn(client);
        } finally {
            await client.close();
        }
    }

    private getTransport(): A2ATransport {
        if (!this.transport) {
            this.transport = this.transportFactory({
                timeoutSeconds: this.config.timeout,
                verifySsl: this.config.verifySsl,
            });
        }
        return this.transport;
    }

    private url(path = ''): string {
        return path ? `${this.config.endpoint}/${path.replace(/^\/+/, '')}` : this.config.endpoint;
    }

    buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            Accept: 'application/json',
        };
        if (this.config.authToken) {
            headers['Authorization'] = `Bearer ${this.config.authToken}`;
        }
        return headers;
    }

    /**
     * One HTTP round trip, body included, under the configured timeout
     */
    private async exchange(method: HttpMethod, url: string, body?: string): Promise<RawExchange> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.config.timeout * 1000);
        try {
            const response = await this.getTransport().fetch(url, {
                method,
                headers: this.buildHeaders(),
                ...(body !== undefined && { body }),
                signal: controller.signal,
            });
            return { status: response.status, body: await response.text() };
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Fetch and cache the agent card from `/.well-known/agent-card.json`.
     * Later calls return the cached card without a request; create a new client to rediscover.
     *
     * @throws A2AAuthError on 401
     * @throws A2ATimeoutError when the request times out
     * @throws A2ADiscoveryError on 404, any other failure status, an invalid card or a transport failure
     */
    async discover(): Promise<AgentCard> {
        if (this.agentCard) {
            return this.agentCard;
        }

        const endpoint = this.config.endpoint;
        this.logger.debug('Discovering A2A agent', { endpoint });

        let raw: RawExchange;
        try {
            raw = await this.exchange('GET', this.url(AGENT_CARD_PATH));
        } catch (error) {
            if (isTimeoutError(error)) {
                this.logger.error('Agent discovery timed out', { endpoint });
                throw A2AError.discoveryTimeout(this.config.timeout, error);
            }
            this.logger.error('Agent discovery failed', {
                endpoint,
                error: error instanceof Error ? error.message : String(error),
            });
            throw A2AError.discoveryTransportFailed(endpoint, error);
        }

        if (raw.status === 401) {
            throw A2AError.discoveryAuthRequired();
        }
        if (raw.status === 404) {
            throw A2AError.cardNotFound(endpoint);
        }
        if (raw.status >= 400) {
            throw A2AError.discoveryFailed(endpoint, raw.status);
        }

        const parsed = parseJson(raw.body);
        if (!parsed.ok) {
            this.logger.error('Failed to parse agent card', { endpoint });
            throw A2AError.invalidAgentCard(endpoint, 'body is not valid JSON', parsed.error);
        }
        const card = parseAgentCard(parsed.value);
        if (!card.ok) {
            this.logger.error('Failed to parse agent card', { endpoint, reason: card.reason });
            throw A2AError.invalidAgentCard(endpoint, card.reason);
        }

        this.agentCard = card.card;
        this.logger.info('Successfully discovered A2A agent', {
            agentName: card.card.name,
            agentVersion: card.card.version,
            endpoint,
        });
        return card.card;
    }

    getCachedAgentCard(): AgentCard | null {
        return this.agentCard;
    }

    /**
     * Seed the discovery cache with a card fetched elsewhere (e.g. on a bridge worker).
     * Has no effect once a card is cached.
     */
    adoptAgentCard(card: AgentCard): void {
        this.agentCard ??= card;
    }

    /**
     * Send one message with JSON-RPC `message/send` and return the reply text and context token.
     *
     * @param content Text content of the user message
     * @param contextId Context token from a previous turn, or null/undefined on the first turn
     * @throws A2AAuthError on 401
     * @throws A2ATimeoutError on 408 or when the request times out
     * @throws A2AMessageError on an unparseable body or a JSON-RPC `error`
     * @throws A2AProtocolError on any other failure status or transport failure
     */
    async sendMessage(content: string, contextId?: string | null): Promise<SendMessageResult> {
        const requestId = randomUUID();
        const start = performance.now();
        const inputTokens = estimateTokens(content);
        const sentContextId = contextId ?? null;
        let statusCode: number | null = null;

        const request = buildMessageSendRequest(content, sentContextId);

        this.logger.debug('Sending A2A message', {
            endpoint: this.config.endpoint,
            contextId: sentContextId,
            messageLength: content.length,
            inputTokens,
        });
        this.logger.silly('A2A request payload', { requestId, payload: request });

        try {
            let raw: RawExchange;
            try {
                raw = await this.exchange('POST', this.url(), JSON.stringify(request));
            } catch (error) {
                throw isTimeoutError(error)
                    ? A2AError.responseTimeout(this.config.timeout, error)
                    : A2AError.transportFailed(error);
            }
            statusCode = raw.status;

            const result = this.interpretSendResponse(raw, requestId);
            const latencyMs = performance.now() - start;
            const outputTokens = estimateTokens(result.content);

            this.logger.info('A2A message exchange completed', {
                requestId,
                endpoint: this.config.endpoint,
                statusCode,
                latencyMs: Math.round(latencyMs * 100) / 100,
                inputTokens,
                outputTokens,
                contextId: result.contextId,
            });

            this.recordMetric(
                createMetricRecord({
                    requestId,
                    endpoint: this.config.endpoint,
                    method: 'POST',
                    statusCode,
                    latencyMs,
                    inputTokens,
                    outputTokens,
                    contextId: result.contextId,
                })
            );
            return result;
        } catch (error) {
            const latencyMs = performance.now() - start;
            const failure = error instanceof A2AProtocolError ? error : A2AError.transportFailed(error);

            this.logger.error('A2A message send failed', {
                requestId,
                endpoint: this.config.endpoint,
                error: failure.message,
                code: failure.code,
                statusCode,
                latencyMs: Math.round(latencyMs * 100) / 100,
                inputTokens,
            });

            this.recordMetric(
                createMetricRecord({
                    requestId,
                    endpoint: this.config.endpoint,
                    method: 'POST',
                    statusCode,
                    latencyMs,
                    inputTokens,
                    contextId: sentContextId,
                    error: failure.message,
                })
            );
            throw failure;
        }
    }

    /**
     * Classify the HTTP status, then unwrap the JSON-RPC envelope
     */
    private interpretSendResponse(raw: RawExchange, requestId: string): SendMessageResult {
        if (raw.status === 401) {
            throw A2AError.authFailed();
        }
        if (raw.status === 408) {
            throw A2AError.responseTimeout(this.config.timeout);
        }

        const parsed = parseJson(raw.body);

        if (raw.status >= 400) {
            if (parsed.ok) {
                this.logger.silly('A2A error response', {
                    requestId,
                    statusCode: raw.status,
                    errorData: parsed.value,
                });
            } else {
                this.logger.silly('A2A error response (raw)', {
                    requestId,
                    statusCode: raw.status,
                    rawText: truncate(raw.body, 1000),
                });
            }
            const embedded =
                parsed.ok && isPlainObject(parsed.value) && 'error' in parsed.value
                    ? parsed.value.error
                    : undefined;
            throw A2AError.httpError(raw.status, embedded);
        }

        if (!parsed.ok) {
            this.logger.silly('A2A response parsing failed', {
                requestId,
                rawResponse: truncate(raw.body, 2000),
            });
            throw A2AError.invalidResponse('body is not valid JSON', parsed.error);
        }
        this.logger.silly('A2A response payload', { requestId, payload: parsed.value });

        const envelope = parsed.value;
        if (!isPlainObject(envelope)) {
            throw A2AError.invalidResponse('expected a JSON-RPC response object');
        }

        if (envelope.error !== undefined && envelope.error !== null) {
            const rpcError = envelope.error;
            if (typeof rpcError === 'string') {
                throw A2AError.agentReturnedError(rpcError);
            }
            const message = isPlainObject(rpcError) ? rpcError.message : undefined;
            const code = isPlainObject(rpcError) ? rpcError.code : undefined;
            throw A2AError.agentReturnedError(
                typeof message === 'string' ? message : 'Unknown error',
                typeof code === 'number' ? code : undefined,
                isPlainObject(rpcError) ? rpcError.data : undefined
            );
        }

        const result: JsonRecord | undefined =
            envelope.result === undefined || envelope.result === null
                ? {}
                : isPlainObject(envelope.result)
                  ? envelope.result
                  : undefined;
        if (!result) {
            throw A2AError.invalidResponse('result must be an object');
        }

        const { text, shape } = extractResponseText(result);
        if (text) {
            this.logger.debug('A2A agent response content', {
                shape,
                contentPreview: truncate(text, 500),
                contentLength: text.length,
            });
        } else {
            this.logger.warn('A2A agent returned empty response', {
                requestId,
                resultKeys: Object.keys(result),
            });
        }

        return { content: text, contextId: extractContextId(result) };
    }

    /**
     * Append a metric record. Used internally and by the sync bridge to fold in
     * records produced on a worker thread.
     */
    recordMetric(record: ProtocolMetricRecord): void {
        this.metrics.push(record);
    }

    /**
     * Copy of all records collected so far, in request order
     */
    getMetrics(): ProtocolMetricRecord[] {
        return [...this.metrics];
    }

    clearMetrics(): void {
        this.metrics = [];
    }

    /**
     * Close the transport if this client created it. A borrowed transport is left open.
     * Safe to call more than once; a later request on an owning client opens a new pool.
     */
    async close(): Promise<void> {
        if (!this.ownsTransport || !this.transport) {
            return;
        }
        const transport = this.transport;
        this.transport = null;
        await transport.close();
    }

    /**
     * Synchronous close for callers that cannot await: drops an owned pool's connections
     * before returning. A borrowed transport is left open.
     */
    closeSync(): void {
        if (!this.ownsTransport || !this.transport) {
            return;
        }
        const transport = this.transport;
        this.transport = null;
        transport.destroy().catch((error: unknown) => {
            this.logger.warn('Error while destroying A2A transport', {
                error: error instanceof Error ? error.message : String(error),
            });
        });
    }
}
