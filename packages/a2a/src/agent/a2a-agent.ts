import { ParleyLogComponent, createLogger, type Logger } from '@parley/core';
import { A2AClient } from '../client/client.js';
import type { A2ATransport, TransportFactory } from '../client/transport.js';
import { configFromArgs, type A2AConfig } from '../config/schemas.js';
import { deserializeA2AError } from '../errors.js';
import type {
    AgentInputMessage,
    AssistantMessage,
    StructuredMessage,
    ToolDescriptor,
} from '../messages/types.js';
import {
    aggregateMetrics,
    createMetricRecord,
    type AggregatedMetrics,
    type ProtocolMetricRecord,
} from '../metrics/metrics.js';
import { buildMetricsExport, type MetricsExport } from '../metrics/export.js';
import { fromWireContent, toWireContent } from '../translation/message.js';
import type { AgentCard } from '../types.js';
import { createInitialState, type ConversationState } from './state.js';
import { WorkerThreadBridge, type SyncBridge } from './sync-bridge.js';

export interface A2AAgentOptions {
    config: A2AConfig;
    /** Tool catalog rendered into every user turn */
    tools?: readonly ToolDescriptor[];
    /** Domain policy text supplied by the harness; kept for the caller, never sent */
    domainPolicy?: string;
    /** Borrowed transport for the async path */
    transport?: A2ATransport;
    /** Builds the async path's owned pool when no transport is borrowed */
    transportFactory?: TransportFactory;
    logger?: Logger;
    /** Sync-path executor; defaults to a worker-thread bridge */
    bridge?: SyncBridge;
    /** Fetch the agent card on the first turn (default true) */
    discover?: boolean;
}

export interface TurnResult {
    message: AssistantMessage;
    state: ConversationState;
}

/**
 * Conversational agent backed by a remote A2A agent.
 *
 * Translates each structured input message to A2A text, sends it with the conversation's
 * context token and translates the reply back. State is never mutated: every successful
 * turn returns a new ConversationState, and a failed turn leaves the caller's state as it was.
 *
 * @example
 * ```typescript
 * const agent = new A2AAgent({ config: createA2AConfig({ endpoint: 'http://localhost:8080' }), tools });
 * let state = agent.getInitState();
 * const turn = await agent.generateNextMessage({ role: 'user', content: 'Hi' }, state);
 * state = turn.state;
 * await agent.stop();
 * ```
 */
export class A2AAgent {
    readonly config: A2AConfig;
    readonly tools: readonly ToolDescriptor[];
    readonly domainPolicy: string;
    private readonly client: A2AClient;
    private readonly logger: Logger;
    private readonly discoverOnFirstTurn: boolean;
    private bridge: SyncBridge | null;

    constructor(options: A2AAgentOptions) {
        this.config = options.config;
        this.tools = [...(options.tools ?? [])];
        this.domainPolicy = options.domainPolicy ?? '';
        this.discoverOnFirstTurn = options.discover ?? true;
        this.bridge = options.bridge ?? null;

        const baseLogger =
            options.logger ??
            createLogger({
                agentId: 'a2a-agent',
                config: { level: options.config.debug ? 'silly' : 'info' },
            });
        this.logger = baseLogger.createChild(ParleyLogComponent.AGENT);
        this.client = new A2AClient(options.config, {
            logger: baseLogger,
            ...(options.transport && { transport: options.transport }),
            ...(options.transportFactory && { transportFactory: options.transportFactory }),
        });

        this.logger.debug('A2A agent initialized', {
            endpoint: options.config.endpoint,
            toolCount: this.tools.length,
            timeout: options.config.timeout,
        });
    }

    /**
     * Build an agent the way the harness does: an endpoint plus snake_case `llm_args`
     * (`auth_token`, `timeout`, `verify_ssl`, `debug`).
     */
    static fromArgs(
        endpoint: string,
        llmArgs: Record<string, unknown> = {},
        tools: readonly ToolDescriptor[] = [],
        domainPolicy = '',
        options: Omit<A2AAgentOptions, 'config' | 'tools' | 'domainPolicy'> = {}
    ): A2AAgent {
        return new A2AAgent({
            ...options,
            config: configFromArgs(endpoint, llmArgs),
            tools,
            domainPolicy,
        });
    }

    getInitState(history: readonly StructuredMessage[] = []): ConversationState {
        return createInitialState(history);
    }

    /** The tool catalog goes out with user turns only */
    private toContent(message: AgentInputMessage): string {
        return toWireContent(message, message.role === 'user' ? this.tools : undefined);
    }

    private needsDiscovery(state: ConversationState): boolean {
        return this.discoverOnFirstTurn && state.agentCard === null;
    }

    private logContextTransition(previous: string | null, returned: string | null): void {
        if (returned === null) {
            return;
        }
        if (previous === null) {
            this.logger.debug('New A2A context established', { contextId: returned });
        } else if (previous === returned) {
            this.logger.silly('A2A context persisted', { contextId: returned });
        } else {
            this.logger.warn('A2A context changed by agent', {
                previousContextId: previous,
                contextId: returned,
            });
        }
    }

    private completeTurn(
        message: AgentInputMessage,
        state: ConversationState,
        responseText: string,
        returnedContextId: string | null,
        agentCard: AgentCard | null
    ): TurnResult {
        this.logContextTransition(state.contextId, returnedContextId);
        const reply = fromWireContent(responseText);

        this.logger.debug('A2A turn completed', {
            requestCount: state.requestCount + 1,
            toolCalls: reply.toolCalls?.length ?? 0,
        });

        return {
            message: reply,
            state: {
                contextId: returnedContextId ?? state.contextId,
                history: [...state.history, message, reply],
                agentCard,
                requestCount: state.requestCount + 1,
            },
        };
    }

    /**
     * Run one turn: translate, send with the current context token, translate the reply.
     * Discovers the agent card on the first turn when discovery is enabled.
     *
     * @throws A2AProtocolError (or a subclass) when discovery or the exchange fails
     */
    async generateNextMessage(
        message: AgentInputMessage,
        state: ConversationState
    ): Promise<TurnResult> {
        const content = this.toContent(message);
        const agentCard = this.needsDiscovery(state) ? await this.client.discover() : state.agentCard;
        const response = await this.client.sendMessage(content, state.contextId);
        return this.completeTurn(message, state, response.content, response.contextId, agentCard);
    }

    /**
     * Synchronous form of generateNextMessage for callers that cannot await.
     *
     * The exchange runs on a worker thread while this thread blocks, so it is safe to call
     * from inside an async server that is itself answering A2A requests. The worker opens
     * its own connection; metrics it records are merged into this agent's metrics.
     *
     * @throws A2AProtocolError (or a subclass), rebuilt from the worker's error
     */
    generateNextMessageSync(message: AgentInputMessage, state: ConversationState): TurnResult {
        const content = this.toContent(message);
        const cachedCard = this.client.getCachedAgentCard();
        const discover = this.needsDiscovery(state) && cachedCard === null;

        const outcome = this.getBridge().run({
            config: this.config,
            content,
            contextId: state.contextId,
            discover,
        });

        for (const record of outcome.metrics) {
            this.client.recordMetric(createMetricRecord(record));
        }
        if (outcome.agentCard) {
            this.client.adoptAgentCard(outcome.agentCard);
        }
        if (!outcome.ok) {
            throw deserializeA2AError(outcome.error);
        }

        const agentCard = this.needsDiscovery(state)
            ? (outcome.agentCard ?? cachedCard)
            : state.agentCard;
        return this.completeTurn(message, state, outcome.content, outcome.contextId, agentCard);
    }

    private getBridge(): SyncBridge {
        this.bridge ??= new WorkerThreadBridge({
            logger: this.logger.createChild(ParleyLogComponent.BRIDGE),
        });
        return this.bridge;
    }

    /**
     * Release the client's connection pool. Safe to call repeatedly, including after a later
     * turn has opened a new pool; never throws.
     */
    async stop(): Promise<void> {
        try {
            await this.client.close();
            this.logger.debug('A2A agent stopped');
        } catch (error) {
            this.logger.warn('Error while closing A2A client', {
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    /**
     * Synchronous stop for callers that cannot await. The pool's connections are dropped
     * before this returns; sync turns hold no connection here, their workers close their own.
     */
    stopSync(): void {
        try {
            this.client.closeSync();
            this.logger.debug('A2A agent stopped');
        } catch (error) {
            this.logger.warn('Error while closing A2A client', {
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    getProtocolMetrics(): ProtocolMetricRecord[] {
        return this.client.getMetrics();
    }

    getAggregatedMetrics(): AggregatedMetrics {
        return aggregateMetrics(this.client.getMetrics());
    }

    /**
     * Metrics in the harness results format
     */
    exportMetrics(taskId?: string): MetricsExport {
        return buildMetricsExport(this.client.getMetrics(), taskId);
    }

    clearMetrics(): void {
        this.client.clearMetrics();
    }
}
