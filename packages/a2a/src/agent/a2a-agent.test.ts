import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createMockLogger } from '@parley/core/test-utils';
import { A2AAgent } from './a2a-agent.js';
import type { SyncBridge } from './sync-bridge.js';
import type { ExchangeOutcome } from './exchange.js';
import { createA2AConfig } from '../config/schemas.js';
import { A2AAuthError, A2AError } from '../errors.js';
import { createMetricRecord } from '../metrics/metrics.js';
import { EMPTY_RESPONSE_FALLBACK } from '../translation/message.js';
import type { ToolDescriptor, UserMessage } from '../messages/types.js';
import type { AgentCard } from '../types.js';
import {
    createFakeAgentServer,
    createTestAgentCard,
    textResult,
    type FakeAgentServer,
} from '../test-utils/fake-agent-server.js';

const config = createA2AConfig({ endpoint: 'http://agent.test', timeout: 5 });

const tools: ToolDescriptor[] = [
    {
        name: 'get_weather',
        description: 'Current weather for a city',
        parameters: {
            properties: { city: { type: 'string', description: 'City name' } },
            required: ['city'],
        },
    },
];

const card: AgentCard = {
    name: 'test-agent',
    url: 'http://agent.test',
    capabilities: { streaming: false, pushNotifications: false },
};

const hello: UserMessage = { role: 'user', content: 'Hi' };

describe('A2AAgent', () => {
    let server: FakeAgentServer;
    let logger: ReturnType<typeof createMockLogger>;

    beforeEach(() => {
        server = createFakeAgentServer({ card: createTestAgentCard() });
        logger = createMockLogger();
    });

    function makeAgent(options: { discover?: boolean; bridge?: SyncBridge } = {}): A2AAgent {
        return new A2AAgent({ config, tools, transport: server, logger, ...options });
    }

    it('starts with an empty state', () => {
        const agent = makeAgent();

        expect(agent.getInitState()).toEqual({
            contextId: null,
            history: [],
            agentCard: null,
            requestCount: 0,
        });
        expect(agent.getInitState([hello]).history).toEqual([hello]);
    });

    it('carries the context token across turns', async () => {
        server.enqueue(textResult('Hello! How can I help?', 'ctx-1'), textResult('Done', 'ctx-1'));
        const agent = makeAgent();

        const first = await agent.generateNextMessage(hello, agent.getInitState());
        expect(first.message).toEqual({
            role: 'assistant',
            content: 'Hello! How can I help?',
            toolCalls: null,
        });
        expect(first.state.contextId).toBe('ctx-1');
        expect(first.state.requestCount).toBe(1);

        const toolResult = {
            role: 'tool' as const,
            id: 'call-1',
            content: 'Sunny',
            error: false,
            requestor: 'assistant' as const,
        };
        const second = await agent.generateNextMessage(toolResult, first.state);

        expect(second.state.contextId).toBe('ctx-1');
        expect(second.state.requestCount).toBe(2);
        expect(second.state.history).toEqual([hello, first.message, toolResult, second.message]);
        expect(server.sentBodies()[1]).toMatchObject({
            params: {
                message: {
                    contextId: 'ctx-1',
                    parts: [{ kind: 'text', text: 'Tool result (id=call-1): Sunny' }],
                },
            },
        });
    });

    it('sends the tool catalog with user turns only', async () => {
        const agent = makeAgent();
        const first = await agent.generateNextMessage(hello, agent.getInitState());
        await agent.generateNextMessage(
            { role: 'tool', id: 'c', content: 'ok', error: false, requestor: 'assistant' },
            first.state
        );

        const texts = server.sentBodies().map((body) => JSON.stringify(body));
        expect(texts[0]).toContain('<available_tools>');
        expect(texts[0]).toContain('get_weather(city: string)');
        expect(texts[1]).not.toContain('<available_tools>');
    });

    it('discovers the agent card once, on the first turn', async () => {
        const agent = makeAgent();

        const first = await agent.generateNextMessage(hello, agent.getInitState());
        await agent.generateNextMessage(hello, first.state);

        expect(first.state.agentCard).toMatchObject({ name: 'test-agent' });
        expect(server.requests.map((r) => r.method)).toEqual(['GET', 'POST', 'POST']);
    });

    it('skips discovery when disabled', async () => {
        const agent = makeAgent({ discover: false });

        const { state } = await agent.generateNextMessage(hello, agent.getInitState());

        expect(state.agentCard).toBeNull();
        expect(server.requests.map((r) => r.method)).toEqual(['POST']);
    });

    it('returns tool calls requested by the agent', async () => {
        server.enqueue(
            textResult('{"tool_call": {"id": "w1", "name": "get_weather", "arguments": {"city": "Oslo"}}}')
        );
        const agent = makeAgent();

        const { message } = await agent.generateNextMessage(hello, agent.getInitState());

        expect(message.content).toBeNull();
        expect(message.toolCalls).toEqual([
            { id: 'w1', name: 'get_weather', arguments: { city: 'Oslo' }, requestor: 'assistant' },
        ]);
    });

    it('substitutes the fallback for an empty reply', async () => {
        server.enqueue({ kind: 'result', result: { status: { state: 'completed' } } });
        const agent = makeAgent();

        const { message } = await agent.generateNextMessage(hello, agent.getInitState());

        expect(message.content).toBe(EMPTY_RESPONSE_FALLBACK);
    });

    it('keeps the prior context when the agent returns none', async () => {
        server.enqueue(textResult('one', 'ctx-1'), textResult('two'));
        const agent = makeAgent();

        const first = await agent.generateNextMessage(hello, agent.getInitState());
        const second = await agent.generateNextMessage(hello, first.state);

        expect(second.state.contextId).toBe('ctx-1');
    });

    it('accepts a changed context token and warns', async () => {
        server.enqueue(textResult('one', 'ctx-1'), textResult('two', 'ctx-2'));
        const agent = makeAgent();

        const first = await agent.generateNextMessage(hello, agent.getInitState());
        const second = await agent.generateNextMessage(hello, first.state);

        expect(second.state.contextId).toBe('ctx-2');
        expect(logger.warn).toHaveBeenCalledWith('A2A context changed by agent', {
            previousContextId: 'ctx-1',
            contextId: 'ctx-2',
        });
    });

    it('propagates failures and leaves the state untouched', async () => {
        server.enqueue(textResult('one', 'ctx-1'), { kind: 'raw', status: 401, body: '' });
        const agent = makeAgent();
        const first = await agent.generateNextMessage(hello, agent.getInitState());
        const before = structuredClone(first.state);

        await expect(agent.generateNextMessage(hello, first.state)).rejects.toBeInstanceOf(
            A2AAuthError
        );

        expect(first.state).toEqual(before);
        expect(agent.getProtocolMetrics()).toHaveLength(2);
        expect(agent.getAggregatedMetrics().errorCount).toBe(1);
    });

    it('exports and clears metrics', async () => {
        const agent = makeAgent();
        await agent.generateNextMessage(hello, agent.getInitState());

        const exported = agent.exportMetrics('task-3');
        expect(exported.task_id).toBe('task-3');
        expect(exported.agent_type).toBe('a2a_agent');
        expect(exported.protocol_metrics).toHaveLength(1);
        expect(exported.summary.total_requests).toBe(1);

        agent.clearMetrics();
        expect(agent.getProtocolMetrics()).toEqual([]);
    });

    it('stops idempotently without closing a borrowed transport', async () => {
        const agent = makeAgent();

        await agent.stop();
        await agent.stop();
        agent.stopSync();

        expect(server.closeCount).toBe(0);
        expect(server.destroyCount).toBe(0);
    });

    describe('owned pools', () => {
        function makeOwningAgent() {
            const pools: FakeAgentServer[] = [];
            const agent = new A2AAgent({
                config,
                logger,
                discover: false,
                transportFactory: () => {
                    const pool = createFakeAgentServer();
                    pools.push(pool);
                    return pool;
                },
            });
            return { agent, pools };
        }

        it('closes a pool reopened by a turn after an earlier stop', async () => {
            const { agent, pools } = makeOwningAgent();

            await agent.generateNextMessage(hello, agent.getInitState());
            await agent.stop();
            await agent.generateNextMessage(hello, agent.getInitState());
            await agent.stop();
            await agent.stop();

            expect(pools.map((pool) => pool.closeCount)).toEqual([1, 1]);
        });

        it('drops the open pool before stopSync returns', async () => {
            const { agent, pools } = makeOwningAgent();
            await agent.generateNextMessage(hello, agent.getInitState());

            agent.stopSync();
            expect(pools[0]?.destroyCount).toBe(1);

            agent.stopSync();
            expect(pools.map((pool) => [pool.destroyCount, pool.closeCount])).toEqual([[1, 0]]);
        });
    });

    it('builds from harness-style args', () => {
        const agent = A2AAgent.fromArgs(
            'http://agent.test/',
            { auth_token: 'test-secret', timeout: 12 },
            tools,
            'Be polite.',
            { logger }
        );

        expect(agent.config).toEqual({
            endpoint: 'http://agent.test',
            authToken: 'test-secret',
            timeout: 12,
            verifySsl: true,
            debug: false,
        });
        expect(agent.tools).toEqual(tools);
        expect(agent.domainPolicy).toBe('Be polite.');
    });

    describe('generateNextMessageSync', () => {
        function fakeBridge(...outcomes: ExchangeOutcome[]) {
            const run = vi.fn((): ExchangeOutcome => {
                const next = outcomes.shift();
                if (!next) {
                    throw new Error('no outcome scripted');
                }
                return next;
            });
            const bridge: SyncBridge = { run };
            return { bridge, run };
        }

        const metric = (contextId: string | null, error: string | null = null) =>
            createMetricRecord({
                endpoint: 'http://agent.test',
                latencyMs: 5,
                statusCode: error ? 401 : 200,
                contextId,
                error,
            });

        it('runs the turn through the bridge and folds back its metrics', () => {
            const { bridge, run } = fakeBridge(
                {
                    ok: true,
                    content: 'Sync hello',
                    contextId: 'ctx-s',
                    metrics: [metric('ctx-s')],
                    agentCard: card,
                },
                { ok: true, content: 'Again', contextId: 'ctx-s', metrics: [metric('ctx-s')], agentCard: null }
            );
            const agent = makeAgent({ bridge });

            const first = agent.generateNextMessageSync(hello, agent.getInitState());
            const second = agent.generateNextMessageSync(hello, first.state);

            expect(run).toHaveBeenNthCalledWith(1, {
                config,
                content: expect.stringContaining('Hi\n\n<available_tools>'),
                contextId: null,
                discover: true,
            });
            expect(run).toHaveBeenNthCalledWith(2, expect.objectContaining({
                contextId: 'ctx-s',
                discover: false,
            }));
            expect(first.message.content).toBe('Sync hello');
            expect(first.state).toMatchObject({ contextId: 'ctx-s', agentCard: card, requestCount: 1 });
            expect(second.state.requestCount).toBe(2);
            expect(agent.getProtocolMetrics()).toHaveLength(2);
            expect(server.requests).toHaveLength(0);
        });

        it('rethrows the worker error as the same class and keeps its metric', () => {
            const { bridge } = fakeBridge({
                ok: false,
                error: A2AError.authFailed().serialize(),
                metrics: [metric(null, 'Authentication failed')],
                agentCard: card,
            });
            const agent = makeAgent({ bridge });

            expect(() => agent.generateNextMessageSync(hello, agent.getInitState())).toThrow(
                A2AAuthError
            );
            expect(agent.getProtocolMetrics()).toMatchObject([
                { statusCode: 401, error: 'Authentication failed' },
            ]);
        });

        it('reuses a card the async path already discovered', async () => {
            const { bridge, run } = fakeBridge({
                ok: true,
                content: 'From worker',
                contextId: null,
                metrics: [],
                agentCard: null,
            });
            const agent = makeAgent({ bridge });
            await agent.generateNextMessage(hello, agent.getInitState());

            const { state } = agent.generateNextMessageSync(hello, agent.getInitState());

            expect(run).toHaveBeenCalledWith(expect.objectContaining({ discover: false }));
            expect(state.agentCard).toMatchObject({ name: 'test-agent' });
        });
    });
});
