import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createMockLogger } from '@parley/core/test-utils';
import { A2AClient } from './client.js';
import { createA2AConfig } from '../config/schemas.js';
import {
    A2AAuthError,
    A2ADiscoveryError,
    A2AMessageError,
    A2AProtocolError,
    A2ATimeoutError,
} from '../errors.js';
import { A2AErrorCode } from '../error-codes.js';
import {
    createFakeAgentServer,
    createTestAgentCard,
    textResult,
    type FakeAgentServer,
} from '../test-utils/fake-agent-server.js';

const config = createA2AConfig({
    endpoint: 'http://agent.test/',
    authToken: 'test-secret',
    timeout: 5,
});

function makeClient(server: FakeAgentServer, logger = createMockLogger()): A2AClient {
    return new A2AClient(config, { transport: server, logger });
}

describe('A2AClient', () => {
    describe('discover', () => {
        it('fetches the agent card from the well-known path', async () => {
            const server = createFakeAgentServer({ card: createTestAgentCard() });
            const client = makeClient(server);

            const card = await client.discover();

            expect(server.requests).toHaveLength(1);
            expect(server.requests[0]?.url).toBe('http://agent.test/.well-known/agent-card.json');
            expect(server.requests[0]?.method).toBe('GET');
            expect(card.name).toBe('test-agent');
            expect(card.capabilities).toEqual({ streaming: false, pushNotifications: false });
        });

        it('caches the card for the lifetime of the client', async () => {
            const server = createFakeAgentServer({ card: createTestAgentCard() });
            const client = makeClient(server);

            const first = await client.discover();
            const second = await client.discover();

            expect(second).toBe(first);
            expect(server.requests).toHaveLength(1);
            expect(client.getCachedAgentCard()).toBe(first);
        });

        it('raises an auth error on 401', async () => {
            const server = createFakeAgentServer({
                cardReply: { kind: 'raw', status: 401, body: 'Unauthorized' },
            });

            await expect(makeClient(server).discover()).rejects.toBeInstanceOf(A2AAuthError);
        });

        it('raises a discovery error carrying the endpoint on 404', async () => {
            const server = createFakeAgentServer();
            const error = await makeClient(server).discover().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2ADiscoveryError);
            expect(error).toMatchObject({
                code: A2AErrorCode.CARD_NOT_FOUND,
                statusCode: 404,
                endpoint: 'http://agent.test',
            });
        });

        it('raises a discovery error with the actual status on other failures', async () => {
            const server = createFakeAgentServer({
                cardReply: { kind: 'raw', status: 500, body: 'oops' },
            });
            const error = await makeClient(server).discover().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2ADiscoveryError);
            expect(error).toMatchObject({
                message: 'Agent discovery failed with status 500',
                statusCode: 500,
            });
        });

        it('rejects a card that fails validation', async () => {
            const server = createFakeAgentServer({ card: { url: 'http://agent.test' } });
            const error = await makeClient(server).discover().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2ADiscoveryError);
            expect(error).toMatchObject({
                code: A2AErrorCode.INVALID_AGENT_CARD,
                message: 'Invalid agent card format: name: Required',
            });
        });

        it('rejects a card body that is not JSON', async () => {
            const server = createFakeAgentServer({
                cardReply: { kind: 'raw', status: 200, body: '<html>' },
            });

            await expect(makeClient(server).discover()).rejects.toThrow(
                'Invalid agent card format: body is not valid JSON'
            );
        });

        it('maps a timed-out request to a timeout error', async () => {
            const server = createFakeAgentServer({ cardReply: { kind: 'timeout' } });
            const error = await makeClient(server).discover().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2ATimeoutError);
            expect(error).toMatchObject({ message: 'Agent discovery timed out', statusCode: 408 });
        });

        it('wraps other transport failures in a discovery error', async () => {
            const server = createFakeAgentServer({
                cardReply: { kind: 'network-error', message: 'connect ECONNREFUSED' },
            });
            const error = await makeClient(server).discover().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2ADiscoveryError);
            expect(error).toMatchObject({
                message: 'Agent discovery failed: connect ECONNREFUSED',
                statusCode: undefined,
            });
        });
    });

    describe('sendMessage', () => {
        let server: FakeAgentServer;
        let client: A2AClient;

        beforeEach(() => {
            server = createFakeAgentServer();
            client = makeClient(server);
        });

        it('posts a message/send envelope to the endpoint', async () => {
            server.enqueue(textResult('hello', 'ctx-1'));

            await client.sendMessage('Hi there');

            const [request] = server.requests;
            expect(request?.url).toBe('http://agent.test');
            expect(request?.method).toBe('POST');
            expect(request?.headers).toEqual({
                'Content-Type': 'application/json',
                Accept: 'application/json',
                Authorization: 'Bearer test-secret',
            });
            expect(request?.body).toMatchObject({
                jsonrpc: '2.0',
                method: 'message/send',
                params: {
                    message: {
                        kind: 'message',
                        role: 'user',
                        parts: [{ kind: 'text', text: 'Hi there' }],
                        contextId: null,
                    },
                },
            });
        });

        it('uses fresh request and message ids on every call', async () => {
            await client.sendMessage('same');
            await client.sendMessage('same');

            const [first, second] = server.sentBodies();
            expect(first).toMatchObject({
                id: expect.any(String),
                params: { message: { messageId: expect.any(String) } },
            });
            // Identical content, so only the generated ids can differ
            expect(first).not.toEqual(second);
        });

        it('echoes the context token when given', async () => {
            await client.sendMessage('again', 'ctx-7');

            expect(server.sentBodies()[0]).toMatchObject({
                params: { message: { contextId: 'ctx-7' } },
            });
        });

        it('omits the Authorization header without a token', async () => {
            const anonymous = new A2AClient(createA2AConfig({ endpoint: 'http://agent.test' }), {
                transport: server,
                logger: createMockLogger(),
            });

            await anonymous.sendMessage('hi');

            expect(server.requests[0]?.headers).toEqual({
                'Content-Type': 'application/json',
                Accept: 'application/json',
            });
        });

        it('returns the reply text and context token and records a metric', async () => {
            server.enqueue(textResult('hello', 'ctx-1'));

            const result = await client.sendMessage('Hi there');

            expect(result).toEqual({ content: 'hello', contextId: 'ctx-1' });
            const [metric] = client.getMetrics();
            expect(client.getMetrics()).toHaveLength(1);
            expect(metric).toMatchObject({
                endpoint: 'http://agent.test',
                method: 'POST',
                statusCode: 200,
                inputTokens: 2,
                outputTokens: 1,
                contextId: 'ctx-1',
                error: null,
            });
            expect(metric?.latencyMs).toBeGreaterThanOrEqual(0);
        });

        it('reads the context token from a wrapped message', async () => {
            server.enqueue({
                kind: 'result',
                result: { message: { role: 'agent', parts: [{ text: 'hey' }], contextId: 'ctx-m' } },
            });

            await expect(client.sendMessage('hi')).resolves.toEqual({
                content: 'hey',
                contextId: 'ctx-m',
            });
        });

        it('returns empty content and warns when no shape carries text', async () => {
            const logger = createMockLogger();
            const quiet = makeClient(server, logger);
            server.enqueue({ kind: 'result', result: { id: 'task-1', status: { state: 'working' } } });

            const result = await quiet.sendMessage('hi');

            expect(result).toEqual({ content: '', contextId: null });
            expect(logger.warn).toHaveBeenCalledWith('A2A agent returned empty response', {
                requestId: expect.any(String),
                resultKeys: ['id', 'status'],
            });
        });

        it('treats a missing result as an empty reply', async () => {
            server.enqueue({ kind: 'raw', status: 200, body: '{"jsonrpc":"2.0","id":"1"}' });

            await expect(client.sendMessage('hi')).resolves.toEqual({
                content: '',
                contextId: null,
            });
        });

        it('raises an auth error on 401 and records the failure', async () => {
            server.enqueue({ kind: 'raw', status: 401, body: 'Unauthorized' });

            await expect(client.sendMessage('Hi there', 'ctx-1')).rejects.toBeInstanceOf(
                A2AAuthError
            );

            const metrics = client.getMetrics();
            expect(metrics).toHaveLength(1);
            expect(metrics[0]).toMatchObject({
                statusCode: 401,
                error: 'Authentication failed',
                outputTokens: null,
                contextId: 'ctx-1',
            });
        });

        it('raises a timeout error on 408', async () => {
            server.enqueue({ kind: 'raw', status: 408, body: '' });
            const error = await client.sendMessage('hi').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2ATimeoutError);
            expect(error).toMatchObject({ message: 'Agent response timeout', statusCode: 408 });
            expect(client.getMetrics()[0]?.statusCode).toBe(408);
        });

        it('includes the embedded JSON-RPC error of a failure status', async () => {
            server.enqueue({
                kind: 'raw',
                status: 500,
                body: JSON.stringify({ error: { code: -32000, message: 'boom' } }),
            });
            const error = await client.sendMessage('hi').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2AProtocolError);
            expect(error).toMatchObject({
                message: 'Message send failed with status 500: {"code":-32000,"message":"boom"}',
                statusCode: 500,
                details: { error: { code: -32000, message: 'boom' } },
            });
            expect(client.getMetrics()[0]?.error).toBe(
                'Message send failed with status 500: {"code":-32000,"message":"boom"}'
            );
        });

        it('reports a failure status with an unparseable body by status alone', async () => {
            server.enqueue({ kind: 'raw', status: 503, body: 'Service Unavailable' });

            await expect(client.sendMessage('hi')).rejects.toThrow(
                /^Message send failed with status 503$/
            );
        });

        it('raises a message error when the agent returns a JSON-RPC error', async () => {
            server.enqueue({
                kind: 'rpc-error',
                error: { code: -32601, message: 'Method not found', data: { method: 'x' } },
            });
            const error = await client.sendMessage('hi').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2AMessageError);
            expect(error).toMatchObject({
                message: 'Agent returned error: Method not found',
                code: A2AErrorCode.AGENT_RETURNED_ERROR,
                details: { rpcCode: -32601, data: { method: 'x' } },
            });
            expect(client.getMetrics()[0]).toMatchObject({
                statusCode: 200,
                error: 'Agent returned error: Method not found',
            });
        });

        it('accepts a JSON-RPC error given as a bare string', async () => {
            server.enqueue({ kind: 'rpc-error', error: 'nope' });

            await expect(client.sendMessage('hi')).rejects.toThrow('Agent returned error: nope');
        });

        it('raises a message error on a malformed body', async () => {
            server.enqueue({ kind: 'raw', status: 200, body: '{not json' });
            const error = await client.sendMessage('hi').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2AMessageError);
            expect(error).toMatchObject({
                message: 'Invalid A2A response format: body is not valid JSON',
                code: A2AErrorCode.INVALID_RESPONSE,
            });
        });

        it('rejects a result that is not an object', async () => {
            server.enqueue({ kind: 'result', result: 'plain text' });

            await expect(client.sendMessage('hi')).rejects.toThrow(
                'Invalid A2A response format: result must be an object'
            );
        });

        it('maps a timed-out request to a timeout error without a status', async () => {
            server.enqueue({ kind: 'timeout' });
            const error = await client.sendMessage('hi').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2ATimeoutError);
            expect(client.getMetrics()[0]).toMatchObject({
                statusCode: null,
                error: 'Agent response timeout',
            });
        });

        it('wraps network failures in a protocol error', async () => {
            server.enqueue({ kind: 'network-error', message: 'fetch failed' });
            const error = await client.sendMessage('hi').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(A2AProtocolError);
            expect(error).toMatchObject({
                message: 'Failed to send message: fetch failed',
                code: A2AErrorCode.TRANSPORT_FAILED,
                statusCode: undefined,
            });
        });

        it('records exactly one metric per call, success or failure', async () => {
            server.enqueue(
                textResult('a'),
                { kind: 'raw', status: 500, body: '' },
                textResult('b')
            );

            await client.sendMessage('1');
            await client.sendMessage('2').catch(() => undefined);
            await client.sendMessage('3');

            expect(client.getMetrics().map((m) => m.statusCode)).toEqual([200, 500, 200]);
            expect(client.getMetrics().map((m) => m.error === null)).toEqual([true, false, true]);
        });
    });

    describe('metrics and lifecycle', () => {
        it('returns a copy of the metrics and clears them', async () => {
            const server = createFakeAgentServer();
            const client = makeClient(server);
            await client.sendMessage('hi');

            const snapshot = client.getMetrics();
            snapshot.pop();
            expect(client.getMetrics()).toHaveLength(1);

            client.clearMetrics();
            expect(client.getMetrics()).toEqual([]);
        });

        it('never closes a borrowed transport', async () => {
            const server = createFakeAgentServer();
            const client = makeClient(server);

            await client.close();
            await client.close();

            expect(server.closeCount).toBe(0);
        });

        it('builds its owned pool with the factory and destroys it on closeSync', async () => {
            const pool = createFakeAgentServer();
            const transportFactory = vi.fn(() => pool);
            const client = new A2AClient(config, { transportFactory, logger: createMockLogger() });
            const borrowed = createFakeAgentServer();

            await client.sendMessage('Hello');
            client.closeSync();
            client.closeSync();
            makeClient(borrowed).closeSync();

            expect(transportFactory).toHaveBeenCalledWith({
                timeoutSeconds: config.timeout,
                verifySsl: config.verifySsl,
            });
            expect(pool.destroyCount).toBe(1);
            expect(pool.closeCount).toBe(0);
            expect(borrowed.destroyCount).toBe(0);
        });

        it('closes an owned transport idempotently', async () => {
            const client = new A2AClient(config, { logger: createMockLogger() });

            await expect(client.close()).resolves.toBeUndefined();
            await expect(client.close()).resolves.toBeUndefined();
        });

        it('closes the client after a scoped block even when it throws', async () => {
            const closeSpy = vi.spyOn(A2AClient.prototype, 'close');

            const options = { transport: createFakeAgentServer(), logger: createMockLogger() };

            await expect(
                A2AClient.withClient(
                    config,
                    async () => {
                        throw new Error('harness failure');
                    },
                    options
                )
            ).rejects.toThrow('harness failure');

            expect(closeSpy).toHaveBeenCalledTimes(1);
            closeSpy.mockRestore();
        });
    });
});
