/**
 * In-process stand-in for a remote A2A agent, for tests.
 *
 * Implements A2ATransport, so a client talks to it exactly as it would to undici:
 * GETs of the agent card path return the configured card, POSTs are answered from a
 * queue of scripted replies. Every request is recorded.
 */

import type { A2ATransport, TransportRequestInit, TransportResponse } from '../client/transport.js';
import { isPlainObject } from '../client/response-parser.js';
import { AGENT_CARD_PATH } from '../types.js';

export type FakeReply =
    /** 200 with `{ jsonrpc, id, result }` */
    | { kind: 'result'; result: unknown }
    /** 200 with `{ jsonrpc, id, error }` */
    | { kind: 'rpc-error'; error: unknown }
    /** Any status with a raw body */
    | { kind: 'raw'; status: number; body: string }
    /** Rejects as an aborted request would */
    | { kind: 'timeout' }
    /** Rejects as a refused connection would */
    | { kind: 'network-error'; message: string };

export interface RecordedRequest {
    url: string;
    method: string;
    headers: Record<string, string>;
    /** Parsed JSON body, or undefined for GETs */
    body: unknown;
}

export interface FakeAgentServerOptions {
    /** Card body served on discovery; a reply overrides it (e.g. a 404) */
    card?: unknown;
    cardReply?: FakeReply;
    /** Served, in order, to message/send requests */
    replies?: FakeReply[];
}

export interface FakeAgentServer extends A2ATransport {
    readonly requests: RecordedRequest[];
    /** Number of close() calls received */
    readonly closeCount: number;
    /** Number of destroy() calls received */
    readonly destroyCount: number;
    enqueue(...replies: FakeReply[]): void;
    /** Bodies of the POSTed JSON-RPC requests */
    sentBodies(): unknown[];
}

export function createTestAgentCard(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        name: 'test-agent',
        url: 'http://agent.test',
        description: 'Agent used in tests',
        version: '1.0.0',
        capabilities: { streaming: false, push_notifications: false },
        ...overrides,
    };
}

/** Agent reply in the `parts` shape, the most common layout */
export function textResult(text: string, contextId?: string): FakeReply {
    return {
        kind: 'result',
        result: {
            kind: 'message',
            role: 'agent',
            parts: [{ kind: 'text', text }],
            ...(contextId !== undefined && { contextId }),
        },
    };
}

function response(status: number, body: string): TransportResponse {
    return {
        status,
        statusText: status < 400 ? 'OK' : 'Error',
        text: async () => body,
    };
}

function timeoutError(): Error {
    const error = new Error('This operation was aborted');
    error.name = 'AbortError';
    return error;
}

function parseBody(body: string | undefined): unknown {
    if (body === undefined) {
        return undefined;
    }
    try {
        const parsed: unknown = JSON.parse(body);
        return parsed;
    } catch {
        return body;
    }
}

export function createFakeAgentServer(options: FakeAgentServerOptions = {}): FakeAgentServer {
    const requests: RecordedRequest[] = [];
    const queue: FakeReply[] = [...(options.replies ?? [])];
    let closeCount = 0;
    let destroyCount = 0;

    const answer = async (reply: FakeReply, requestId: unknown): Promise<TransportResponse> => {
        switch (reply.kind) {
            case 'result':
                return response(200, JSON.stringify({ jsonrpc: '2.0', id: requestId, result: reply.result }));
            case 'rpc-error':
                return response(200, JSON.stringify({ jsonrpc: '2.0', id: requestId, error: reply.error }));
            case 'raw':
                return response(reply.status, reply.body);
            case 'timeout':
                throw timeoutError();
            case 'network-error':
                throw new TypeError(reply.message);
        }
    };

    return {
        requests,
        get closeCount() {
            return closeCount;
        },
        get destroyCount() {
            return destroyCount;
        },
        enqueue(...replies: FakeReply[]) {
            queue.push(...replies);
        },
        sentBodies() {
            return requests.filter((r) => r.method === 'POST').map((r) => r.body);
        },
        async fetch(url: string, init: TransportRequestInit): Promise<TransportResponse> {
            const body = parseBody(init.body);
            requests.push({ url, method: init.method, headers: { ...init.headers }, body });

            if (init.method === 'GET') {
                if (!url.endsWith(`/${AGENT_CARD_PATH}`)) {
                    return response(404, 'Not Found');
                }
                if (options.cardReply) {
                    return answer(options.cardReply, null);
                }
                return options.card === undefined
                    ? response(404, 'Not Found')
                    : response(200, JSON.stringify(options.card));
            }

            const reply = queue.shift() ?? textResult('ok');
            return answer(reply, isPlainObject(body) ? body.id : null);
        },
        async close() {
            closeCount++;
        },
        async destroy() {
            destroyCount++;
        },
    };
}
