/**
 * Minimal A2A agent over real HTTP, meant to run in a child process so a test can block its
 * own thread on a synchronous call. Serves the test card and echoes every message/send.
 * Reports `{ url }` to the parent once listening and exits when the parent disconnects.
 */

import http from 'http';
import { isPlainObject } from '../client/response-parser.js';
import { AGENT_CARD_PATH } from '../types.js';
import { createTestAgentCard } from './fake-agent-server.js';

const RESPONDER_CONTEXT_ID = 'ctx-responder';

function sentMessage(body: unknown): Record<string, unknown> | null {
    return isPlainObject(body) && isPlainObject(body.params) && isPlainObject(body.params.message)
        ? body.params.message
        : null;
}

function firstText(body: unknown): string {
    const parts = sentMessage(body)?.parts;
    if (!Array.isArray(parts)) {
        return '';
    }
    const first: unknown = parts[0];
    return isPlainObject(first) && typeof first.text === 'string' ? first.text : '';
}

function reply(body: unknown): string {
    const sent = sentMessage(body)?.contextId;
    const contextId = typeof sent === 'string' ? sent : RESPONDER_CONTEXT_ID;
    return JSON.stringify({
        jsonrpc: '2.0',
        id: isPlainObject(body) ? body.id : null,
        result: {
            kind: 'message',
            role: 'agent',
            parts: [{ kind: 'text', text: `echo: ${firstText(body)}` }],
            contextId,
        },
    });
}

function parse(raw: string): unknown {
    try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    } catch {
        return null;
    }
}

const server = http.createServer((req, res) => {
    if (req.method === 'GET' && req.url === `/${AGENT_CARD_PATH}`) {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(createTestAgentCard()));
        return;
    }
    if (req.method !== 'POST') {
        res.writeHead(404);
        res.end('Not Found');
        return;
    }
    let raw = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
        raw += chunk;
    });
    req.on('end', () => {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(reply(parse(raw)));
    });
});

server.listen(0, '127.0.0.1', () => {
    const address = server.address();
    if (address && typeof address === 'object') {
        process.send?.({ url: `http://127.0.0.1:${address.port}` });
    }
});

process.on('disconnect', () => {
    server.close();
    server.closeAllConnections();
});
