/**
 * Structured message <-> A2A text content conversion.
 *
 * A2A carries plain text, so tool calls travel as JSON embedded in the message text:
 * `{"tool_call": {...}}` for one call and `{"tool_calls": [{"tool_call": {...}}, ...]}` for several.
 */

import { randomUUID } from 'crypto';
import { A2AError } from '../errors.js';
import type {
    AssistantMessage,
    JsonObject,
    JsonValue,
    Requestor,
    StructuredMessage,
    ToolCall,
    ToolDescriptor,
} from '../messages/types.js';
import { hasTextContent } from '../messages/types.js';
import { formatToolsAsText } from './tool-catalog.js';

/**
 * Substituted when the agent answers with nothing, so an empty turn never reaches the harness
 */
export const EMPTY_RESPONSE_FALLBACK =
    'I apologize, but I was unable to generate a response. Could you please rephrase your request?';

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonObject(value: unknown): value is JsonObject {
    return isPlainObject(value);
}

/**
 * Convert a structured message to the text content of an A2A message.
 *
 * - user: its text, followed by the rendered tool catalog when `tools` is non-empty
 * - assistant: its text, or its tool calls as JSON when it has no text
 * - tool: `Tool result (id=<id>): <content>`, with `ERROR: ` before the content on failure
 */
export function toWireContent(
    message: StructuredMessage,
    tools?: readonly ToolDescriptor[] | null
): string {
    switch (message.role) {
        case 'user': {
            const parts: string[] = [];
            if (message.content) {
                parts.push(message.content);
            }
            if (tools && tools.length > 0) {
                parts.push(formatToolsAsText(tools));
            }
            return parts.join('\n\n');
        }

        case 'assistant': {
            if (hasTextContent(message)) {
                return message.content ?? '';
            }
            const calls = message.toolCalls ?? [];
            if (calls.length === 0) {
                return '';
            }
            const envelopes = calls.map((call) => ({
                tool_call: { id: call.id, name: call.name, arguments: call.arguments },
            }));
            return JSON.stringify(
                envelopes.length === 1 ? envelopes[0] : { tool_calls: envelopes }
            );
        }

        case 'tool': {
            const prefix = `Tool result (id=${message.id}):`;
            if (message.error) {
                return `${prefix} ERROR: ${message.content || 'Unknown error'}`;
            }
            return `${prefix} ${message.content ?? ''}`;
        }
    }
}

function toolCallFromEnvelope(body: unknown, requestor: Requestor): ToolCall {
    if (!isPlainObject(body)) {
        throw A2AError.invalidToolCall('tool_call must be an object');
    }
    if (typeof body.name !== 'string' || body.name === '') {
        throw A2AError.invalidToolCall("missing 'name'");
    }
    if (!('arguments' in body)) {
        throw A2AError.invalidToolCall("missing 'arguments'");
    }
    const args: unknown = body.arguments;
    if (!isJsonObject(args)) {
        throw A2AError.invalidToolCall("'arguments' must be an object");
    }
    return {
        id: typeof body.id === 'string' && body.id !== '' ? body.id : randomUUID(),
        name: body.name,
        arguments: args,
        requestor,
    };
}

function parseJson(text: string): { ok: true; value: JsonValue } | { ok: false } {
    try {
        const value: JsonValue = JSON.parse(text);
        return { ok: true, value };
    } catch {
        return { ok: false };
    }
}

/**
 * Extract tool calls from agent response text.
 *
 * Returns null when the text is empty, is not JSON, or is JSON without a
 * `tool_call`/`tool_calls` key; those are ordinary text replies.
 *
 * @throws A2AMessageError when a recognized envelope is structurally invalid
 *   (missing `name` or `arguments`, or `tool_calls` not being an array)
 */
export function parseToolCalls(
    text: string | null | undefined,
    requestor: Requestor = 'assistant'
): ToolCall[] | null {
    if (!text || !text.trim()) {
        return null;
    }

    const parsed = parseJson(text.trim());
    if (!parsed.ok || !isPlainObject(parsed.value)) {
        return null;
    }
    const data = parsed.value;

    if ('tool_call' in data) {
        return [toolCallFromEnvelope(data.tool_call, requestor)];
    }

    if ('tool_calls' in data) {
        if (!Array.isArray(data.tool_calls)) {
            throw A2AError.invalidToolCall("'tool_calls' must be an array");
        }
        const calls: ToolCall[] = [];
        for (const entry of data.tool_calls) {
            // Entries without a tool_call wrapper are not calls
            if (isPlainObject(entry) && 'tool_call' in entry) {
                calls.push(toolCallFromEnvelope(entry.tool_call, requestor));
            }
        }
        return calls.length > 0 ? calls : null;
    }

    return null;
}

/**
 * Convert agent response text into an assistant message: tool calls when the text
 * carries a tool-call envelope, the fallback apology when it is blank, the text otherwise.
 */
export function fromWireContent(text: string | null | undefined): AssistantMessage {
    const toolCalls = parseToolCalls(text);
    if (toolCalls) {
        return { role: 'assistant', content: null, toolCalls };
    }

    if (!text || !text.trim()) {
        return { role: 'assistant', content: EMPTY_RESPONSE_FALLBACK, toolCalls: null };
    }

    return { role: 'assistant', content: text, toolCalls: null };
}
