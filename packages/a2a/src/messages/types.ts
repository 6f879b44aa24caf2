/**
 * Structured conversation messages exchanged with the benchmark harness.
 *
 * These are the harness-side types; `translation/` converts them to and from
 * the plain-text content A2A carries.
 */

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type Requestor = 'assistant' | 'user';

export interface ToolCall {
    id: string;
    name: string;
    arguments: JsonObject;
    requestor: Requestor;
}

export interface UserMessage {
    role: 'user';
    content: string | null;
    toolCalls?: ToolCall[] | null;
}

export interface AssistantMessage {
    role: 'assistant';
    content: string | null;
    toolCalls: ToolCall[] | null;
}

/**
 * Result of executing a tool call, sent back to the agent
 */
export interface ToolMessage {
    role: 'tool';
    /** Id of the tool call this result answers */
    id: string;
    content: string | null;
    error: boolean;
    requestor: Requestor;
}

export type StructuredMessage = UserMessage | AssistantMessage | ToolMessage;

/**
 * Messages the adapter accepts as input for a turn
 */
export type AgentInputMessage = UserMessage | ToolMessage;

/**
 * JSON-schema-shaped parameter declaration of one tool
 */
export interface ToolParameterSchema {
    type?: string;
    description?: string;
    [key: string]: unknown;
}

/**
 * Tool declaration supplied by the harness's tool catalog (read-only here)
 */
export interface ToolDescriptor {
    name: string;
    description?: string;
    parameters?: {
        type?: 'object';
        properties?: Record<string, ToolParameterSchema>;
        required?: string[];
    };
}

export function hasTextContent(message: AssistantMessage): boolean {
    return message.content !== null && message.content.trim() !== '';
}
