/**
 * A2A Protocol wire types (client side)
 *
 * Shapes follow the A2A protocol's JSON-RPC binding. Outgoing types are exact;
 * incoming results are parsed leniently in `client/response-parser.ts`, because
 * servers in the wild answer `message/send` with several different layouts.
 *
 * @module a2a/types
 */

/**
 * Message role per A2A protocol
 */
export type MessageRole = 'user' | 'agent';

/**
 * Text part as we send it. Incoming parts are read by their `text` field alone,
 * since some servers omit `kind`.
 */
export interface TextPart {
    readonly kind: 'text';
    text: string;
    metadata?: Record<string, unknown>;
}

/**
 * Outgoing A2A message
 */
export interface OutgoingMessage {
    readonly kind: 'message';
    messageId: string;
    role: MessageRole;
    parts: TextPart[];
    /** Server-issued context token; null on the first turn of a conversation */
    contextId: string | null;
}

export interface MessageSendParams {
    message: OutgoingMessage;
}

/**
 * JSON-RPC 2.0 request envelope
 */
export interface JsonRpcRequest<M extends string = string, P = unknown> {
    jsonrpc: '2.0';
    id: string;
    method: M;
    params: P;
}

export type MessageSendRequest = JsonRpcRequest<'message/send', MessageSendParams>;

/**
 * JSON-RPC 2.0 error object
 */
export interface JsonRpcError {
    code: number;
    message: string;
    data?: unknown;
}

/**
 * Capability flags advertised on the agent card
 */
export interface AgentCapabilities {
    streaming: boolean;
    pushNotifications: boolean;
}

export interface AgentSkill {
    id: string;
    name: string;
    description?: string | undefined;
    tags?: string[] | undefined;
}

/**
 * Agent card served at `/.well-known/agent-card.json`
 */
export interface AgentCard {
    name: string;
    url: string;
    description?: string | undefined;
    version?: string | undefined;
    capabilities: AgentCapabilities;
    securitySchemes?: Record<string, unknown> | undefined;
    security?: unknown[] | undefined;
    skills?: AgentSkill[] | undefined;
}

export const AGENT_CARD_PATH = '.well-known/agent-card.json';
export const MESSAGE_SEND_METHOD = 'message/send';
