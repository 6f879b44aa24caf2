import type { AgentCard } from '../types.js';
import type { StructuredMessage } from '../messages/types.js';

/**
 * Per-conversation state. Treated as an immutable value: each turn returns a new one.
 */
export interface ConversationState {
    /** Server-issued context token; null until the agent assigns one */
    readonly contextId: string | null;
    readonly history: readonly StructuredMessage[];
    /** Card discovered on the first turn, when discovery is enabled */
    readonly agentCard: AgentCard | null;
    /** Successful exchanges so far */
    readonly requestCount: number;
}

export function createInitialState(
    history: readonly StructuredMessage[] = []
): ConversationState {
    return {
        contextId: null,
        history: [...history],
        agentCard: null,
        requestCount: 0,
    };
}
