export { AgentCardSchema, parseAgentCard } from './schemas.js';
export type { AgentCardInput, AgentCardParseResult } from './schemas.js';
