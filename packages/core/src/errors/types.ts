/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    A2A = 'a2a', // A2A protocol exchange, discovery, response parsing
    AGENT = 'agent', // Agent adapter lifecycle and conversation state
    CONFIG = 'config', // Connection configuration parsing and validation
    LOGGER = 'logger', // Logging system operations, transports, and configuration
    TRANSLATION = 'translation', // Structured message <-> wire content conversion
    METRICS = 'metrics', // Protocol metric collection and export
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // 401/403 - authentication or permission failure
    NOT_FOUND = 'not_found', // 404 - resource doesn't exist (agent card, file, etc.)
    TIMEOUT = 'timeout', // 408 - operation timed out
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - remote agent failures, malformed responses
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType; // HTTP status mapping
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
