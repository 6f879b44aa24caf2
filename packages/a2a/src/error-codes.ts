/**
 * A2A-specific error codes
 * Covers discovery, message exchange, response parsing and tool-call translation
 */
export enum A2AErrorCode {
    // Generic protocol failures (HTTP >= 400, transport errors)
    PROTOCOL_ERROR = 'a2a_protocol_error',
    TRANSPORT_FAILED = 'a2a_transport_failed',

    // Classified failures
    TIMEOUT = 'a2a_timeout',
    AUTH_FAILED = 'a2a_auth_failed',

    // Discovery
    CARD_NOT_FOUND = 'a2a_card_not_found',
    DISCOVERY_FAILED = 'a2a_discovery_failed',
    INVALID_AGENT_CARD = 'a2a_invalid_agent_card',

    // Message exchange
    AGENT_RETURNED_ERROR = 'a2a_agent_returned_error',
    INVALID_RESPONSE = 'a2a_invalid_response',
    INVALID_TOOL_CALL = 'a2a_invalid_tool_call',

    // Configuration
    INVALID_CONFIG = 'a2a_invalid_config',

    // Metrics export
    INVALID_RESULTS_FILE = 'a2a_invalid_results_file',

    // Sync bridge
    BRIDGE_FAILED = 'a2a_bridge_failed',
}
