import { ErrorScope, ErrorType, ParleyRuntimeError } from '@parley/core';
import { A2AErrorCode } from './error-codes.js';

export interface A2AErrorOptions {
    code?: A2AErrorCode;
    type?: ErrorType;
    statusCode?: number | undefined;
    details?: Record<string, unknown>;
    cause?: unknown;
    recovery?: string;
}

/**
 * Serialized form used to carry an A2A error across a worker-thread boundary
 */
export interface SerializedA2AError {
    name: string;
    code: string;
    message: string;
    statusCode?: number | undefined;
    details: Record<string, unknown>;
}

function typeForStatus(statusCode: number | undefined): ErrorType {
    if (statusCode === undefined) return ErrorType.THIRD_PARTY;
    if (statusCode === 401 || statusCode === 403) return ErrorType.FORBIDDEN;
    if (statusCode === 404) return ErrorType.NOT_FOUND;
    if (statusCode === 408) return ErrorType.TIMEOUT;
    if (statusCode >= 400 && statusCode < 500) return ErrorType.USER;
    return ErrorType.THIRD_PARTY;
}

/**
 * Base class for every failure of the A2A protocol layer.
 * Carries the HTTP status when one is known and a free-form detail map.
 */
export class A2AProtocolError extends ParleyRuntimeError<Record<string, unknown>> {
    public readonly statusCode: number | undefined;
    public readonly details: Record<string, unknown>;

    constructor(message: string, options: A2AErrorOptions = {}) {
        const details = options.details ?? {};
        super(
            options.code ?? A2AErrorCode.PROTOCOL_ERROR,
            ErrorScope.A2A,
            options.type ?? typeForStatus(options.statusCode),
            message,
            {
                ...details,
                ...(options.statusCode !== undefined && { statusCode: options.statusCode }),
            },
            options.recovery
        );
        this.statusCode = options.statusCode;
        this.details = details;
        if (options.cause !== undefined) {
            this.cause = options.cause;
        }
    }

    override toString(): string {
        const parts = [`${this.name}: ${this.message}`];
        if (this.statusCode !== undefined) {
            parts.push(`(HTTP ${this.statusCode})`);
        }
        if (Object.keys(this.details).length > 0) {
            parts.push(`Details: ${JSON.stringify(this.details)}`);
        }
        return parts.join(' ');
    }

    serialize(): SerializedA2AError {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            statusCode: this.statusCode,
            details: this.details,
        };
    }
}

/** The agent did not answer in time (HTTP 408 semantics) */
export class A2ATimeoutError extends A2AProtocolError {
    constructor(message = 'A2A agent response timeout', options: A2AErrorOptions = {}) {
        super(message, { code: A2AErrorCode.TIMEOUT, statusCode: 408, ...options });
    }
}

/** The agent rejected our credentials (HTTP 401) */
export class A2AAuthError extends A2AProtocolError {
    constructor(message = 'A2A authentication failed', options: A2AErrorOptions = {}) {
        super(message, { code: A2AErrorCode.AUTH_FAILED, statusCode: 401, ...options });
    }
}

/** The agent card could not be fetched or validated */
export class A2ADiscoveryError extends A2AProtocolError {
    public readonly endpoint: string | undefined;

    constructor(
        message = 'Agent discovery failed',
        endpoint?: string,
        options: A2AErrorOptions = {}
    ) {
        super(message, {
            code: A2AErrorCode.DISCOVERY_FAILED,
            statusCode: 404,
            ...options,
            details: { ...(endpoint !== undefined && { endpoint }), ...options.details },
        });
        this.endpoint = endpoint;
    }
}

/** The response was malformed, or the agent answered with a JSON-RPC error */
export class A2AMessageError extends A2AProtocolError {
    constructor(message = 'A2A message error', options: A2AErrorOptions = {}) {
        super(message, { code: A2AErrorCode.INVALID_RESPONSE, statusCode: 400, ...options });
    }
}

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

/**
 * A2A error factory with typed methods for each failure the protocol layer reports
 */
export class A2AError {
    static discoveryAuthRequired(): A2AAuthError {
        return new A2AAuthError('Agent discovery requires authentication', {
            recovery: 'Provide a bearer token via authToken or A2A_AUTH_TOKEN',
        });
    }

    static cardNotFound(endpoint: string): A2ADiscoveryError {
        return new A2ADiscoveryError(
            'Agent card not found at /.well-known/agent-card.json',
            endpoint,
            { code: A2AErrorCode.CARD_NOT_FOUND, statusCode: 404 }
        );
    }

    static discoveryFailed(endpoint: string, statusCode: number): A2ADiscoveryError {
        return new A2ADiscoveryError(
            `Agent discovery failed with status ${statusCode}`,
            endpoint,
            { statusCode }
        );
    }

    static invalidAgentCard(endpoint: string, reason: string, cause?: unknown): A2ADiscoveryError {
        return new A2ADiscoveryError(`Invalid agent card format: ${reason}`, endpoint, {
            code: A2AErrorCode.INVALID_AGENT_CARD,
            cause,
        });
    }

    static discoveryTimeout(timeoutSeconds: number, cause?: unknown): A2ATimeoutError {
        return new A2ATimeoutError('Agent discovery timed out', {
            details: { timeout: timeoutSeconds },
            cause,
        });
    }

    static discoveryTransportFailed(endpoint: string, cause: unknown): A2ADiscoveryError {
        return new A2ADiscoveryError(
            `Agent discovery failed: ${describeCause(cause)}`,
            endpoint,
            { code: A2AErrorCode.DISCOVERY_FAILED, statusCode: undefined, cause }
        );
    }

    static authFailed(): A2AAuthError {
        return new A2AAuthError('Authentication failed');
    }

    static responseTimeout(timeoutSeconds: number, cause?: unknown): A2ATimeoutError {
        return new A2ATimeoutError('Agent response timeout', {
            details: { timeout: timeoutSeconds },
            cause,
        });
    }

    static httpError(statusCode: number, embeddedError?: unknown): A2AProtocolError {
        let message = `Message send failed with status ${statusCode}`;
        if (embeddedError !== undefined) {
            const rendered =
                typeof embeddedError === 'string' ? embeddedError : JSON.stringify(embeddedError);
            message = `${message}: ${rendered}`;
        }
        return new A2AProtocolError(message, {
            statusCode,
            details: embeddedError !== undefined ? { error: embeddedError } : {},
        });
    }

    static transportFailed(cause: unknown): A2AProtocolError {
        return new A2AProtocolError(`Failed to send message: ${describeCause(cause)}`, {
            code: A2AErrorCode.TRANSPORT_FAILED,
            cause,
        });
    }

    static agentReturnedError(detail: string, rpcCode?: number, data?: unknown): A2AMessageError {
        return new A2AMessageError(`Agent returned error: ${detail}`, {
            code: A2AErrorCode.AGENT_RETURNED_ERROR,
            details: {
                ...(rpcCode !== undefined && { rpcCode }),
                ...(data !== undefined && { data }),
            },
        });
    }

    static invalidResponse(reason: string, cause?: unknown): A2AMessageError {
        return new A2AMessageError(`Invalid A2A response format: ${reason}`, { cause });
    }

    static invalidToolCall(reason: string): A2AMessageError {
        return new A2AMessageError(`Invalid tool call format: ${reason}`, {
            code: A2AErrorCode.INVALID_TOOL_CALL,
        });
    }

    static invalidResultsFile(filePath: string): ParleyRuntimeError {
        return new ParleyRuntimeError(
            A2AErrorCode.INVALID_RESULTS_FILE,
            ErrorScope.METRICS,
            ErrorType.USER,
            `Results file ${filePath} does not contain a JSON object`,
            { filePath }
        );
    }

    static bridgeFailed(reason: string, cause?: unknown): A2AProtocolError {
        return new A2AProtocolError(`Synchronous bridge failed: ${reason}`, {
            code: A2AErrorCode.BRIDGE_FAILED,
            type: ErrorType.SYSTEM,
            cause,
        });
    }
}

type A2AErrorClass = new (message: string, options: A2AErrorOptions) => A2AProtocolError;

const ERROR_CLASSES: Record<string, A2AErrorClass | undefined> = {
    A2AProtocolError,
    A2ATimeoutError,
    A2AAuthError,
    A2AMessageError,
};

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(A2AErrorCode));

function isErrorCode(code: string): code is A2AErrorCode {
    return ERROR_CODES.has(code);
}

/**
 * Rebuild a typed error from its serialized form, keeping the original class
 */
export function deserializeA2AError(data: SerializedA2AError): A2AProtocolError {
    const options: A2AErrorOptions = {
        statusCode: data.statusCode,
        details: data.details,
        ...(isErrorCode(data.code) && { code: data.code }),
    };
    if (data.name === 'A2ADiscoveryError') {
        const endpoint =
            typeof data.details.endpoint === 'string' ? data.details.endpoint : undefined;
        return new A2ADiscoveryError(data.message, endpoint, options);
    }
    const ErrorClass = ERROR_CLASSES[data.name] ?? A2AProtocolError;
    return new ErrorClass(data.message, options);
}
