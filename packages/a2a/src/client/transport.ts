import { Agent, fetch as undiciFetch } from 'undici';

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequestInit {
    method: HttpMethod;
    headers: Record<string, string>;
    body?: string;
    signal: AbortSignal;
}

/**
 * The part of a fetch Response the client reads
 */
export interface TransportResponse {
    readonly status: number;
    readonly statusText: string;
    text(): Promise<string>;
}

/**
 * HTTP transport used by A2AClient. Implementations must be safe for concurrent requests.
 */
export interface A2ATransport {
    fetch(url: string, init: TransportRequestInit): Promise<TransportResponse>;
    /** Drain in-flight requests, then release every connection */
    close(): Promise<void>;
    /**
     * Release every connection now, failing in-flight requests. Connections are torn down
     * before this returns; the promise only reports completion.
     */
    destroy(): Promise<void>;
}

export interface HttpTransportOptions {
    timeoutSeconds: number;
    verifySsl: boolean;
}

export type TransportFactory = (options: HttpTransportOptions) => A2ATransport;

/**
 * Transport backed by a dedicated undici connection pool.
 * The pool carries the TLS setting and the header/body timeouts; close() drains it,
 * destroy() drops it.
 */
export function createHttpTransport(options: HttpTransportOptions): A2ATransport {
    const timeoutMs = Math.ceil(options.timeoutSeconds * 1000);
    const dispatcher = new Agent({
        connect: { rejectUnauthorized: options.verifySsl },
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
    });
    let closed = false;

    return {
        fetch: (url, init) => undiciFetch(url, { ...init, dispatcher }),
        close: async () => {
            if (closed) {
                return;
            }
            closed = true;
            await dispatcher.close();
        },
        destroy: async () => {
            if (closed) {
                return;
            }
            closed = true;
            await dispatcher.destroy();
        },
    };
}

const UNDICI_TIMEOUT_CODES = new Set([
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
]);

/**
 * True for aborts from our own timer and for undici's own timeout errors,
 * which fetch reports as a `TypeError('fetch failed')` with the real error as `cause`.
 */
export function isTimeoutError(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        return true;
    }
    const cause: unknown = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
        return UNDICI_TIMEOUT_CODES.has(cause.code);
    }
    return false;
}
