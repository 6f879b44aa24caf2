/**
 * Worker side of the synchronous bridge. Loaded by the bridge's bootstrap, which wakes the
 * blocked caller once this resolves or throws.
 */

import { MessagePort } from 'worker_threads';
import { isPlainObject } from '../client/response-parser.js';
import { isExchangeRequest, runExchange, type ExchangeRequest } from './exchange.js';

interface BridgeWorkerData {
    request: ExchangeRequest;
    port: MessagePort;
}

function isBridgeWorkerData(value: unknown): value is BridgeWorkerData {
    return (
        isPlainObject(value) && isExchangeRequest(value.request) && value.port instanceof MessagePort
    );
}

/**
 * Run the exchange described by the worker's data and post its outcome on the transferred port
 */
export async function runBridgedExchange(data: unknown): Promise<void> {
    if (!isBridgeWorkerData(data)) {
        throw new Error('exchange worker started without a request and port');
    }
    const outcome = await runExchange(data.request);
    data.port.postMessage(outcome);
}
