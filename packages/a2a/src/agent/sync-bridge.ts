import { MessageChannel, Worker, receiveMessageOnPort } from 'worker_threads';
import type { Logger } from '@parley/core';
import { isPlainObject } from '../client/response-parser.js';
import { A2AError } from '../errors.js';
import { isExchangeOutcome, type ExchangeOutcome, type ExchangeRequest } from './exchange.js';

/**
 * Runs an exchange to completion and returns its outcome without yielding to the caller's loop
 */
export interface SyncBridge {
    run(request: ExchangeRequest): ExchangeOutcome;
}

export interface WorkerThreadBridgeOptions {
    logger: Logger;
    /** Module exporting `runBridgedExchange`; defaults to the sibling exchange-worker module */
    workerUrl?: URL;
    /** Upper bound on the blocking wait; defaults to twice the request timeout plus five seconds */
    waitTimeoutMs?: number;
}

/** Export condition that resolves workspace packages to their TypeScript sources */
export const SOURCE_CONDITION = 'source';

/** tsx API whose `tsImport` loads a TypeScript module graph */
const TS_LOADER = 'tsx/esm/api';

/**
 * Worker entry. Plain script so it loads before any TypeScript support is registered.
 * Whatever happens after the worker starts, it posts either an outcome or `{ bridgeError }`
 * and wakes the caller, so the caller never waits out its budget on a broken worker.
 */
const BOOTSTRAP = `
const { workerData } = require('node:worker_threads');
const { entry, loader, port, signal } = workerData;
(async () => {
    const exchangeModule = loader
        ? await (await import(loader)).tsImport(entry, entry)
        : await import(entry);
    await exchangeModule.runBridgedExchange(workerData);
})()
    .catch((error) => {
        process.exitCode = 1;
        port.postMessage({ bridgeError: error instanceof Error ? error.message : String(error) });
    })
    .finally(() => {
        port.close();
        Atomics.store(signal, 0, 1);
        Atomics.notify(signal, 0);
    });
`;

function defaultWorkerUrl(): URL {
    const extension = import.meta.url.endsWith('.ts') ? 'ts' : 'js';
    return new URL(`./exchange-worker.${extension}`, import.meta.url);
}

function isBridgeError(value: unknown): value is { bridgeError: string } {
    return isPlainObject(value) && typeof value.bridgeError === 'string';
}

/**
 * Bridge that runs each exchange on a short-lived worker thread with its own event loop.
 *
 * The calling thread parks in `Atomics.wait` until the worker signals, then drains the
 * outcome with `receiveMessageOnPort`. The worker and channel belong to one call and are
 * released on every exit path, so the caller's own loop (possibly serving A2A requests
 * from the very agent being called) is never re-entered.
 *
 * A `.ts` worker module is loaded with tsx's `tsImport` under the `source` export condition,
 * which is how workspace packages resolve when running from sources; a built `.js` module
 * needs neither.
 */
export class WorkerThreadBridge implements SyncBridge {
    private readonly logger: Logger;
    private readonly workerUrl: URL;
    private readonly waitTimeoutMs: number | undefined;

    constructor(options: WorkerThreadBridgeOptions) {
        this.logger = options.logger;
        this.workerUrl = options.workerUrl ?? defaultWorkerUrl();
        this.waitTimeoutMs = options.waitTimeoutMs;
    }

    run(request: ExchangeRequest): ExchangeOutcome {
        const signal = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
        const { port1, port2 } = new MessageChannel();
        const budgetMs = this.waitTimeoutMs ?? request.config.timeout * 2000 + 5000;
        const fromSource = this.workerUrl.pathname.endsWith('.ts');

        this.logger.debug('Dispatching A2A exchange to worker thread', {
            contextId: request.contextId,
            discover: request.discover,
            budgetMs,
        });

        let worker: Worker;
        try {
            worker = new Worker(BOOTSTRAP, {
                eval: true,
                workerData: {
                    entry: this.workerUrl.href,
                    loader: fromSource ? TS_LOADER : null,
                    request,
                    port: port2,
                    signal,
                },
                transferList: [port2],
                ...(fromSource && { execArgv: [`--conditions=${SOURCE_CONDITION}`] }),
            });
        } catch (error) {
            port1.close();
            const reason = error instanceof Error ? error.message : String(error);
            throw A2AError.bridgeFailed(reason, error);
        }
        worker.on('error', (error: unknown) => {
            this.logger.warn('Bridge worker failed', {
                error: error instanceof Error ? error.message : String(error),
            });
        });

        try {
            const waited = Atomics.wait(signal, 0, 0, budgetMs);
            const received = receiveMessageOnPort(port1);
            if (!received) {
                throw A2AError.bridgeFailed(
                    waited === 'timed-out'
                        ? `worker did not finish within ${budgetMs}ms`
                        : 'worker exited without an outcome'
                );
            }
            const outcome: unknown = received.message;
            if (isBridgeError(outcome)) {
                throw A2AError.bridgeFailed(outcome.bridgeError);
            }
            if (!isExchangeOutcome(outcome)) {
                throw A2AError.bridgeFailed('worker posted a malformed outcome');
            }
            return outcome;
        } finally {
            port1.close();
            worker.terminate().catch((error: unknown) => {
                this.logger.warn('Failed to terminate bridge worker', {
                    error: error instanceof Error ? error.message : String(error),
                });
            });
        }
    }
}
