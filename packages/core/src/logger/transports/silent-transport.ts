/**
 * Silent Transport
 *
 * Discards every entry. Used for worker threads and tests where output must stay quiet.
 */

import type { LoggerTransport, LogEntry } from '../types.js';

export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {}
}
