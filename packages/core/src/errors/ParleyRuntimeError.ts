import { ParleyBaseError } from './ParleyBaseError.js';
import { ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error with a domain code, scope and HTTP-mapped type.
 * Domains create these through their static factory classes (see `errors.ts` in each domain)
 * rather than calling the constructor directly.
 */
export class ParleyRuntimeError<C = unknown> extends ParleyBaseError {
    constructor(
        public readonly code: string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[],
        traceId?: string
    ) {
        super(message, traceId);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            context: this.context,
            recovery: this.recovery,
            traceId: this.traceId,
        };
    }
}
