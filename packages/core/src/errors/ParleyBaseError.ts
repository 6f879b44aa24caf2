import { randomUUID } from 'crypto';

/**
 * Abstract base for every error the project throws on purpose.
 * Gives each error a trace id and a stable JSON shape for logs and API responses.
 */
export abstract class ParleyBaseError extends Error {
    public readonly traceId: string;

    constructor(message: string, traceId?: string) {
        super(message);
        this.name = new.target.name;
        this.traceId = traceId ?? randomUUID();
        // Keep instanceof checks working when compiled down
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * Serialize for logs and transport across process or thread boundaries
     */
    abstract toJSON(): Record<string, unknown>;
}
