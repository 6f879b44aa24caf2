import { ParleyBaseError } from './ParleyBaseError.js';
import type { Issue } from './types.js';

/**
 * Thrown when one or more validation issues were found at an API boundary.
 * The first error-severity issue supplies the message.
 */
export class ParleyValidationError extends ParleyBaseError {
    public readonly issues: Issue[];

    constructor(issues: Issue[]) {
        const first = issues.find((i) => i.severity === 'error') ?? issues[0];
        super(first ? first.message : 'Validation failed');
        this.issues = issues;
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            issues: this.issues,
            traceId: this.traceId,
        };
    }
}
