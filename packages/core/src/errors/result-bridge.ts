import type { z } from 'zod';
import { ParleyValidationError } from './ParleyValidationError.js';
import { ErrorType, type ErrorScope, type Issue } from './types.js';
import type { Logger } from '../logger/types.js';

/**
 * Convert zod issues into the project's Issue shape.
 * A refinement can carry its own `code` through `params`.
 */
export function zodToIssues(error: z.ZodError, scope: ErrorScope | string, code: string): Issue[] {
    return error.issues.map((issue) => {
        const params = 'params' in issue ? issue.params : undefined;
        const customCode =
            params && typeof params === 'object' && typeof params.code === 'string'
                ? params.code
                : undefined;
        return {
            code: customCode ?? code,
            message: issue.message,
            scope,
            type: ErrorType.USER,
            severity: 'error',
            path: issue.path,
        };
    });
}

/**
 * Bridge a zod `safeParse` result to the exception flow used at public API boundaries.
 *
 * @example
 * ```typescript
 * const config = ensureOk(A2AConfigSchema.safeParse(input), ErrorScope.CONFIG, 'config_invalid');
 * ```
 */
export function ensureOk<I, T>(
    result: z.SafeParseReturnType<I, T>,
    scope: ErrorScope | string,
    code: string,
    logger?: Logger
): T {
    if (result.success) {
        return result.data;
    }

    const issues = zodToIssues(result.error, scope, code);
    logger?.error('ensureOk: found validation errors, throwing ParleyValidationError', {
        issues: issues.map((i) => i.message),
    });
    throw new ParleyValidationError(issues);
}
