/**
 * Redacts credentials from log context before it reaches a transport.
 * - By field name (authToken, authorization, password, ...), case-insensitive
 * - By value pattern (Bearer tokens, JWTs) inside any string
 * - Recursive, preserves structure, marks circular references
 */

const SENSITIVE_FIELDS = new Set([
    'apikey',
    'api_key',
    'token',
    'authtoken',
    'auth_token',
    'access_token',
    'refresh_token',
    'authorization',
    'password',
    'secret',
]);

const SENSITIVE_PATTERNS: RegExp[] = [
    /\bBearer\s+[A-Za-z0-9\-_.=~+/]+/gi,
    /\beyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*/g, // JWT
];

const REDACTED = '[REDACTED]';
const REDACTED_CIRCULAR = '[REDACTED_CIRCULAR]';

export function redactSensitiveData(input: unknown, seen = new WeakSet<object>()): unknown {
    if (typeof input === 'string') {
        let result = input;
        for (const pattern of SENSITIVE_PATTERNS) {
            result = result.replace(pattern, REDACTED);
        }
        return result;
    }
    if (Array.isArray(input)) {
        if (seen.has(input)) return REDACTED_CIRCULAR;
        seen.add(input);
        return input.map((item) => redactSensitiveData(item, seen));
    }
    if (input instanceof Error) {
        return { name: input.name, message: redactSensitiveData(input.message, seen) };
    }
    if (input && typeof input === 'object') {
        if (seen.has(input)) return REDACTED_CIRCULAR;
        seen.add(input);
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(input)) {
            result[key] = SENSITIVE_FIELDS.has(key.toLowerCase())
                ? REDACTED
                : redactSensitiveData(value, seen);
        }
        return result;
    }
    return input;
}
