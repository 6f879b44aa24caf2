import { redactSensitiveData } from './redactor.js';

const TRUNCATION_MARKER = '…(truncated)';

/**
 * Cut `text` to at most `maxLen` characters, marking the cut.
 */
export function truncate(text: string, maxLen: number): string {
    if (text.length <= maxLen) {
        return text;
    }
    if (maxLen <= TRUNCATION_MARKER.length) {
        return text.slice(0, maxLen);
    }
    return `${text.slice(0, maxLen - TRUNCATION_MARKER.length)}${TRUNCATION_MARKER}`;
}

/**
 * JSON.stringify for log output: redacts credentials, survives circular references and BigInt,
 * and truncates when `maxLen` is given.
 */
export function safeStringify(value: unknown, maxLen?: number): string {
    let str: string | undefined;
    try {
        str = JSON.stringify(redactSensitiveData(value), (_, v: unknown) =>
            typeof v === 'bigint' ? v.toString() : v
        );
    } catch {
        str = undefined;
    }
    const out = str ?? String(value);
    return maxLen !== undefined && maxLen > 0 ? truncate(out, maxLen) : out;
}
