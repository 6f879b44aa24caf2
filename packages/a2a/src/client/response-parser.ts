/**
 * Response text extraction for `message/send` results.
 *
 * Servers answer with several layouts. Matchers run in this fixed priority order and the
 * first one yielding non-empty text wins; later shapes are not consulted even if present:
 *
 * 1. `artifacts[].parts[]`      task with artifacts (host-agent style)
 * 2. `parts[]`                  a Message returned directly as the result
 * 3. `status.message.parts[]`   task status update
 * 4. `message.parts[]`          message wrapped in a `message` field
 * 5. `history[]`                the last entry with role `agent`
 *
 * Text fragments within the winning shape are joined with newlines.
 */

export type ResponseShape = 'artifacts' | 'parts' | 'status-message' | 'message' | 'history';

export type JsonRecord = Record<string, unknown>;

interface ShapeMatcher {
    shape: ResponseShape;
    fragments(result: JsonRecord): string[];
}

export interface ExtractedResponse {
    text: string;
    /** Shape that produced the text, or null when nothing matched */
    shape: ResponseShape | null;
}

export function isPlainObject(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
    return isPlainObject(value) ? value[key] : undefined;
}

/**
 * Text of every part that has a string `text`; other part kinds are skipped
 */
function textOfParts(parts: unknown): string[] {
    if (!Array.isArray(parts)) {
        return [];
    }
    const texts: string[] = [];
    for (const part of parts) {
        const text = field(part, 'text');
        if (typeof text === 'string') {
            texts.push(text);
        }
    }
    return texts;
}

const RESPONSE_SHAPES: readonly ShapeMatcher[] = [
    {
        shape: 'artifacts',
        fragments: (result) => {
            const artifacts = result.artifacts;
            return Array.isArray(artifacts)
                ? artifacts.flatMap((artifact) => textOfParts(field(artifact, 'parts')))
                : [];
        },
    },
    {
        shape: 'parts',
        fragments: (result) => textOfParts(result.parts),
    },
    {
        shape: 'status-message',
        fragments: (result) => textOfParts(field(field(result.status, 'message'), 'parts')),
    },
    {
        shape: 'message',
        fragments: (result) => textOfParts(field(result.message, 'parts')),
    },
    {
        shape: 'history',
        fragments: (result) => {
            const history = result.history;
            if (!Array.isArray(history)) {
                return [];
            }
            for (let i = history.length - 1; i >= 0; i--) {
                if (field(history[i], 'role') === 'agent') {
                    return textOfParts(field(history[i], 'parts'));
                }
            }
            return [];
        },
    },
];

export function extractResponseText(result: JsonRecord): ExtractedResponse {
    for (const matcher of RESPONSE_SHAPES) {
        const text = matcher.fragments(result).join('\n');
        if (text !== '') {
            return { text, shape: matcher.shape };
        }
    }
    return { text: '', shape: null };
}

/**
 * Context token from `result.contextId`, falling back to `result.message.contextId`.
 * Empty strings count as absent.
 */
export function extractContextId(result: JsonRecord): string | null {
    const candidates = [result.contextId, field(result.message, 'contextId')];
    for (const candidate of candidates) {
        if (typeof candidate === 'string' && candidate !== '') {
            return candidate;
        }
    }
    return null;
}
