import { z } from 'zod';
import type { AgentCard } from '../types.js';

/**
 * Agent card schema
 *
 * Required: `name`, `url`. Everything else is optional. Servers disagree on casing,
 * so snake_case spellings (`push_notifications`, `security_schemes`) are accepted
 * alongside the camelCase ones and normalized to camelCase. Unknown fields are ignored.
 */
const AgentSkillSchema = z
    .object({
        id: z.string(),
        name: z.string(),
        description: z.string().nullish(),
        tags: z.array(z.string()).nullish(),
    })
    .passthrough();

const AgentCapabilitiesSchema = z
    .object({
        streaming: z.boolean().nullish(),
        pushNotifications: z.boolean().nullish(),
        push_notifications: z.boolean().nullish(),
    })
    .passthrough();

export const AgentCardSchema = z
    .object({
        name: z.string().min(1).describe('Human-readable agent name'),
        url: z.string().min(1).describe('Advertised A2A endpoint URL'),
        description: z.string().nullish(),
        version: z.string().nullish(),
        capabilities: AgentCapabilitiesSchema.nullish(),
        securitySchemes: z.record(z.unknown()).nullish(),
        security_schemes: z.record(z.unknown()).nullish(),
        security: z.array(z.unknown()).nullish(),
        skills: z.array(AgentSkillSchema).nullish(),
    })
    .passthrough()
    .transform(
        (raw): AgentCard => ({
            name: raw.name,
            url: raw.url,
            description: raw.description ?? undefined,
            version: raw.version ?? undefined,
            capabilities: {
                streaming: raw.capabilities?.streaming ?? false,
                pushNotifications:
                    raw.capabilities?.pushNotifications ??
                    raw.capabilities?.push_notifications ??
                    false,
            },
            securitySchemes: raw.securitySchemes ?? raw.security_schemes ?? undefined,
            security: raw.security ?? undefined,
            skills: raw.skills?.map((skill) => ({
                id: skill.id,
                name: skill.name,
                description: skill.description ?? undefined,
                tags: skill.tags ?? undefined,
            })),
        })
    );

export type AgentCardInput = z.input<typeof AgentCardSchema>;

export type AgentCardParseResult = { ok: true; card: AgentCard } | { ok: false; reason: string };

/**
 * Parse an agent card, returning a readable reason on failure
 */
export function parseAgentCard(data: unknown): AgentCardParseResult {
    const result = AgentCardSchema.safeParse(data);
    if (result.success) {
        return { ok: true, card: result.data };
    }
    const reason = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
    return { ok: false, reason };
}
