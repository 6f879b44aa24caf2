import { z } from 'zod';
import { ensureOk, ErrorScope, ErrorType } from '@parley/core';
import { A2AErrorCode } from '../error-codes.js';

export const DEFAULT_TIMEOUT_SECONDS = 300;
/** Largest timeout a Node timer can hold, in whole seconds */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

/**
 * Connection settings for one remote A2A agent.
 * The endpoint is normalized once here (surrounding whitespace and trailing slashes removed).
 */
export const A2AConfigSchema = z
    .object({
        endpoint: z
            .string()
            .trim()
            .transform((value) => value.replace(/\/+$/, ''))
            .superRefine((value, ctx) => {
                if (!/^https?:\/\//.test(value)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: `endpoint must start with http:// or https://, got ${value}`,
                        params: {
                            code: A2AErrorCode.INVALID_CONFIG,
                            scope: ErrorScope.CONFIG,
                            type: ErrorType.USER,
                        },
                    });
                    return;
                }
                if (!URL.canParse(value)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: `endpoint is not a valid URL: ${value}`,
                    });
                }
            })
            .describe('Base URL of the A2A agent (JSON-RPC endpoint)'),
        authToken: z
            .string()
            .min(1)
            .optional()
            .describe('Bearer token sent as the Authorization header'),
        timeout: z
            .number()
            .finite()
            .refine((value) => value > 0, (value) => ({
                message: `timeout must be positive, got ${value}`,
            }))
            .refine((value) => value <= MAX_TIMEOUT_SECONDS, (value) => ({
                message: `timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds, got ${value}`,
            }))
            .default(DEFAULT_TIMEOUT_SECONDS)
            .describe('Per-request timeout in seconds'),
        verifySsl: z.boolean().default(true).describe('Verify TLS certificates'),
        debug: z
            .boolean()
            .default(false)
            .describe('Log full A2A request and response payloads'),
    })
    .strict()
    .describe('A2A agent connection configuration');

export type A2AConfigInput = z.input<typeof A2AConfigSchema>;
export type A2AConfig = Readonly<z.output<typeof A2AConfigSchema>>;

/**
 * Validate, normalize and freeze connection settings.
 * @throws ParleyValidationError when the endpoint scheme or timeout is invalid
 */
export function createA2AConfig(input: A2AConfigInput): A2AConfig {
    const config = ensureOk(
        A2AConfigSchema.safeParse(input),
        ErrorScope.CONFIG,
        A2AErrorCode.INVALID_CONFIG
    );
    return Object.freeze(config);
}

/**
 * Harness-style connection arguments (`--agent-llm-args`), snake_case as the harness passes them
 */
export const AgentArgsSchema = z
    .object({
        auth_token: z.string().min(1).optional(),
        timeout: z.number().optional(),
        verify_ssl: z.boolean().optional(),
        debug: z.boolean().optional(),
    })
    .passthrough();

export type AgentArgs = z.input<typeof AgentArgsSchema>;

/**
 * Build a config from an endpoint plus harness-style args
 */
export function configFromArgs(endpoint: string, args: Record<string, unknown> = {}): A2AConfig {
    const parsed = ensureOk(
        AgentArgsSchema.safeParse(args),
        ErrorScope.CONFIG,
        A2AErrorCode.INVALID_CONFIG
    );
    return createA2AConfig({
        endpoint,
        ...(parsed.auth_token !== undefined && { authToken: parsed.auth_token }),
        ...(parsed.timeout !== undefined && { timeout: parsed.timeout }),
        ...(parsed.verify_ssl !== undefined && { verifySsl: parsed.verify_ssl }),
        ...(parsed.debug !== undefined && { debug: parsed.debug }),
    });
}
