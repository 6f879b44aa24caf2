import { readBooleanEnv, readStringEnv, type EnvSource } from '@parley/core';
import { createA2AConfig, type A2AConfig, type A2AConfigInput } from './schemas.js';

export const A2A_ENV = {
    ENDPOINT: 'A2A_ENDPOINT',
    AUTH_TOKEN: 'A2A_AUTH_TOKEN',
    TIMEOUT: 'A2A_TIMEOUT',
    VERIFY_SSL: 'A2A_VERIFY_SSL',
    DEBUG: 'A2A_DEBUG',
} as const;

/**
 * Build connection settings from environment variables.
 * Explicit `overrides` win over the environment.
 */
export function loadA2AConfigFromEnv(
    env: EnvSource = process.env,
    overrides: Partial<A2AConfigInput> = {}
): A2AConfig {
    const authToken = readStringEnv(A2A_ENV.AUTH_TOKEN, env);
    const timeout = readStringEnv(A2A_ENV.TIMEOUT, env);

    return createA2AConfig({
        endpoint: readStringEnv(A2A_ENV.ENDPOINT, env) ?? '',
        ...(authToken !== undefined && { authToken }),
        ...(timeout !== undefined && { timeout: Number(timeout) }),
        verifySsl: readBooleanEnv(A2A_ENV.VERIFY_SSL, true, env),
        debug: readBooleanEnv(A2A_ENV.DEBUG, false, env),
        ...overrides,
    });
}
