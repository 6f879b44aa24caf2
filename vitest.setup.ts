import { fileURLToPath } from 'url';
import { loadEnvFile } from './packages/core/src/utils/env.js';

// Local .env for tests; variables already set (e.g. in CI) win
loadEnvFile(fileURLToPath(new URL('./.env', import.meta.url)));
