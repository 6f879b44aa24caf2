import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { isTruthyEnv, loadEnvFile, readBooleanEnv, readStringEnv } from './env.js';

describe('env helpers', () => {
    const env = {
        ON: 'Yes',
        OFF: 'off',
        ODD: 'maybe',
        BLANK: '   ',
        NAME: '  agent  ',
    };

    it('reads truthy flags', () => {
        expect(isTruthyEnv('ON', env)).toBe(true);
        expect(isTruthyEnv('OFF', env)).toBe(false);
        expect(isTruthyEnv('MISSING', env)).toBe(false);
    });

    it('reads booleans with a default for unset or unrecognized values', () => {
        expect(readBooleanEnv('ON', false, env)).toBe(true);
        expect(readBooleanEnv('OFF', true, env)).toBe(false);
        expect(readBooleanEnv('ODD', true, env)).toBe(true);
        expect(readBooleanEnv('MISSING', false, env)).toBe(false);
    });

    it('trims strings and treats blank as unset', () => {
        expect(readStringEnv('NAME', env)).toBe('agent');
        expect(readStringEnv('BLANK', env)).toBeUndefined();
        expect(readStringEnv('MISSING', env)).toBeUndefined();
    });
});

describe('loadEnvFile', () => {
    const key = 'PARLEY_ENV_FILE_TEST';
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'parley-env-'));
        delete process.env[key];
    });

    afterEach(async () => {
        delete process.env[key];
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('loads variables from a file without overriding existing ones', async () => {
        const filePath = path.join(dir, '.env');
        await fs.writeFile(filePath, `${key}=from-file\nPATH=overridden\n`);
        const originalPath = process.env.PATH;

        expect(loadEnvFile(filePath)).toBe(true);
        expect(process.env[key]).toBe('from-file');
        expect(process.env.PATH).toBe(originalPath);
    });

    it('reports a missing file', () => {
        expect(loadEnvFile(path.join(dir, 'missing.env'))).toBe(false);
        expect(process.env[key]).toBeUndefined();
    });
});
