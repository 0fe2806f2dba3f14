/**
 * Tests for target config parsing and environment overrides
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../../utils/errors.js';
import { SHARPI_DEFAULT_BASE_URL } from '../sync/sharpi.js';
import { loadTargetConfig, parseTargetConfig } from '../targetConfig.js';

const NO_ENV = { SHARPI_API_KEY: undefined, SHARPI_BASE_URL: undefined };

describe('parseTargetConfig', () => {
    it('applies defaults', () => {
        expect(parseTargetConfig({ api_key: 'test-secret' }, NO_ENV)).toEqual({
            apiKey: 'test-secret',
            baseUrl: SHARPI_DEFAULT_BASE_URL,
            duplicateStrategy: 'patch',
            failFast: true,
        });
    });

    it('reads every setting from the file', () => {
        expect(parseTargetConfig({
            api_key: 'test-secret',
            base_url: 'https://sandbox.test/v1/partner',
            duplicate_strategy: 'skip',
            fail_fast: false,
            start_date: '2024-01-01',
        }, NO_ENV)).toEqual({
            apiKey: 'test-secret',
            baseUrl: 'https://sandbox.test/v1/partner',
            duplicateStrategy: 'skip',
            failFast: false,
        });
    });

    it('lets the environment override the file', () => {
        const config = parseTargetConfig(
            { api_key: 'file-key', base_url: 'https://file.test' },
            { SHARPI_API_KEY: 'env-key', SHARPI_BASE_URL: 'https://env.test' }
        );

        expect(config.apiKey).toBe('env-key');
        expect(config.baseUrl).toBe('https://env.test');
    });

    it('takes the key from the environment alone', () => {
        expect(parseTargetConfig({}, { SHARPI_API_KEY: 'env-key', SHARPI_BASE_URL: undefined }).apiKey).toBe('env-key');
    });

    it('requires an API key from somewhere', () => {
        expect(() => parseTargetConfig({}, NO_ENV)).toThrow(
            'Invalid target config: api_key is required (or set SHARPI_API_KEY)'
        );
    });

    it('rejects an unknown duplicate strategy', () => {
        expect(() => parseTargetConfig({ api_key: 'test-secret', duplicate_strategy: 'merge' }, NO_ENV)).toThrow(
            'Invalid target config: duplicate_strategy: Invalid enum value'
        );
    });

    it('rejects a config that is not an object', () => {
        expect(() => parseTargetConfig(['test-secret'], NO_ENV)).toThrow(ConfigError);
    });
});

describe('loadTargetConfig', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'sharpi-target-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('loads a JSON file', async () => {
        const path = join(dir, 'config.json');
        await writeFile(path, JSON.stringify({ api_key: 'test-secret', fail_fast: false }));

        const config = await loadTargetConfig(path, NO_ENV);

        expect(config.failFast).toBe(false);
        expect(config.apiKey).toBe('test-secret');
    });

    it('reports a missing file', async () => {
        const path = join(dir, 'missing.json');

        await expect(loadTargetConfig(path, NO_ENV)).rejects.toThrow(`Cannot read config file ${path}`);
    });

    it('reports a file that is not JSON', async () => {
        const path = join(dir, 'config.json');
        await writeFile(path, 'api_key=test-secret');

        await expect(loadTargetConfig(path, NO_ENV)).rejects.toThrow(`Config file ${path} is not valid JSON`);
    });
});
