/**
 * Target config file
 *
 * The upstream runtime passes a JSON file through `--config`. Environment
 * variables override the file for the API key and base URL so credentials
 * can stay out of it.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { env } from './env.js';
import type { Env } from './env.js';
import { DUPLICATE_STRATEGIES, SHARPI_DEFAULT_BASE_URL } from './sync/sharpi.js';
import type { DuplicateStrategy } from './sync/sharpi.js';

const targetConfigSchema = z.object({
    /** Partner API key sent as X-API-Key */
    api_key: z.string().min(1).optional(),

    /** Partner API root */
    base_url: z.string().url().optional(),

    /** What to do when a create reports the resource already exists */
    duplicate_strategy: z.enum(DUPLICATE_STRATEGIES).default('patch'),

    /** Abort the run on the first failed record */
    fail_fast: z.boolean().default(true),
}).passthrough();

export interface TargetConfig {
    apiKey: string;
    baseUrl: string;
    duplicateStrategy: DuplicateStrategy;
    failFast: boolean;
}

type EnvOverrides = Pick<Env, 'SHARPI_API_KEY' | 'SHARPI_BASE_URL'>;

export function parseTargetConfig(raw: unknown, overrides: EnvOverrides = env): TargetConfig {
    const result = targetConfigSchema.safeParse(raw);
    if (!result.success) {
        const details = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError(`Invalid target config: ${details.join('; ')}`, result.error.issues);
    }

    const config = result.data;
    const apiKey = overrides.SHARPI_API_KEY ?? config.api_key;
    if (!apiKey) {
        throw new ConfigError('Invalid target config: api_key is required (or set SHARPI_API_KEY)');
    }

    return {
        apiKey,
        baseUrl: overrides.SHARPI_BASE_URL ?? config.base_url ?? SHARPI_DEFAULT_BASE_URL,
        duplicateStrategy: config.duplicate_strategy,
        failFast: config.fail_fast,
    };
}

export async function loadTargetConfig(path: string, overrides: EnvOverrides = env): Promise<TargetConfig> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error: unknown) {
        throw new ConfigError(`Cannot read config file ${path}`, error instanceof Error ? error.message : error);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error: unknown) {
        throw new ConfigError(`Config file ${path} is not valid JSON`, error instanceof Error ? error.message : error);
    }

    return parseTargetConfig(raw, overrides);
}
