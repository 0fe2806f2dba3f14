/**
 * Centralized Environment Variable Validation
 *
 * Validates the environment at startup using Zod. If validation fails the
 * target exits before reading any input.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 */

// Load dotenv FIRST - must happen before we access process.env
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Logging level override (pino level name) */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    // ----------------------------------------
    // SHARPI INTEGRATION
    // ----------------------------------------

    /** Partner API key; takes priority over the config file's api_key */
    SHARPI_API_KEY: z.string().optional(),

    /** Partner API root; takes priority over the config file's base_url */
    SHARPI_BASE_URL: z.string().url().optional(),
});

// ============================================
// VALIDATION
// ============================================

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
    // Empty strings from a copied .env.example count as unset
    const raw = Object.fromEntries(
        Object.entries(process.env).filter(([, value]) => value !== undefined && value !== '')
    );
    const result = envSchema.safeParse(raw);

    if (!result.success) {
        const details = result.error.issues
            .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');
        console.error(`Environment validation failed:\n${details}`);
        process.exit(1);
    }

    return result.data;
}

export const env: Env = validateEnv();
