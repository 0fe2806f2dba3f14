/**
 * Centralized logger using Pino
 *
 * Everything goes to stderr: stdout is reserved for the Singer STATE
 * messages the target emits.
 */
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import { env } from '../config/env.js';
import type { Env } from '../config/env.js';

/**
 * Logging capability handed to the request executor and attribute
 * normalizer. A pino logger satisfies it; tests pass their own.
 */
export type SyncLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

const isDev = env.NODE_ENV === 'development';

/**
 * Debug (and with it per-request detail) only when LOG_LEVEL asks for it
 */
export function resolveLogLevel(settings: Pick<Env, 'LOG_LEVEL' | 'NODE_ENV'>): LevelWithSilent {
    if (settings.LOG_LEVEL) return settings.LOG_LEVEL;
    return settings.NODE_ENV === 'test' ? 'silent' : 'info';
}

// Pretty output only for a developer watching a terminal
const destination = isDev && process.stderr.isTTY
    ? pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
        },
    })
    : pino.destination(2);

// Create the logger instance
const logger: Logger = pino({
    level: resolveLogLevel(env),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
}, destination);

// Create child loggers for different modules
export const sharpiLogger: Logger = logger.child({ module: 'sharpi' });
export const attributesLogger: Logger = logger.child({ module: 'attributes' });
export const targetLogger: Logger = logger.child({ module: 'target' });
export const cliLogger: Logger = logger.child({ module: 'cli' });

// Export the base logger as default
export default logger;

