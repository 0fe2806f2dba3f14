/**
 * Pino logger whose lines land in an array instead of stderr
 */
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export interface CapturedLog {
    level: string;
    msg: string;
    [key: string]: unknown;
}

export function createCaptureLogger(level: LevelWithSilent = 'debug'): { logger: Logger; logs: CapturedLog[] } {
    const logs: CapturedLog[] = [];
    const logger = pino(
        {
            level,
            formatters: { level: (label: string) => ({ level: label }) },
        },
        {
            write(line: string): void {
                logs.push(JSON.parse(line));
            },
        }
    );
    return { logger, logs };
}
