/**
 * Singer messages the target reads, one JSON object per line
 */

import { LosslessNumber, parse } from 'lossless-json';
import { z } from 'zod';
import { MessageParseError } from '../../utils/errors.js';

const recordMessageSchema = z.object({
    type: z.literal('RECORD'),
    stream: z.string().min(1),
    record: z.record(z.unknown()),
    version: z.number().optional(),
    time_extracted: z.string().optional(),
});

const schemaMessageSchema = z.object({
    type: z.literal('SCHEMA'),
    stream: z.string().min(1),
    schema: z.record(z.unknown()),
    key_properties: z.array(z.string()).optional(),
});

const stateMessageSchema = z.object({
    type: z.literal('STATE'),
    value: z.unknown(),
});

const activateVersionMessageSchema = z.object({
    type: z.literal('ACTIVATE_VERSION'),
    stream: z.string().min(1),
    version: z.number(),
});

export const singerMessageSchema = z.discriminatedUnion('type', [
    recordMessageSchema,
    schemaMessageSchema,
    stateMessageSchema,
    activateVersionMessageSchema,
]);

export type SingerMessage = z.infer<typeof singerMessageSchema>;
export type RecordMessage = z.infer<typeof recordMessageSchema>;

/**
 * Plain number when it prints back as the same text, otherwise a
 * LosslessNumber holding the digits as written (`19.90`, wide decimals)
 */
function parseNumberKeepingDigits(text: string): number | LosslessNumber {
    const value = Number(text);
    return String(value) === text ? value : new LosslessNumber(text);
}

export function parseSingerMessage(line: string, lineNumber: number): SingerMessage {
    let raw: unknown;
    try {
        raw = parse(line, null, parseNumberKeepingDigits);
    } catch {
        throw new MessageParseError('not valid JSON', lineNumber);
    }

    const result = singerMessageSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        throw new MessageParseError(`not a Singer message (${where}${issue.message})`, lineNumber);
    }
    return result.data;
}
