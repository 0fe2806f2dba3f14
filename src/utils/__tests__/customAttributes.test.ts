/**
 * Unit tests for custom attribute normalization
 */

import { LosslessNumber } from 'lossless-json';
import { createCaptureLogger } from '../../__tests__/captureLogger.js';
import { AttributeNormalizer } from '../customAttributes.js';
import type { LiteralParseFn } from '../customAttributes.js';

describe('AttributeNormalizer.normalize', () => {
    it('returns a mapping unchanged', () => {
        const { logger } = createCaptureLogger();
        const normalizer = new AttributeNormalizer(logger);
        const attributes = { color: 'red', nested: { a: 1 } };

        expect(normalizer.normalize(attributes)).toBe(attributes);
    });

    it('is idempotent', () => {
        const { logger } = createCaptureLogger();
        const normalizer = new AttributeNormalizer(logger);

        const once = normalizer.normalize("{'color': 'red'}");
        expect(normalizer.normalize(once)).toBe(once);
        expect(once).toEqual({ color: 'red' });
    });

    it.each(['', 'None', 'null'])('returns an empty mapping for %j', (token) => {
        const parse = vi.fn<LiteralParseFn>();
        const normalizer = new AttributeNormalizer(createCaptureLogger().logger, parse);

        expect(normalizer.normalize(token)).toEqual({});
        expect(parse).not.toHaveBeenCalled();
    });

    it.each(['color=red', '[1, 2]', " {'a': 1}", "{'a': 1} ", '{open', 'close}'])(
        'skips the parser for %j',
        (text) => {
            const parse = vi.fn<LiteralParseFn>();
            const { logger, logs } = createCaptureLogger();
            const normalizer = new AttributeNormalizer(logger, parse);

            expect(normalizer.normalize(text)).toEqual({});
            expect(parse).not.toHaveBeenCalled();
            expect(logs).toHaveLength(0);
        }
    );

    it('parses a mapping literal', () => {
        const normalizer = new AttributeNormalizer(createCaptureLogger().logger);

        expect(normalizer.normalize("{'color': 'red', 'size': 3}")).toEqual({ color: 'red', size: 3 });
    });

    it('parses nested literals', () => {
        const normalizer = new AttributeNormalizer(createCaptureLogger().logger);

        expect(normalizer.normalize("{'dims': {'w': 10, 'h': 2.5}, 'tags': ['a', 'b'], 'gift': False, 'note': None}")).toEqual({
            dims: { w: 10, h: 2.5 },
            tags: ['a', 'b'],
            gift: false,
            note: null,
        });
    });

    it('degrades malformed text to an empty mapping with exactly one debug entry', () => {
        const { logger, logs } = createCaptureLogger();
        const normalizer = new AttributeNormalizer(logger);

        expect(normalizer.normalize('{color: }')).toEqual({});
        expect(logs).toHaveLength(1);
        expect(logs[0].level).toBe('debug');
        expect(logs[0].msg).toBe('Could not parse custom attributes, using empty mapping');
        expect(logs[0].value).toBe('{color: }');
        expect(logs[0].error).toBe("Unknown name 'color' at position 1");
    });

    it('does not surface the parse failure at info level', () => {
        const { logger, logs } = createCaptureLogger('info');
        const normalizer = new AttributeNormalizer(logger);

        expect(normalizer.normalize("{'a': }")).toEqual({});
        expect(logs).toHaveLength(0);
    });

    it('returns an empty mapping when the parsed value is not a mapping', () => {
        const parse = vi.fn<LiteralParseFn>(() => [1, 2]);
        const normalizer = new AttributeNormalizer(createCaptureLogger().logger, parse);

        expect(normalizer.normalize('{1, 2}')).toEqual({});
        expect(parse).toHaveBeenCalledWith('{1, 2}');
    });

    it.each([42, true, null, undefined])('returns an empty mapping for %j', (value) => {
        const normalizer = new AttributeNormalizer(createCaptureLogger().logger);

        expect(normalizer.normalize(value)).toEqual({});
    });

    it('returns an empty mapping for a sequence', () => {
        const normalizer = new AttributeNormalizer(createCaptureLogger().logger);

        expect(normalizer.normalize([{ color: 'red' }])).toEqual({});
    });

    it('returns an empty mapping for class instances', () => {
        const normalizer = new AttributeNormalizer(createCaptureLogger().logger);

        expect(normalizer.normalize(new LosslessNumber('1.50'))).toEqual({});
        expect(normalizer.normalize(new Date(0))).toEqual({});
    });
});

describe('AttributeNormalizer.normalizeRecord', () => {
    it('rewrites custom attributes on the record and every sub-object', () => {
        const normalizer = new AttributeNormalizer(createCaptureLogger().logger);
        const record: Record<string, unknown> = {
            code: 'C-1',
            custom_attributes: "{'tier': 'gold'}",
            billing_address: { city: 'Curitiba', custom_attributes: "{'floor': 2}" },
            shipping_address: { city: 'Recife', custom_attributes: 'None' },
            contacts: [{ name: 'Ana', custom_attributes: '{bad}' }, 'not-an-object'],
        };

        const result = normalizer.normalizeRecord(record);

        expect(result).toBe(record);
        expect(record).toEqual({
            code: 'C-1',
            custom_attributes: { tier: 'gold' },
            billing_address: { city: 'Curitiba', custom_attributes: { floor: 2 } },
            shipping_address: { city: 'Recife', custom_attributes: {} },
            contacts: [{ name: 'Ana', custom_attributes: {} }, 'not-an-object'],
        });
    });

    it('leaves records without custom attributes alone', () => {
        const normalizer = new AttributeNormalizer(createCaptureLogger().logger);
        const record = { code: 'P-1', price: 10, billing_address: { city: 'Natal' } };

        expect(normalizer.normalizeRecord(record)).toEqual({ code: 'P-1', price: 10, billing_address: { city: 'Natal' } });
    });
});
