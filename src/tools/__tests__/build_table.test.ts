/**
 * Unit tests for table assembly
 */

import { describe, it, expect, vi } from 'vitest';
import { TableBuilder, bitmapSymbol, groupByCategory, type TableEntry } from '../build_table.js';
import { generatePlaceholder } from '../placeholder.js';
import { CacheError, FetchError, RasterError } from '../../lib/errors.js';
import type { GlyphRecord } from '../../lib/glyphs.js';

const RECORDS: GlyphRecord[] = [
    { codepoint: 0x1f600, name: 'grin', category: 'FACES' },
    { codepoint: 0x1f603, name: 'smiley', category: 'FACES' },
    { codepoint: 0x2764, name: 'heart', category: 'HEARTS' },
];

function solidBitmap(size: number, value: number): Uint16Array {
    return new Uint16Array(size * size).fill(value);
}

describe('TableBuilder', () => {
    it('should produce one entry per record in declaration order', async () => {
        const builder = new TableBuilder({
            fetch: async (record) => Buffer.from(record.name),
            rasterize: async (_data, size) => solidBitmap(size, 0x1234),
            size: 12,
        });

        const result = await builder.build(RECORDS);

        expect(result.entries.map((entry) => entry.record.name)).toEqual(['grin', 'smiley', 'heart']);
        expect(result.entries.map((entry) => entry.symbol)).toEqual([
            'EMOJI_BMP_GRIN',
            'EMOJI_BMP_SMILEY',
            'EMOJI_BMP_HEART',
        ]);
        expect(result.entries.every((entry) => entry.source === 'image')).toBe(true);
        expect(result.successCount).toBe(3);
        expect(result.failureCount).toBe(0);
    });

    it('should substitute the placeholder when a fetch fails', async () => {
        const builder = new TableBuilder({
            fetch: async (record) => {
                if (record.name === 'smiley') {
                    throw new FetchError('https://emoji.example.test/1f603.png', 'HTTP 404', { status: 404 });
                }
                return Buffer.from(record.name);
            },
            rasterize: async (_data, size) => solidBitmap(size, 0x1234),
            size: 12,
        });

        const result = await builder.build(RECORDS);

        expect(result.entries).toHaveLength(3);
        expect(result.entries[1].source).toBe('placeholder');
        expect([...result.entries[1].bitmap]).toEqual([...generatePlaceholder(12)]);
        expect(result.successCount).toBe(2);
        expect(result.failureCount).toBe(1);
        expect(result.failures).toEqual([{ record: RECORDS[1], reason: 'HTTP 404' }]);
    });

    it('should substitute the placeholder when decoding fails', async () => {
        const onFailure = vi.fn();
        const builder = new TableBuilder({
            fetch: async (record) => Buffer.from(record.name),
            rasterize: async (data, size) => {
                if (Buffer.from(data).toString() === 'heart') {
                    throw new RasterError('Failed to decode image: bad PNG');
                }
                return solidBitmap(size, 0xffff);
            },
            size: 12,
            onFailure,
        });

        const result = await builder.build(RECORDS);

        expect(result.entries[2].source).toBe('placeholder');
        expect(result.failureCount).toBe(1);
        expect(onFailure).toHaveBeenCalledWith({ record: RECORDS[2], reason: 'Failed to decode image: bad PNG' });
    });

    it('should increase the failure count by exactly one per failed glyph', async () => {
        let failing = new Set<string>();
        const builder = new TableBuilder({
            fetch: async (record) => {
                if (failing.has(record.name)) {
                    throw new FetchError('u', 'timeout');
                }
                return Buffer.from(record.name);
            },
            rasterize: async (_data, size) => solidBitmap(size, 0),
            size: 12,
        });

        const baseline = await builder.build(RECORDS);
        failing = new Set(['grin']);
        const withFailure = await builder.build(RECORDS);

        expect(withFailure.failureCount - baseline.failureCount).toBe(1);
        expect(withFailure.entries).toHaveLength(baseline.entries.length);
    });

    it('should abort the run on errors that are not per-glyph', async () => {
        const builder = new TableBuilder({
            fetch: async () => {
                throw new CacheError('/tmp/cache', 'Failed to read cache entry');
            },
            rasterize: async (_data, size) => solidBitmap(size, 0),
            size: 12,
        });

        await expect(builder.build(RECORDS)).rejects.toBeInstanceOf(CacheError);
    });

    it('should resolve glyphs one at a time', async () => {
        let active = 0;
        let maxActive = 0;
        const builder = new TableBuilder({
            fetch: async (record) => {
                active++;
                maxActive = Math.max(maxActive, active);
                await new Promise((resolve) => setTimeout(resolve, 1));
                active--;
                return Buffer.from(record.name);
            },
            rasterize: async (_data, size) => solidBitmap(size, 0),
            size: 12,
        });

        await builder.build(RECORDS);

        expect(maxActive).toBe(1);
    });

    it('should report progress for every record', async () => {
        const onProgress = vi.fn();
        const builder = new TableBuilder({
            fetch: async (record) => Buffer.from(record.name),
            rasterize: async (_data, size) => solidBitmap(size, 0),
            size: 12,
            onProgress,
        });

        await builder.build(RECORDS);

        expect(onProgress.mock.calls).toEqual([
            [RECORDS[0], 0, 3],
            [RECORDS[1], 1, 3],
            [RECORDS[2], 2, 3],
        ]);
    });

    it('should not deduplicate repeated records', async () => {
        const builder = new TableBuilder({
            fetch: async (record) => Buffer.from(record.name),
            rasterize: async (_data, size) => solidBitmap(size, 0),
            size: 12,
        });

        const result = await builder.build([RECORDS[0], RECORDS[0]]);

        expect(result.entries).toHaveLength(2);
    });
});

describe('bitmapSymbol', () => {
    it('should uppercase the name under the EMOJI_BMP_ prefix', () => {
        expect(bitmapSymbol('thumbs_up')).toBe('EMOJI_BMP_THUMBS_UP');
        expect(bitmapSymbol('u7a7a_2')).toBe('EMOJI_BMP_U7A7A_2');
    });
});

describe('groupByCategory', () => {
    function entry(record: GlyphRecord): TableEntry {
        return { record, symbol: bitmapSymbol(record.name), bitmap: solidBitmap(1, 0), source: 'image' };
    }

    it('should group consecutive entries and keep first-appearance order', () => {
        const groups = groupByCategory(RECORDS.map(entry));

        expect(groups.map((group) => [group.category, group.entries.length])).toEqual([
            ['FACES', 2],
            ['HEARTS', 1],
        ]);
    });

    it('should start a new section when a category reappears', () => {
        const groups = groupByCategory([entry(RECORDS[0]), entry(RECORDS[2]), entry(RECORDS[1])]);

        expect(groups.map((group) => group.category)).toEqual(['FACES', 'HEARTS', 'FACES']);
    });
});
