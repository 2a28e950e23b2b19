/**
 * Unit tests for C header serialization
 */

import { describe, it, expect } from 'vitest';
import { serialize } from '../emit_header.js';
import { bitmapSymbol, type TableEntry } from '../build_table.js';
import type { GlyphRecord } from '../../lib/glyphs.js';

function entry(record: GlyphRecord, pixels: number[]): TableEntry {
    return {
        record,
        symbol: bitmapSymbol(record.name),
        bitmap: Uint16Array.from(pixels),
        source: 'image',
    };
}

const ENTRIES: TableEntry[] = [
    entry({ codepoint: 0x1f600, name: 'grin', category: 'FACES' }, [0xf800, 0x0000, 0x07e0, 0x001f]),
    entry({ codepoint: 0x263a, name: 'relaxed', category: 'FACES' }, [0xffff, 0xffff, 0xffff, 0xffff]),
    entry({ codepoint: 0x2764, name: 'heart', category: 'HEARTS' }, [0, 0, 0, 0]),
];

describe('serialize', () => {
    it('should emit the full header layout', () => {
        const expected = [
            '/**',
            ' * Emoji Bitmap Data (auto-generated, do not edit)',
            ' *',
            ' * Twemoji graphics licensed under CC-BY 4.0',
            ' * https://github.com/twitter/twemoji',
            ' *',
            ' * Total: 3 emoji as 2x2 RGB565 bitmaps',
            ' */',
            '',
            '#ifndef EMOJI_DATA_H',
            '#define EMOJI_DATA_H',
            '',
            '#include <Arduino.h>',
            '#include "Emoji.h"',
            '',
            '// ============ FACES (2 emoji) ============',
            '',
            'static const uint16_t EMOJI_BMP_GRIN[4] PROGMEM = {',
            '    0xF800, 0x0000,',
            '    0x07E0, 0x001F',
            '};',
            '',
            'static const uint16_t EMOJI_BMP_RELAXED[4] PROGMEM = {',
            '    0xFFFF, 0xFFFF,',
            '    0xFFFF, 0xFFFF',
            '};',
            '',
            '// ============ HEARTS (1 emoji) ============',
            '',
            'static const uint16_t EMOJI_BMP_HEART[4] PROGMEM = {',
            '    0x0000, 0x0000,',
            '    0x0000, 0x0000',
            '};',
            '',
            '// ============ EMOJI TABLE ============',
            '',
            'const int EMOJI_COUNT = 3;',
            '',
            'const EmojiEntry EMOJI_TABLE[EMOJI_COUNT] PROGMEM = {',
            '    { 0x1F600, "grin", EMOJI_BMP_GRIN, EmojiCategory::FACES },',
            '    { 0x0263A, "relaxed", EMOJI_BMP_RELAXED, EmojiCategory::FACES },',
            '    { 0x02764, "heart", EMOJI_BMP_HEART, EmojiCategory::HEARTS },',
            '};',
            '',
            '#endif // EMOJI_DATA_H',
            '',
        ].join('\n');

        expect(serialize(ENTRIES, { size: 2 })).toBe(expected);
    });

    it('should be byte-identical across calls', () => {
        expect(serialize(ENTRIES, { size: 2 })).toBe(serialize(ENTRIES, { size: 2 }));
    });

    it('should write one row of size values per line at 12x12', () => {
        const pixels = Array.from({ length: 144 }, (_, index) => index);
        const output = serialize([entry({ codepoint: 0x1f600, name: 'grin', category: 'FACES' }, pixels)], {
            size: 12,
        });

        expect(output).toContain('static const uint16_t EMOJI_BMP_GRIN[144] PROGMEM = {\n');
        expect(output).toContain(
            '    0x0000, 0x0001, 0x0002, 0x0003, 0x0004, 0x0005, 0x0006, 0x0007, 0x0008, 0x0009, 0x000A, 0x000B,\n'
        );
        expect(output).toContain(
            '    0x0084, 0x0085, 0x0086, 0x0087, 0x0088, 0x0089, 0x008A, 0x008B, 0x008C, 0x008D, 0x008E, 0x008F\n};\n'
        );
    });

    it('should keep table order equal to entry order, not sorted', () => {
        const reversed = [...ENTRIES].reverse();
        const output = serialize(reversed, { size: 2 });
        const tableLines = output.split('\n').filter((line) => line.startsWith('    { 0x'));

        expect(tableLines.map((line) => line.split('"')[1])).toEqual(['heart', 'relaxed', 'grin']);
    });

    it('should emit an empty table with a zero count', () => {
        const output = serialize([], { size: 12 });

        expect(output).toContain('const int EMOJI_COUNT = 0;\n');
        expect(output).toContain('const EmojiEntry EMOJI_TABLE[EMOJI_COUNT] PROGMEM = {\n};\n');
    });

    it('should refuse bitmaps of the wrong length', () => {
        expect(() => serialize(ENTRIES, { size: 12 })).toThrow(
            "Bitmap for 'grin' has 4 pixels, expected 144"
        );
    });
});
