/**
 * Serializes the emoji table into a C header for the firmware build.
 * Output is a pure function of the entries: no timestamps, no paths, no environment,
 * so a rerun against a warm cache reproduces the checked-in file byte for byte.
 *
 * The firmware depends on: EMOJI_BMP_<NAME> constants of EMOJI_PIXELS values,
 * EMOJI_COUNT, and EMOJI_TABLE records of { codepoint, shortcode, bitmap, category }.
 */

import { formatRgb565 } from "../lib/color/rgb565.js";
import { formatCodepoint } from "../lib/glyphs.js";
import { groupByCategory, type TableEntry } from "./build_table.js";

export interface EmitOptions {
    size: number;
}

const HEADER_GUARD = "EMOJI_DATA_H";
const INCLUDES = ["<Arduino.h>", "\"Emoji.h\""] as const;

function emitBitmap(entry: TableEntry, size: number): string[] {
    const pixelCount = size * size;
    if (entry.bitmap.length !== pixelCount) {
        throw new Error(`Bitmap for '${entry.record.name}' has ${entry.bitmap.length} pixels, expected ${pixelCount}`);
    }

    const lines = [`static const uint16_t ${entry.symbol}[${pixelCount}] PROGMEM = {`];
    for (let offset = 0; offset < pixelCount; offset += size) {
        const row = Array.from(entry.bitmap.subarray(offset, offset + size), formatRgb565).join(", ");
        const comma = offset + size < pixelCount ? "," : "";
        lines.push(`    ${row}${comma}`);
    }
    lines.push("};", "");
    return lines;
}

function emitTableRecord(entry: TableEntry): string {
    const { codepoint, name, category } = entry.record;
    return `    { ${formatCodepoint(codepoint)}, "${name}", ${entry.symbol}, EmojiCategory::${category} },`;
}

export function serialize(entries: readonly TableEntry[], options: EmitOptions): string {
    const { size } = options;

    const lines: string[] = [
        "/**",
        " * Emoji Bitmap Data (auto-generated, do not edit)",
        " *",
        " * Twemoji graphics licensed under CC-BY 4.0",
        " * https://github.com/twitter/twemoji",
        " *",
        ` * Total: ${entries.length} emoji as ${size}x${size} RGB565 bitmaps`,
        " */",
        "",
        `#ifndef ${HEADER_GUARD}`,
        `#define ${HEADER_GUARD}`,
        "",
        ...INCLUDES.map((include) => `#include ${include}`),
        "",
    ];

    for (const group of groupByCategory(entries)) {
        lines.push(`// ============ ${group.category} (${group.entries.length} emoji) ============`, "");
        for (const entry of group.entries) {
            lines.push(...emitBitmap(entry, size));
        }
    }

    lines.push(
        "// ============ EMOJI TABLE ============",
        "",
        `const int EMOJI_COUNT = ${entries.length};`,
        "",
        "const EmojiEntry EMOJI_TABLE[EMOJI_COUNT] PROGMEM = {",
        ...entries.map(emitTableRecord),
        "};",
        "",
        `#endif // ${HEADER_GUARD}`,
        ""
    );

    return lines.join("\n");
}
