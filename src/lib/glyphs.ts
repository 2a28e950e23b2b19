/**
 * Glyph configuration: the curated emoji list, grouped by category.
 * Loaded once from src/data/glyphs.json and validated before any fetch happens.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

/**
 * Category keys, in the order of the firmware's EmojiCategory enum
 */
export const GLYPH_CATEGORIES = [
    "FACES",
    "GESTURES",
    "PEOPLE",
    "HEARTS",
    "ANIMALS",
    "FOOD",
    "ACTIVITIES",
    "TRAVEL",
    "OBJECTS",
    "SYMBOLS",
    "FLAGS",
] as const;

export type GlyphCategory = (typeof GLYPH_CATEGORIES)[number];

export interface GlyphRecord {
    codepoint: number;
    name: string;
    category: GlyphCategory;
}

const glyphSchema = z.object({
    codepoint: z
        .string()
        .regex(/^[0-9A-Fa-f]{1,6}$/, "codepoint must be 1-6 hex digits")
        .transform((value) => parseInt(value, 16))
        .refine((value) => value > 0 && value <= 0x10ffff, "codepoint outside the Unicode range"),
    name: z.string().regex(/^[a-z0-9_]+$/, "name must match [a-z0-9_]+"),
});

const glyphFileSchema = z.object({
    categories: z.array(
        z.object({
            key: z.enum(GLYPH_CATEGORIES),
            glyphs: z.array(glyphSchema),
        })
    ),
});

export type GlyphFile = z.input<typeof glyphFileSchema>;

/**
 * Validates parsed JSON and flattens it into records in declaration order.
 * Uniqueness of codepoints and names is a precondition for the table, so it is checked here.
 */
export function parseGlyphFile(data: unknown): GlyphRecord[] {
    const parseResult = glyphFileSchema.safeParse(data);
    if (!parseResult.success) {
        const issue = parseResult.error.issues[0];
        const where = issue?.path.join(".") || "root";
        throw new ConfigError(`Invalid glyph configuration at ${where}: ${issue?.message ?? "unknown error"}`);
    }

    const records: GlyphRecord[] = [];
    const seenCategories = new Set<GlyphCategory>();
    const seenCodepoints = new Map<number, string>();
    const seenNames = new Set<string>();

    for (const category of parseResult.data.categories) {
        if (seenCategories.has(category.key)) {
            throw new ConfigError(`Category ${category.key} is declared more than once`);
        }
        seenCategories.add(category.key);

        for (const glyph of category.glyphs) {
            const previous = seenCodepoints.get(glyph.codepoint);
            if (previous !== undefined) {
                throw new ConfigError(
                    `Codepoint ${formatCodepoint(glyph.codepoint)} is used by both '${previous}' and '${glyph.name}'`
                );
            }
            if (seenNames.has(glyph.name)) {
                throw new ConfigError(`Name '${glyph.name}' is used more than once`);
            }
            seenCodepoints.set(glyph.codepoint, glyph.name);
            seenNames.add(glyph.name);

            records.push({
                codepoint: glyph.codepoint,
                name: glyph.name,
                category: category.key,
            });
        }
    }

    return records;
}

/**
 * Loads the glyph list from disk (default: src/data/glyphs.json under the working directory)
 */
export function loadGlyphs(path: string = resolve(process.cwd(), "src/data/glyphs.json")): GlyphRecord[] {
    let data: unknown;
    try {
        data = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
        throw new ConfigError(`Unable to read glyph configuration ${path}`, { cause: error });
    }
    return parseGlyphFile(data);
}

/**
 * Lowercase hex, as used for remote file names and cache entries (e.g. "1f600")
 */
export function codepointToHex(codepoint: number): string {
    return codepoint.toString(16);
}

/**
 * Uppercase hex padded to five digits, as emitted in the table (e.g. "0x0263A")
 */
export function formatCodepoint(codepoint: number): string {
    return `0x${codepoint.toString(16).toUpperCase().padStart(5, "0")}`;
}
