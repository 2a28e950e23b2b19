/**
 * Assembles the emoji table: one entry per configured glyph, in declaration order.
 * Fetch or decode failures degrade to the placeholder; anything else aborts the run.
 */

import { describeError, isRecoverable } from "../lib/errors.js";
import type { GlyphCategory, GlyphRecord } from "../lib/glyphs.js";
import { generatePlaceholder } from "./placeholder.js";
import type { Bitmap } from "./rasterize.js";

export interface TableEntry {
    record: GlyphRecord;
    /** C identifier of the bitmap constant, e.g. EMOJI_BMP_GRIN */
    symbol: string;
    bitmap: Bitmap;
    source: "image" | "placeholder";
}

export interface GlyphFailure {
    record: GlyphRecord;
    reason: string;
}

export interface TableBuildResult {
    entries: TableEntry[];
    successCount: number;
    failureCount: number;
    failures: GlyphFailure[];
}

/**
 * Collaborators the builder drives; ImageFetcher and rasterize in production
 */
export interface TableBuilderDeps {
    fetch: (record: GlyphRecord) => Promise<Uint8Array>;
    rasterize: (data: Uint8Array, size: number) => Promise<Bitmap>;
    size: number;
    onProgress?: (record: GlyphRecord, index: number, total: number) => void;
    onFailure?: (failure: GlyphFailure) => void;
}

export function bitmapSymbol(name: string): string {
    return `EMOJI_BMP_${name.toUpperCase()}`;
}

export class TableBuilder {
    constructor(private readonly deps: TableBuilderDeps) {}

    /**
     * Resolves every record strictly one after another. No reordering, no deduplication.
     */
    async build(records: readonly GlyphRecord[]): Promise<TableBuildResult> {
        const { size, onProgress, onFailure } = this.deps;
        const entries: TableEntry[] = [];
        const failures: GlyphFailure[] = [];
        let successCount = 0;

        for (let index = 0; index < records.length; index++) {
            const record = records[index];
            onProgress?.(record, index, records.length);

            let bitmap: Bitmap;
            let source: TableEntry["source"];
            try {
                const data = await this.deps.fetch(record);
                bitmap = await this.deps.rasterize(data, size);
                source = "image";
                successCount++;
            } catch (error) {
                if (!isRecoverable(error)) {
                    throw error;
                }
                const failure = { record, reason: describeError(error) };
                failures.push(failure);
                onFailure?.(failure);
                bitmap = generatePlaceholder(size);
                source = "placeholder";
            }

            entries.push({ record, symbol: bitmapSymbol(record.name), bitmap, source });
        }

        return {
            entries,
            successCount,
            failureCount: failures.length,
            failures,
        };
    }
}

/**
 * Groups consecutive entries by category, preserving first-appearance order
 */
export function groupByCategory(entries: readonly TableEntry[]): { category: GlyphCategory; entries: TableEntry[] }[] {
    const groups: { category: GlyphCategory; entries: TableEntry[] }[] = [];
    for (const entry of entries) {
        const last = groups[groups.length - 1];
        if (last && last.category === entry.record.category) {
            last.entries.push(entry);
        } else {
            groups.push({ category: entry.record.category, entries: [entry] });
        }
    }
    return groups;
}
