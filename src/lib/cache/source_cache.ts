/**
 * Persistent cache for raw emoji PNGs
 * One file per codepoint, named by its lowercase hex form (1f600.png).
 * The glyph set is small and fixed, so entries are never evicted.
 */

import { constants } from "fs";
import { access, mkdir, readFile, rename, writeFile } from "fs/promises";
import { join } from "path";
import { CacheError } from "../errors.js";
import { codepointToHex } from "../glyphs.js";

export const CACHE_FILE_EXTENSION = ".png";

export interface SourceCacheStats {
    hits: number;
    misses: number;
    writes: number;
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class SourceCache {
    readonly dir: string;
    readonly stats: SourceCacheStats = { hits: 0, misses: 0, writes: 0 };

    constructor(dir: string) {
        this.dir = dir;
    }

    /**
     * Creates the cache directory if needed and checks it is writable.
     * Throws CacheError: without a usable cache every glyph would be refetched on every run.
     */
    async ensureReady(): Promise<void> {
        try {
            await mkdir(this.dir, { recursive: true });
            await access(this.dir, constants.R_OK | constants.W_OK);
        } catch (error) {
            throw new CacheError(this.dir, `Cache directory ${this.dir} is not usable`, { cause: error });
        }
    }

    pathFor(codepoint: number): string {
        return join(this.dir, `${codepointToHex(codepoint)}${CACHE_FILE_EXTENSION}`);
    }

    /**
     * Returns cached bytes, or null when the codepoint has not been fetched yet
     */
    async get(codepoint: number): Promise<Buffer | null> {
        const path = this.pathFor(codepoint);
        try {
            const data = await readFile(path);
            this.stats.hits++;
            return data;
        } catch (error) {
            if (isNotFound(error)) {
                this.stats.misses++;
                return null;
            }
            throw new CacheError(path, `Failed to read cache entry ${path}`, { cause: error });
        }
    }

    async has(codepoint: number): Promise<boolean> {
        try {
            await access(this.pathFor(codepoint), constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Stores bytes for a codepoint. Written to a temp file and renamed into place,
     * so an interrupted run never leaves a truncated entry behind.
     */
    async put(codepoint: number, data: Uint8Array): Promise<void> {
        const path = this.pathFor(codepoint);
        const tempPath = `${path}.${process.pid}.tmp`;
        try {
            await writeFile(tempPath, data);
            await rename(tempPath, path);
            this.stats.writes++;
        } catch (error) {
            throw new CacheError(path, `Failed to write cache entry ${path}`, { cause: error });
        }
    }
}
