/**
 * Emoji Table Generator
 * Wires cache, fetcher, rasterizer and emitter into one sequential batch run.
 */

import type { Settings } from "./lib/config.js";
import { SourceCache, type SourceCacheStats } from "./lib/cache/source_cache.js";
import { loadGlyphs, type GlyphRecord } from "./lib/glyphs.js";
import { TableBuilder, type TableBuildResult } from "./tools/build_table.js";
import { serialize } from "./tools/emit_header.js";
import { ImageFetcher, fetchTransport, insecureHttpsTransport, type Transport } from "./tools/fetch_image.js";
import { BITMAP_SIZE, rasterize } from "./tools/rasterize.js";

export interface GeneratorOptions {
    settings: Settings;
    /** Defaults to src/data/glyphs.json */
    glyphs?: readonly GlyphRecord[];
    /** Overrides the transport chosen from settings */
    transport?: Transport;
    sleep?: (ms: number) => Promise<void>;
    /** Diagnostics sink; defaults to stderr */
    log?: (line: string) => void;
}

export interface GenerationResult {
    artifact: string;
    table: TableBuildResult;
    fetchStats: ImageFetcher["stats"];
    cacheStats: SourceCacheStats;
}

function glyphLabel(record: GlyphRecord): string {
    return `${String.fromCodePoint(record.codepoint)} ${record.name}`;
}

export class EmojiTableGenerator {
    private readonly settings: Settings;
    private readonly glyphs: readonly GlyphRecord[];
    private readonly cache: SourceCache;
    private readonly fetcher: ImageFetcher;
    private readonly log: (line: string) => void;

    constructor(options: GeneratorOptions) {
        this.settings = options.settings;
        this.glyphs = options.glyphs ?? loadGlyphs();
        this.log = options.log ?? ((line) => console.error(line));
        this.cache = new SourceCache(this.settings.cacheDir);
        this.fetcher = new ImageFetcher({
            cache: this.cache,
            baseUrl: this.settings.sourceUrl,
            timeoutMs: this.settings.timeoutMs,
            requestDelayMs: this.settings.requestDelayMs,
            userAgent: this.settings.userAgent,
            transport: options.transport ?? (this.settings.allowInsecureTls ? insecureHttpsTransport : fetchTransport),
            sleep: options.sleep,
        });
    }

    /**
     * Runs the full pipeline and returns the header text.
     * Only cache setup and configuration problems reject; per-glyph failures become placeholders.
     */
    async run(): Promise<GenerationResult> {
        const { settings } = this;
        this.log(`Generating emoji data for ${this.glyphs.length} glyphs...`);
        if (settings.allowInsecureTls) {
            this.log("[fetch] WARNING: TLS certificate verification is disabled (EMOJI_ALLOW_INSECURE_TLS)");
        }

        await this.cache.ensureReady();

        const builder = new TableBuilder({
            fetch: (record) => this.fetcher.fetch(record),
            rasterize,
            size: BITMAP_SIZE,
            onProgress: settings.quiet
                ? undefined
                : (record, index, total) => this.log(`  [${index + 1}/${total}] Processing ${glyphLabel(record)}...`),
            onFailure: (failure) => this.log(`  [placeholder] ${failure.record.name}: ${failure.reason}`),
        });

        const table = await builder.build(this.glyphs);
        const artifact = serialize(table.entries, { size: BITMAP_SIZE });

        const { hits, writes } = this.cache.stats;
        this.log(`[cache] ${hits} hits, ${writes} writes, ${this.fetcher.stats.networkFetches} network fetches`);
        this.log(`Done! Success: ${table.successCount}, Failed: ${table.failureCount}`);

        return { artifact, table, fetchStats: this.fetcher.stats, cacheStats: this.cache.stats };
    }
}
