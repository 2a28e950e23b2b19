/**
 * Emoji source retrieval
 * Cache first; on a miss, one network request with a bounded timeout and no retry.
 * Consecutive network requests are spaced by a fixed delay to go easy on the remote host.
 */

import https from "https";
import { FetchError, describeError } from "../lib/errors.js";
import { codepointToHex, type GlyphRecord } from "../lib/glyphs.js";
import type { SourceCache } from "../lib/cache/source_cache.js";

export interface TransportRequest {
    url: string;
    timeoutMs: number;
    headers: Record<string, string>;
}

/**
 * Performs one GET and resolves with the body, or rejects with FetchError
 */
export type Transport = (request: TransportRequest) => Promise<Buffer>;

/**
 * Default transport: global fetch with certificate verification and an abort-based timeout
 */
export const fetchTransport: Transport = async ({ url, timeoutMs, headers }) => {
    const timeoutController = new AbortController();
    const timeoutId = setTimeout(() => timeoutController.abort(), timeoutMs);

    let response: Response;
    try {
        response = await fetch(url, { headers, signal: timeoutController.signal });
    } catch (err) {
        clearTimeout(timeoutId);
        if (timeoutController.signal.aborted) {
            throw new FetchError(url, `Request timeout after ${timeoutMs}ms: ${url}`, { cause: err });
        }
        // Connection refused, DNS failure, certificate rejected, etc.
        const reason = err instanceof Error && err.cause !== undefined ? describeError(err.cause) : describeError(err);
        throw new FetchError(url, `Cannot reach ${url}: ${reason}`, { cause: err });
    }

    try {
        if (!response.ok) {
            await response.body?.cancel();
            throw new FetchError(url, `HTTP ${response.status} for ${url}`, { status: response.status });
        }
        return Buffer.from(await response.arrayBuffer());
    } catch (err) {
        if (err instanceof FetchError) {
            throw err;
        }
        throw new FetchError(url, `Failed reading body of ${url}: ${describeError(err)}`, { cause: err });
    } finally {
        clearTimeout(timeoutId);
    }
};

/**
 * Opt-in transport that skips certificate verification (EMOJI_ALLOW_INSECURE_TLS=1).
 * Only for hosts whose trust store cannot validate the source; never the default.
 * The deadline covers the whole exchange, body included.
 */
export const insecureHttpsTransport: Transport = ({ url, timeoutMs, headers }) => {
    return new Promise<Buffer>((resolve, reject) => {
        let timedOut = false;

        const fail = (err: Error, message: string) => {
            clearTimeout(deadline);
            const reason = timedOut ? `Request timeout after ${timeoutMs}ms: ${url}` : message;
            reject(new FetchError(url, reason, { cause: err }));
        };

        const request = https.get(url, { headers, rejectUnauthorized: false }, (response) => {
            const status = response.statusCode ?? 0;
            if (status < 200 || status >= 300) {
                clearTimeout(deadline);
                response.resume();
                reject(new FetchError(url, `HTTP ${status} for ${url}`, { status }));
                return;
            }

            const chunks: Buffer[] = [];
            response.on("data", (chunk: Buffer) => chunks.push(chunk));
            response.on("end", () => {
                clearTimeout(deadline);
                resolve(Buffer.concat(chunks));
            });
            response.on("error", (err) => fail(err, `Failed reading body of ${url}: ${err.message}`));
        });

        const deadline = setTimeout(() => {
            timedOut = true;
            request.destroy(new Error(`timeout after ${timeoutMs}ms`));
        }, timeoutMs);

        request.on("error", (err) => fail(err, `Cannot reach ${url}: ${err.message}`));
    });
};

export interface ImageFetcherOptions {
    cache: SourceCache;
    baseUrl: string;
    timeoutMs: number;
    requestDelayMs: number;
    userAgent: string;
    transport?: Transport;
    /** Injected in tests; defaults to a setTimeout-based sleep */
    sleep?: (ms: number) => Promise<void>;
    /** Injected in tests; defaults to Date.now */
    now?: () => number;
}

export interface ImageFetcherStats {
    cacheHits: number;
    networkFetches: number;
    failures: number;
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ImageFetcher {
    readonly stats: ImageFetcherStats = { cacheHits: 0, networkFetches: 0, failures: 0 };

    private readonly cache: SourceCache;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly requestDelayMs: number;
    private readonly userAgent: string;
    private readonly transport: Transport;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => number;
    // Completion time of the last network request; null until the first one
    private lastNetworkAt: number | null = null;

    constructor(options: ImageFetcherOptions) {
        this.cache = options.cache;
        this.baseUrl = options.baseUrl.replace(/\/+$/, "");
        this.timeoutMs = options.timeoutMs;
        this.requestDelayMs = options.requestDelayMs;
        this.userAgent = options.userAgent;
        this.transport = options.transport ?? fetchTransport;
        this.sleep = options.sleep ?? delay;
        this.now = options.now ?? Date.now;
    }

    urlFor(codepoint: number): string {
        return `${this.baseUrl}/${codepointToHex(codepoint)}.png`;
    }

    /**
     * Returns raw PNG bytes for a glyph, from cache or network.
     * Rejects with FetchError on network failure; CacheError from the cache propagates.
     */
    async fetch(record: GlyphRecord): Promise<Buffer> {
        const cached = await this.cache.get(record.codepoint);
        if (cached) {
            this.stats.cacheHits++;
            return cached;
        }

        await this.throttle();

        const url = this.urlFor(record.codepoint);
        let data: Buffer;
        try {
            data = await this.transport({
                url,
                timeoutMs: this.timeoutMs,
                headers: { "User-Agent": this.userAgent },
            });
        } catch (err) {
            this.stats.failures++;
            if (err instanceof FetchError) {
                throw err;
            }
            throw new FetchError(url, `Cannot reach ${url}: ${describeError(err)}`, { cause: err });
        } finally {
            this.stats.networkFetches++;
            this.lastNetworkAt = this.now();
        }

        await this.cache.put(record.codepoint, data);
        return data;
    }

    private async throttle(): Promise<void> {
        if (this.lastNetworkAt === null || this.requestDelayMs <= 0) {
            return;
        }
        const wait = this.lastNetworkAt + this.requestDelayMs - this.now();
        if (wait > 0) {
            await this.sleep(wait);
        }
    }
}
