/**
 * Error kinds raised by the emoji table pipeline
 */

export type PipelineErrorCode = "ERR_FETCH" | "ERR_RASTER" | "ERR_CACHE" | "ERR_CONFIG";

export class EmojiPipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Network unreachable, non-success response, timeout or TLS failure.
 * Recoverable: the glyph falls back to the placeholder.
 */
export class FetchError extends EmojiPipelineError {
    readonly url: string;
    readonly status?: number;

    constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
        super("ERR_FETCH", message, { cause: options?.cause });
        this.url = url;
        this.status = options?.status;
    }
}

/**
 * Undecodable or malformed image payload. Recoverable.
 */
export class RasterError extends EmojiPipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("ERR_RASTER", message, options);
    }
}

/**
 * Cache directory cannot be created, read or written. Fatal to the run.
 */
export class CacheError extends EmojiPipelineError {
    readonly path: string;

    constructor(path: string, message: string, options?: { cause?: unknown }) {
        super("ERR_CACHE", message, options);
        this.path = path;
    }
}

export class ConfigError extends EmojiPipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("ERR_CONFIG", message, options);
    }
}

/**
 * True for the errors that degrade a single glyph to the placeholder
 */
export function isRecoverable(error: unknown): error is FetchError | RasterError {
    return error instanceof FetchError || error instanceof RasterError;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
