/**
 * Run settings, read from environment variables and validated with zod
 */

import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_SOURCE_URL = "https://raw.githubusercontent.com/twitter/twemoji/master/assets/72x72";

const flag = z
    .enum(["0", "1", "true", "false"])
    .optional()
    .transform((value) => value === "1" || value === "true");

const settingsSchema = z.object({
    EMOJI_SOURCE_URL: z
        .string()
        .url()
        .default(DEFAULT_SOURCE_URL)
        .transform((value) => value.replace(/\/+$/, "")),
    EMOJI_CACHE_DIR: z.string().min(1).optional(),
    EMOJI_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    EMOJI_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(50),
    EMOJI_ALLOW_INSECURE_TLS: flag,
    EMOJI_USER_AGENT: z.string().min(1).default("emoji-bitmap-table/1.0"),
    EMOJI_QUIET: flag,
});

export interface Settings {
    sourceUrl: string;
    cacheDir: string;
    timeoutMs: number;
    requestDelayMs: number;
    allowInsecureTls: boolean;
    userAgent: string;
    quiet: boolean;
}

/**
 * Parses settings from an environment map (defaults to process.env).
 * Relative cache paths resolve against the working directory.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parseResult = settingsSchema.safeParse(env);
    if (!parseResult.success) {
        const issue = parseResult.error.issues[0];
        const field = issue?.path.join(".") || "environment";
        throw new ConfigError(`Invalid setting ${field}: ${issue?.message ?? "unknown error"}`);
    }

    const parsed = parseResult.data;
    return {
        sourceUrl: parsed.EMOJI_SOURCE_URL,
        cacheDir: resolve(process.cwd(), parsed.EMOJI_CACHE_DIR ?? ".emoji_cache"),
        timeoutMs: parsed.EMOJI_FETCH_TIMEOUT_MS,
        requestDelayMs: parsed.EMOJI_REQUEST_DELAY_MS,
        allowInsecureTls: parsed.EMOJI_ALLOW_INSECURE_TLS,
        userAgent: parsed.EMOJI_USER_AGENT,
        quiet: parsed.EMOJI_QUIET,
    };
}
