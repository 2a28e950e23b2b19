#!/usr/bin/env node
/**
 * Emoji bitmap table CLI
 * Usage: npm run generate > EmojiData.h
 *
 * Run from the repository root: src/data/glyphs.json and the default .emoji_cache
 * are resolved against the working directory.
 * The header goes to stdout; progress and the final success/failure counts go to stderr.
 */

import { loadSettings } from "./lib/config.js";
import { EmojiPipelineError } from "./lib/errors.js";
import { EmojiTableGenerator } from "./generator.js";

async function main(): Promise<void> {
    const generator = new EmojiTableGenerator({ settings: loadSettings() });
    const { artifact } = await generator.run();
    process.stdout.write(artifact);
}

main().catch((error: unknown) => {
    if (error instanceof EmojiPipelineError) {
        console.error(`[${error.code}] ${error.message}`);
        if (error.cause !== undefined) {
            console.error("  caused by:", error.cause);
        }
    } else {
        console.error("[fatal]", error);
    }
    process.exitCode = 1;
});
