/**
 * Fallback glyph for emoji that could not be fetched or decoded.
 * A gold "?" on black; identical for every glyph so failures stay recognizable on device.
 */

import { rgb565 } from "../lib/color/rgb565.js";
import type { Bitmap } from "./rasterize.js";

const QUESTION_MARK = [
    "000111111000",
    "001111111100",
    "011100001110",
    "011100001110",
    "000000011110",
    "000000111100",
    "000001111000",
    "000001110000",
    "000001110000",
    "000000000000",
    "000001110000",
    "000001110000",
] as const;

const PATTERN_SIZE = QUESTION_MARK.length;

export const PLACEHOLDER_FOREGROUND = rgb565(255, 215, 0);
export const PLACEHOLDER_BACKGROUND = rgb565(0, 0, 0);

/**
 * Renders the placeholder at size x size. The native pattern is 12x12;
 * other sizes sample it nearest-neighbor so the output stays deterministic.
 */
export function generatePlaceholder(size: number): Bitmap {
    if (!Number.isInteger(size) || size <= 0) {
        throw new RangeError(`Placeholder size must be a positive integer, got ${size}`);
    }

    const bitmap = new Uint16Array(size * size);
    for (let row = 0; row < size; row++) {
        const pattern = QUESTION_MARK[Math.floor((row * PATTERN_SIZE) / size)];
        for (let col = 0; col < size; col++) {
            const on = pattern[Math.floor((col * PATTERN_SIZE) / size)] === "1";
            bitmap[row * size + col] = on ? PLACEHOLDER_FOREGROUND : PLACEHOLDER_BACKGROUND;
        }
    }
    return bitmap;
}
