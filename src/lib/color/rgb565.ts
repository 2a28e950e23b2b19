/**
 * RGB565 packing utilities
 * 5 bits red, 6 bits green, 5 bits blue, red in the high bits.
 * Low-order bits are truncated, never rounded: the firmware decoder depends on it.
 */

/**
 * Packs an 8-bit-per-channel color into a 16-bit RGB565 value
 * @param r - Red (0-255)
 * @param g - Green (0-255)
 * @param b - Blue (0-255)
 */
export function rgb565(r: number, g: number, b: number): number {
    return ((r & 0xf8) << 8) | ((g & 0xfc) << 3) | ((b & 0xff) >> 3);
}

/**
 * Formats a packed value as a C hex literal, e.g. 0xF800
 */
export function formatRgb565(value: number): string {
    return `0x${value.toString(16).toUpperCase().padStart(4, "0")}`;
}
