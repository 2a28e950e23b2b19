/**
 * PNG -> fixed-size RGB565 bitmap
 * Decode, Lanczos resample to size x size, composite over black by alpha, pack 5-6-5.
 */

import sharp from "sharp";
import { rgb565 } from "../lib/color/rgb565.js";
import { RasterError, describeError } from "../lib/errors.js";

/** Width and height of every emitted bitmap */
export const BITMAP_SIZE = 12;

/**
 * Row-major RGB565 pixels, exactly size * size values
 */
export type Bitmap = Uint16Array;

/**
 * Composites straight (non-premultiplied) RGBA pixels over an opaque black canvas.
 * Each channel becomes round(c * a / 255); the result is tightly packed RGB.
 */
export function compositeOverBlack(rgba: Uint8Array): Uint8Array {
    if (rgba.length % 4 !== 0) {
        throw new RasterError(`RGBA buffer length ${rgba.length} is not a multiple of 4`);
    }
    const pixelCount = rgba.length / 4;
    const rgb = new Uint8Array(pixelCount * 3);

    for (let i = 0; i < pixelCount; i++) {
        const alpha = rgba[i * 4 + 3];
        rgb[i * 3] = Math.round((rgba[i * 4] * alpha) / 255);
        rgb[i * 3 + 1] = Math.round((rgba[i * 4 + 1] * alpha) / 255);
        rgb[i * 3 + 2] = Math.round((rgba[i * 4 + 2] * alpha) / 255);
    }

    return rgb;
}

/**
 * Composites RGBA over black and packs each pixel to RGB565
 */
export function quantizeRgba(rgba: Uint8Array): Bitmap {
    const rgb = compositeOverBlack(rgba);
    const bitmap = new Uint16Array(rgb.length / 3);
    for (let i = 0; i < bitmap.length; i++) {
        bitmap[i] = rgb565(rgb[i * 3], rgb[i * 3 + 1], rgb[i * 3 + 2]);
    }
    return bitmap;
}

/**
 * Rasterizes a compressed image (PNG from the emoji source) into a size x size bitmap.
 * Rejects with RasterError when the payload cannot be decoded.
 */
export async function rasterize(data: Uint8Array, size: number = BITMAP_SIZE): Promise<Bitmap> {
    if (!Number.isInteger(size) || size <= 0) {
        throw new RasterError(`Bitmap size must be a positive integer, got ${size}`);
    }
    if (data.length === 0) {
        throw new RasterError("Image payload is empty");
    }

    try {
        const image = sharp(data);
        const metadata = await image.metadata();
        if (!metadata.width || !metadata.height) {
            throw new RasterError("Unable to read image dimensions");
        }

        // Stretch to exactly size x size; sharp premultiplies alpha while resampling
        const { data: pixels, info } = await image
            .ensureAlpha()
            .resize(size, size, { fit: "fill", kernel: sharp.kernel.lanczos3 })
            .raw()
            .toBuffer({ resolveWithObject: true });

        if (info.width !== size || info.height !== size || info.channels !== 4) {
            throw new RasterError(
                `Unexpected decoded layout ${info.width}x${info.height}x${info.channels}, expected ${size}x${size}x4`
            );
        }

        return quantizeRgba(pixels);
    } catch (error) {
        if (error instanceof RasterError) {
            throw error;
        }
        // sharp reports bad payloads as "Input buffer contains unsupported image format" and similar
        throw new RasterError(`Failed to decode image: ${describeError(error)}`, { cause: error });
    }
}
