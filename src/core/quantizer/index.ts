// src/core/quantizer/index.ts

import type { IPackedGrid, IRgbImage } from '../../@types/index.js';
import { config } from '../../config/index.js';

const CHANNEL_SHIFT = 8 - config.bitsPerChannel;
const CHANNEL_MASK = (1 << config.bitsPerChannel) - 1;

/**
 * Reduces an 8-bit channel to its high nibble (truncating division by 16).
 */
export function quantizeChannel(value: number): number {
    return (value & 0xff) >> CHANNEL_SHIFT;
}

/**
 * Packs an 8-bit RGB triple into a 12-bit code laid out as R4 G4 B4.
 */
export function quantize(r: number, g: number, b: number): number {
    return (quantizeChannel(r) << (2 * config.bitsPerChannel)) |
        (quantizeChannel(g) << config.bitsPerChannel) |
        quantizeChannel(b);
}

/**
 * Splits a packed code back into its three 4-bit channels.
 */
export function unpack(code: number): [number, number, number] {
    const bits = config.bitsPerChannel;
    return [(code >> (2 * bits)) & CHANNEL_MASK, (code >> bits) & CHANNEL_MASK, code & CHANNEL_MASK];
}

/**
 * Quantizes every pixel of an image, row by row, left to right.
 *
 * @param image - Decoded RGB image, three bytes per pixel.
 * @return The packed grid with the same dimensions.
 */
export function quantizeImage(image: IRgbImage): IPackedGrid {
    const { width, height, data } = image;
    const pixelCount = width * height;
    if (data.length < pixelCount * 3) {
        throw new RangeError(`Expected ${pixelCount * 3} bytes of RGB data, got ${data.length}`);
    }
    const codes = new Uint16Array(pixelCount);
    for (let i = 0; i < pixelCount; i++) {
        const offset = i * 3;
        codes[i] = quantize(data[offset], data[offset + 1], data[offset + 2]);
    }
    return { width, height, codes };
}
