// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { ImageProcessor, IRgbImage } from '../../../@types/index.js';
import { ColorModelError, errorMessage, SourceReadError } from '../../../errors/index.js';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Decodes an image file into plain 8-bit sRGB. Alpha is dropped, and palette or
     * grey images are expanded to three channels.
     *
     * @param imagePath - The file path of the image to decode.
     * @return The raw pixel data with its dimensions.
     */
    public async loadImageData(imagePath: string): Promise<IRgbImage> {
        let decoded: { data: Buffer; info: sharp.OutputInfo };
        try {
            decoded = await sharp(imagePath)
                .removeAlpha()
                .toColourspace('srgb')
                .raw()
                .toBuffer({ resolveWithObject: true });
        } catch (error) {
            throw new SourceReadError(imagePath, errorMessage(error), { cause: error });
        }

        const { data, info } = decoded;
        if (info.channels !== 3) {
            throw new ColorModelError(imagePath, `expected 3 colour channels, decoded ${info.channels}`);
        }
        if (data.length !== info.width * info.height * 3) {
            throw new ColorModelError(imagePath, `expected 8 bits per channel, got ${data.length} bytes`);
        }
        return {
            width: info.width,
            height: info.height,
            data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
        };
    }
}
