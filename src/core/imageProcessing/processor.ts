// src/core/imageProcessing/processor.ts

import type { ImageProcessor, IRgbImage } from '../../@types/index.js';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.js';

export const defaultImageProcessor: ImageProcessor = new SharpImageProcessor();

/**
 * Loads the image at `imagePath` as 8-bit RGB using the given processor.
 */
export async function loadImageData(
    imagePath: string,
    processor: ImageProcessor = defaultImageProcessor,
): Promise<IRgbImage> {
    return await processor.loadImageData(imagePath);
}
