import type { ImageProcessor, IRgbImage } from '../../src/@types/index.js';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import sharp from 'sharp';

export function makeTempDir(prefix = 'pixel-vhdl-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dirPath: string): void {
    fs.rmSync(dirPath, { recursive: true, force: true });
}

/**
 * Writes a PNG from a flat list of channel values.
 */
export async function writePng(
    filePath: string,
    width: number,
    height: number,
    pixels: number[],
    channels: 1 | 3 | 4 = 3,
): Promise<void> {
    await sharp(Buffer.from(pixels), { raw: { width, height, channels } }).png().toFile(filePath);
}

export function rgbImage(width: number, height: number, pixels: number[]): IRgbImage {
    return { width, height, data: Uint8Array.from(pixels) };
}

/**
 * Image processor that serves images (or failures) by file name.
 */
export class FakeImageProcessor implements ImageProcessor {
    readonly requested: string[] = [];

    constructor(
        private readonly images: Record<string, IRgbImage | Error>,
        private readonly delays: Record<string, number> = {},
    ) {}

    async loadImageData(imagePath: string): Promise<IRgbImage> {
        const name = path.basename(imagePath);
        this.requested.push(name);
        const delay = this.delays[name] ?? 0;
        if (delay > 0) {
            await new Promise((resolve) => setTimeout(resolve, delay));
        }
        const image = this.images[name];
        if (image === undefined) {
            throw new Error(`No fake image for "${name}"`);
        }
        if (image instanceof Error) {
            throw image;
        }
        return image;
    }
}
