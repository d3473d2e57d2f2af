// tests/quantizer.test.ts
import { describe, expect, it } from 'vitest';

import { quantize, quantizeChannel, quantizeImage, unpack } from '../src/core/quantizer/index.js';
import { rgbImage } from './helpers/fixtures.js';

describe('Pixel quantizer', () => {
    describe('quantizeChannel', () => {
        it('should keep the high nibble of every byte value', () => {
            for (let value = 0; value <= 255; value++) {
                const result = quantizeChannel(value);
                expect(result).toBe(Math.floor(value / 16));
                expect(result).toBeGreaterThanOrEqual(0);
                expect(result).toBeLessThanOrEqual(15);
            }
        });

        it('should map the extremes to 0 and 15', () => {
            expect(quantizeChannel(0)).toBe(0);
            expect(quantizeChannel(15)).toBe(0);
            expect(quantizeChannel(16)).toBe(1);
            expect(quantizeChannel(255)).toBe(15);
        });
    });

    describe('quantize', () => {
        it('should pack channels as R4 G4 B4', () => {
            expect(quantize(255, 0, 0)).toBe(0xf00);
            expect(quantize(0, 255, 0)).toBe(0x0f0);
            expect(quantize(0, 0, 255)).toBe(0x00f);
            expect(quantize(255, 255, 255)).toBe(0xfff);
            expect(quantize(0, 0, 0)).toBe(0x000);
            expect(quantize(18, 52, 86)).toBe(0x135);
        });

        it('should match the packing formula across a sample of triples', () => {
            for (let r = 0; r <= 255; r += 17) {
                for (let g = 3; g <= 255; g += 29) {
                    for (let b = 7; b <= 255; b += 41) {
                        const expected = (Math.floor(r / 16) << 8) | (Math.floor(g / 16) << 4) | Math.floor(b / 16);
                        const code = quantize(r, g, b);
                        expect(code).toBe(expected);
                        expect(code).toBeLessThanOrEqual(4095);
                    }
                }
            }
        });

        it('should be undone by unpack', () => {
            expect(unpack(quantize(200, 100, 50))).toEqual([12, 6, 3]);
        });
    });

    describe('quantizeImage', () => {
        it('should quantize in row-major order', () => {
            const image = rgbImage(2, 2, [
                255, 0, 0, 0, 255, 0,
                0, 0, 255, 18, 52, 86,
            ]);
            const grid = quantizeImage(image);
            expect(grid.width).toBe(2);
            expect(grid.height).toBe(2);
            expect(Array.from(grid.codes)).toEqual([0xf00, 0x0f0, 0x00f, 0x135]);
        });

        it('should reject data shorter than the dimensions require', () => {
            expect(() => quantizeImage(rgbImage(2, 1, [0, 0, 0]))).toThrow(RangeError);
        });
    });
});
