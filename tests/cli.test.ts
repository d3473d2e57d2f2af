// tests/cli.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { ILogFacility } from '../src/@types/index.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { createProgram } from '../src/cli/program.js';
import { makeTempDir, removeDir, writePng } from './helpers/fixtures.js';

describe('pixel-vhdl CLI', () => {
    let workDir: string;
    let inputFolder: string;
    let outputFolder: string;
    let lines: string[];
    let logFacility: ILogFacility;

    beforeEach(async () => {
        workDir = makeTempDir();
        inputFolder = path.join(workDir, 'images');
        outputFolder = path.join(workDir, 'vhdl');
        fs.mkdirSync(inputFolder);
        await writePng(path.join(inputFolder, 'good.png'), 2, 1, [0, 0, 0, 255, 255, 255]);
        lines = [];
        const push = (...input: unknown[]) => {
            lines.push(input.map(String).join(' '));
        };
        logFacility = { log: push, warn: push, error: push };
    });

    afterEach(() => {
        process.exitCode = undefined;
        removeDir(workDir);
    });

    it('should convert a folder, keep going past a broken file and write a report', async () => {
        fs.writeFileSync(path.join(inputFolder, 'broken.png'), 'not an image');
        const program = createProgram({ logFacility });

        await program.parseAsync(['node', 'pixel-vhdl', 'batch', '-i', inputFolder, '-o', outputFolder, '-y', '-l', '-r']);

        expect(process.exitCode).toBe(1);
        expect(fs.existsSync(path.join(outputFolder, 'good.vhd'))).toBe(true);
        expect(fs.existsSync(path.join(outputFolder, 'broken.vhd'))).toBe(false);
        const report = JSON.parse(fs.readFileSync(path.join(outputFolder, 'conversion_report.json'), 'utf-8'));
        expect(report.map((entry: { status: string }) => entry.status)).toEqual(['failed', 'success']);
        expect(lines.some((line) => line.includes('Converted 1 of 2 image(s), 1 failed.'))).toBe(true);
    });

    it('should leave existing files alone when overwriting is declined', async () => {
        fs.mkdirSync(outputFolder);
        const existing = path.join(outputFolder, 'good.vhd');
        fs.writeFileSync(existing, 'keep');
        const confirmOverwrite = vi.fn(async (_files: string[]) => false);
        const program = createProgram({ logFacility, confirmOverwrite });

        await program.parseAsync(['node', 'pixel-vhdl', 'batch', '-i', inputFolder, '-o', outputFolder, '-l']);

        expect(confirmOverwrite).toHaveBeenCalledWith([existing]);
        expect(fs.readFileSync(existing, 'utf-8')).toBe('keep');
        expect(process.exitCode).toBe(1);
    });

    it('should convert a single file under a custom name with a progress bar', async () => {
        const progressBar = { start: vi.fn(), stop: vi.fn(), increment: vi.fn() };
        const program = createProgram({ logFacility, createProgressBar: () => progressBar });
        const outputPath = path.join(workDir, 'custom.vhd');

        await program.parseAsync([
            'node',
            'pixel-vhdl',
            'convert',
            '-i',
            path.join(inputFolder, 'good.png'),
            '-o',
            outputPath,
            '-n',
            'Custom',
        ]);

        expect(process.exitCode).toBe(0);
        expect(progressBar.start).toHaveBeenCalledWith(8, 0, { state: 'INIT' });
        expect(progressBar.increment).toHaveBeenCalledTimes(8);
        expect(progressBar.stop).toHaveBeenCalledOnce();
        const text = fs.readFileSync(outputPath, 'utf-8');
        expect(text).toContain('package custom_graphic is\n');
        expect(text).toContain('    constant CUSTOM_IMAGE : custom_array := (\n    (X"000", X"FFF")\n    );\n');
        expect(lines.some((line) => line.includes(`Wrote 2x1 image to "${outputPath}".`))).toBe(true);
    });

    it('should fail when the input folder does not exist', async () => {
        const program = createProgram({ logFacility });

        await program.parseAsync(['node', 'pixel-vhdl', 'batch', '-i', path.join(workDir, 'nope'), '-o', outputFolder]);

        expect(process.exitCode).toBe(1);
        expect(lines.some((line) => line.includes('Batch failed: Failed to read input folder'))).toBe(true);
    });
});
