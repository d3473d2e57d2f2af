// src/core/converter/stateMachine.ts

import type { IConversionSummary, IConvertOptions, IPackedGrid, IRgbImage } from '../../@types/index.js';
import * as path from 'node:path';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.js';
import { ConverterStates } from '../../stateMachine/definedStates.js';
import {
    DestinationWriteError,
    errorMessage,
    PixelVhdlError,
    toPixelVhdlError,
    VerificationError,
} from '../../errors/index.js';
import { loadImageData } from '../imageProcessing/processor.js';
import { quantizeImage } from '../quantizer/index.js';
import { assertDimensions, moduleNames, renderModule } from '../serializer/index.js';
import { parseModule } from '../serializer/parse.js';
import { readTextFile, writeTextFileAtomic } from '../../utils/storage/storageUtils.js';

export class ConvertStateMachine extends AbstractStateMachine<ConverterStates, IConvertOptions> {
    private image: IRgbImage | null = null;
    private grid: IPackedGrid | null = null;
    private moduleText: string | null = null;

    constructor(options: IConvertOptions) {
        super(ConverterStates.INIT, options);

        this.stateTransitions = [
            { state: ConverterStates.INIT, handler: this.init },
            { state: ConverterStates.LOAD_IMAGE, handler: this.loadImage },
            { state: ConverterStates.VALIDATE_DIMENSIONS, handler: this.validateDimensions },
            { state: ConverterStates.QUANTIZE_PIXELS, handler: this.quantizePixels },
            { state: ConverterStates.SERIALIZE_MODULE, handler: this.serializeModule },
            { state: ConverterStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
        if (options.verify !== false) {
            this.stateTransitions.push({ state: ConverterStates.VERIFY_OUTPUT, handler: this.verifyOutput });
        }
    }

    /**
     * Number of progress steps a run reports, including the completion step.
     */
    get stepCount(): number {
        return this.stateTransitions.length + 1;
    }

    get summary(): IConversionSummary {
        const { inputPath, outputPath, identifier } = this.options;
        return {
            job: { inputPath, outputPath, identifier },
            width: this.grid?.width ?? 0,
            height: this.grid?.height ?? 0,
        };
    }

    protected getCompletionState(): ConverterStates {
        return ConverterStates.COMPLETED;
    }

    protected getErrorState(): ConverterStates {
        return ConverterStates.ERROR;
    }

    protected normalizeError(error: unknown): PixelVhdlError {
        return toPixelVhdlError(error, this.options.inputPath);
    }

    private init(): void {
        const { logger, verbose, inputPath, identifier } = this.options;
        moduleNames(identifier);
        if (verbose) logger.info(`Converting "${inputPath}" as "${identifier.trim()}"...`);
    }

    private async loadImage(): Promise<void> {
        const { inputPath, logger, imageProcessor } = this.options;
        logger.debug(`Reading image: ${inputPath}`);
        this.image = await loadImageData(inputPath, imageProcessor);
        logger.debug(`Image "${inputPath}" decoded: ${this.image.width}x${this.image.height}.`);
    }

    private validateDimensions(): void {
        const image = this.requireImage();
        assertDimensions(image.width, image.height);
    }

    private quantizePixels(): void {
        this.grid = quantizeImage(this.requireImage());
        this.options.logger.debug(`Quantized ${this.grid.codes.length} pixels to 12 bits.`);
    }

    private serializeModule(): void {
        this.moduleText = renderModule(this.requireGrid(), this.options.identifier);
    }

    private async writeOutput(): Promise<void> {
        const { outputPath, logger } = this.options;
        const text = this.moduleText;
        if (text === null) {
            throw new PixelVhdlError('UNKNOWN', 'Nothing was serialized', outputPath);
        }
        try {
            await writeTextFileAtomic(outputPath, text);
        } catch (error) {
            throw new DestinationWriteError(outputPath, errorMessage(error), { cause: error });
        }
        logger.debug(`Wrote ${text.length} characters to "${path.basename(outputPath)}".`);
    }

    /**
     * Reads the written module back and checks that it declares the same
     * dimensions and pixels that were quantized.
     */
    private async verifyOutput(): Promise<void> {
        const { outputPath, logger } = this.options;
        const grid = this.requireGrid();
        let text: string;
        try {
            text = await readTextFile(outputPath);
        } catch (error) {
            throw new VerificationError(outputPath, `could not read the written file: ${errorMessage(error)}`);
        }
        if (text !== this.moduleText) {
            throw new VerificationError(outputPath, 'file contents differ from the generated module');
        }
        const parsed = parseModule(text);
        if (parsed.width !== grid.width || parsed.height !== grid.height) {
            throw new VerificationError(
                outputPath,
                `declared ${parsed.width}x${parsed.height}, expected ${grid.width}x${grid.height}`,
            );
        }
        const mismatch = parsed.codes.findIndex((code, index) => code !== grid.codes[index]);
        if (mismatch >= 0) {
            throw new VerificationError(outputPath, `pixel ${mismatch} does not match the source image`);
        }
        logger.debug(`Verified "${path.basename(outputPath)}".`);
    }

    private requireImage(): IRgbImage {
        if (!this.image) {
            throw new PixelVhdlError('UNKNOWN', 'Image has not been loaded', this.options.inputPath);
        }
        return this.image;
    }

    private requireGrid(): IPackedGrid {
        if (!this.grid) {
            throw new PixelVhdlError('UNKNOWN', 'Image has not been quantized', this.options.inputPath);
        }
        return this.grid;
    }
}
