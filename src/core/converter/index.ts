// src/core/converter/index.ts

import type { IConversionSummary, IConvertOptions } from '../../@types/index.js';

import { ConvertStateMachine } from './stateMachine.js';

/**
 * Converts one image into a VHDL package file.
 *
 * @param options - Paths, identifier and logging for the conversion.
 * @return The job with the dimensions that were written.
 */
export async function convertImage(options: IConvertOptions): Promise<IConversionSummary> {
    const stateMachine = new ConvertStateMachine(options);
    await stateMachine.run();
    return stateMachine.summary;
}

export { ConvertStateMachine };
