// src/index.ts

export * from './@types/index.js';
export * from './errors/index.js';
export { config } from './config/index.js';
export { quantize, quantizeChannel, quantizeImage, unpack } from './core/quantizer/index.js';
export { formatCode, moduleNames, renderModule, serializeModule } from './core/serializer/index.js';
export { parseModule } from './core/serializer/parse.js';
export type { IParsedModule } from './core/serializer/parse.js';
export { loadImageData } from './core/imageProcessing/processor.js';
export { SharpImageProcessor } from './core/imageProcessing/strategies/SharpImageProcessor.js';
export { convertImage } from './core/converter/index.js';
export {
    convertJobs,
    deriveIdentifier,
    discoverJobs,
    runBatch,
    summarizeResults,
    toReportEntries,
    writeReport,
} from './core/batch/index.js';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.js';
