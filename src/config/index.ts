// src/config/index.ts

import * as os from 'node:os';

export const config = {
    supportedExtensions: ['.png'],
    outputExtension: '.vhd',
    bitsPerChannel: 4, // 8-bit input channels keep their high nibble
    maxDimension: 2147483647, // VHDL integer'high
    tempFileSuffix: '.tmp',
    batch: {
        concurrency: Math.max(1, os.cpus().length - 1),
        reportFile: 'conversion_report.json',
    },
};
