// src/core/batch/index.ts

import type {
    ConversionResult,
    IBatchOptions,
    IBatchSummary,
    IConversionJob,
    IDiscoverOptions,
    ILogger,
    ReportEntry,
} from '../../@types/index.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import _ from 'lodash';
import pLimit from 'p-limit';
import { config } from '../../config/index.js';
import { ConfigurationError, errorMessage, toPixelVhdlError } from '../../errors/index.js';
import { ensureOutputDirectory, getFileExtension, readDirectory } from '../../utils/storage/storageUtils.js';
import { convertImage } from '../converter/index.js';

/**
 * Derives the identifier of a source file: its base name without extension.
 */
export function deriveIdentifier(fileName: string): string {
    const base = path.basename(fileName);
    return base.slice(0, base.length - path.extname(base).length);
}

/**
 * Lists the convertible files of the input folder and pairs each with its output
 * path and identifier. The output folder is created when missing.
 *
 * @throws ConfigurationError when the input folder cannot be listed or two inputs
 * share an output file.
 */
export function discoverJobs(options: IDiscoverOptions): IConversionJob[] {
    const { inputFolder, outputFolder } = options;
    const extensions = (options.extensions ?? config.supportedExtensions).map(normalizeExtension);
    if (extensions.length === 0) {
        throw new ConfigurationError('At least one input extension is required');
    }

    let files: string[];
    try {
        files = readDirectory(inputFolder);
    } catch (error) {
        throw new ConfigurationError(
            `Failed to read input folder "${inputFolder}": ${errorMessage(error)}`,
            inputFolder,
            { cause: error },
        );
    }

    try {
        ensureOutputDirectory(outputFolder);
    } catch (error) {
        throw new ConfigurationError(
            `Failed to create output folder "${outputFolder}": ${errorMessage(error)}`,
            outputFolder,
            { cause: error },
        );
    }

    const jobs = files
        .filter((file) => extensions.includes(getFileExtension(file)))
        .map((file) => {
            const identifier = deriveIdentifier(file);
            return {
                inputPath: path.join(inputFolder, file),
                outputPath: path.join(outputFolder, `${identifier}${config.outputExtension}`),
                identifier,
            };
        });
    assertDistinctOutputs(jobs);
    return jobs;
}

/**
 * Output names are compared case-insensitively so `a.png` and `a.PNG` clash on
 * every file system.
 */
function assertDistinctOutputs(jobs: IConversionJob[]): void {
    const claimed = new Map<string, IConversionJob>();
    for (const job of jobs) {
        const key = job.outputPath.toLowerCase();
        const previous = claimed.get(key);
        if (previous) {
            throw new ConfigurationError(
                `"${previous.inputPath}" and "${job.inputPath}" would both be written to "${job.outputPath}"`,
                job.outputPath,
            );
        }
        claimed.set(key, job);
    }
}

function normalizeExtension(extension: string): string {
    const lower = extension.trim().toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Converts every discovered image. A failing image yields a `failed` result and
 * never stops the others; results keep discovery order.
 */
export async function runBatch(options: IBatchOptions): Promise<ConversionResult[]> {
    const { logger } = options;
    const jobs = discoverJobs(options);
    if (jobs.length === 0) {
        logger.warn(`No images found in "${options.inputFolder}".`);
        return [];
    }
    logger.info(`Found ${jobs.length} image(s) in "${options.inputFolder}".`);

    return await convertJobs(jobs, options);
}

/**
 * Runs the given jobs with bounded concurrency, collecting one result per job.
 */
export async function convertJobs(jobs: IConversionJob[], options: IBatchOptions): Promise<ConversionResult[]> {
    const { logger, verbose, progressBar, verify, imageProcessor } = options;
    const concurrency = options.concurrency ?? config.batch.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    const limit = pLimit(concurrency);

    progressBar?.start(jobs.length, 0, { file: '' });
    const results = await Promise.all(
        jobs.map((job) =>
            limit(async (): Promise<ConversionResult> => {
                let result: ConversionResult;
                try {
                    const summary = await convertImage({ ...job, logger, verbose, verify, imageProcessor });
                    result = { status: 'success', ...summary };
                    if (verbose) logger.success(`Converted "${job.inputPath}" -> "${job.outputPath}".`);
                } catch (error) {
                    const failure = toPixelVhdlError(error, job.inputPath);
                    logger.error(`Skipping "${job.inputPath}": ${failure.message}`);
                    result = { status: 'failed', job, error: failure };
                }
                progressBar?.increment({ file: path.basename(job.inputPath) });
                return result;
            })
        ),
    );
    progressBar?.stop();
    return results;
}

export function summarizeResults(results: ConversionResult[]): IBatchSummary {
    const counts = _.countBy(results, (result) => result.status);
    return { total: results.length, succeeded: counts.success ?? 0, failed: counts.failed ?? 0 };
}

export function toReportEntries(results: ConversionResult[]): ReportEntry[] {
    return results.map((result) => {
        const entry: ReportEntry = {
            file: result.job.inputPath,
            output: result.job.outputPath,
            status: result.status,
        };
        if (result.status === 'failed') {
            entry.reason = result.error.message;
        }
        return entry;
    });
}

/**
 * Writes the batch results as a JSON report.
 */
export async function writeReport(reportPath: string, results: ConversionResult[], logger: ILogger): Promise<void> {
    try {
        await fs.promises.writeFile(reportPath, JSON.stringify(toReportEntries(results), null, 2));
        logger.info(`Report written to "${reportPath}".`);
    } catch (error) {
        logger.error(`Failed to write report: ${errorMessage(error)}`);
        throw error;
    }
}
