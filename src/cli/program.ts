// src/cli/program.ts

import type { ConversionResult, ILogFacility, ILogger, IProgressBar } from '../@types/index.js';
import { Command, InvalidArgumentError } from 'commander';
import * as path from 'node:path';
import cliProgress from 'cli-progress';
import inquirer from 'inquirer';
import { config } from '../config/index.js';
import { ConvertStateMachine } from '../core/converter/index.js';
import { convertJobs, deriveIdentifier, discoverJobs, summarizeResults, writeReport } from '../core/batch/index.js';
import { errorMessage } from '../errors/index.js';
import { filePathExists } from '../utils/storage/storageUtils.js';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.js';

export interface ICliDependencies {
    logFacility?: ILogFacility;
    confirmOverwrite?: (files: string[]) => Promise<boolean>;
    createProgressBar?: (format: string) => IProgressBar;
}

interface IConvertCommandOptions {
    input: string;
    output: string;
    name?: string;
    verify: boolean;
    log?: boolean;
    verbose?: boolean;
}

interface IBatchCommandOptions {
    input: string;
    output: string;
    ext?: string[];
    concurrency?: number;
    report?: string | true;
    yes?: boolean;
    verify: boolean;
    log?: boolean;
    verbose?: boolean;
}

function parsePositiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function createShadesProgressBar(format: string): IProgressBar {
    return new cliProgress.SingleBar({
        format,
        barCompleteChar: '\u2588',
        barIncompleteChar: '\u2591',
        hideCursor: true,
    }, cliProgress.Presets.shades_grey);
}

async function promptOverwrite(files: string[]): Promise<boolean> {
    const answers = await inquirer.prompt<{ overwrite: boolean }>([
        {
            type: 'confirm',
            name: 'overwrite',
            message: `${files.length} output file(s) already exist. Overwrite?`,
            default: false,
        },
    ]);
    return answers.overwrite;
}

function reportFailures(results: ConversionResult[], logger: ILogger): void {
    for (const result of results) {
        if (result.status === 'failed') {
            logger.error(`${result.job.inputPath}: ${result.error.message}`);
        }
    }
}

/**
 * Builds the command line program. Actions set `process.exitCode` instead of exiting.
 */
export function createProgram(dependencies: ICliDependencies = {}): Command {
    const logFacility: ILogFacility = dependencies.logFacility ?? console;
    const confirmOverwrite = dependencies.confirmOverwrite ?? promptOverwrite;
    const createProgressBar = dependencies.createProgressBar ?? createShadesProgressBar;

    const program = new Command();
    program
        .name('pixel-vhdl')
        .description('Converts PNG images into VHDL packages holding 12-bit pixel ROM tables')
        .version('1.0.0');

    program
        .command('convert')
        .description('Convert a single image into a VHDL package')
        .requiredOption('-i, --input <file>', 'Input image')
        .requiredOption('-o, --output <file>', 'Output VHDL file')
        .option('-n, --name <identifier>', 'Identifier for the package (Default: the input file name)')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .option('--no-verify', 'Skip reading the written module back')
        .showHelpAfterError()
        .action(async (options: IConvertCommandOptions) => {
            const verbose = options.verbose ?? false;
            const isLogging = options.log ?? false;
            const inputPath = path.resolve(options.input);
            const outputPath = path.resolve(options.output);
            const identifier = options.name ?? deriveIdentifier(inputPath);

            const logger = getLogger('converter', isLogging ? logFacility : NoopLogFacility, verbose);
            let progressBar: IProgressBar | undefined;
            if (!isLogging) {
                progressBar = createProgressBar('Converting |{bar}| {percentage}% || {value}/{total} state: {state}');
            }
            const stateMachine = new ConvertStateMachine({
                inputPath,
                outputPath,
                identifier,
                verbose,
                logger,
                verify: options.verify,
                progressBar,
            });
            progressBar?.start(stateMachine.stepCount, 0, { state: 'INIT' });
            try {
                await stateMachine.run();
                progressBar?.stop();
                const { width, height } = stateMachine.summary;
                getLogger('pixel-vhdl', logFacility).success(
                    `Wrote ${width}x${height} image to "${outputPath}".`,
                );
                process.exitCode = 0;
            } catch (error) {
                progressBar?.stop();
                getLogger('pixel-vhdl', logFacility).error(`Conversion failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });

    program
        .command('batch')
        .description('Convert every image of a folder into VHDL packages')
        .requiredOption('-i, --input <folder>', 'Folder with input images')
        .requiredOption('-o, --output <folder>', 'Folder for the generated VHDL files')
        .option('-e, --ext <extensions...>', `Input file extensions (Default: ${config.supportedExtensions.join(' ')})`)
        .option(
            '-c, --concurrency <number>',
            `Images converted in parallel (Default: ${config.batch.concurrency})`,
            parsePositiveInt,
        )
        .option('-r, --report [file]', `Write a JSON report (Default: <output>/${config.batch.reportFile})`)
        .option('-y, --yes', 'Overwrite existing output files without asking')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .option('--no-verify', 'Skip reading the written modules back')
        .showHelpAfterError()
        .action(async (options: IBatchCommandOptions) => {
            const verbose = options.verbose ?? false;
            const isLogging = options.log ?? false;
            const inputFolder = path.resolve(options.input);
            const outputFolder = path.resolve(options.output);
            const reporter = getLogger('pixel-vhdl', logFacility);
            const logger = getLogger('batch', isLogging ? logFacility : NoopLogFacility, verbose);

            try {
                const jobs = discoverJobs({ inputFolder, outputFolder, extensions: options.ext });
                if (jobs.length === 0) {
                    reporter.warn(`No images found in "${inputFolder}".`);
                    process.exitCode = 0;
                    return;
                }

                const existing = jobs.map((job) => job.outputPath).filter(filePathExists);
                if (existing.length > 0 && !options.yes && !(await confirmOverwrite(existing))) {
                    reporter.warn('Aborted, no files were written.');
                    process.exitCode = 1;
                    return;
                }

                const progressBar = isLogging
                    ? undefined
                    : createProgressBar('Processing |{bar}| {percentage}% || {value}/{total} Files {file}');
                const results = await convertJobs(jobs, {
                    inputFolder,
                    outputFolder,
                    logger,
                    verbose,
                    verify: options.verify,
                    concurrency: options.concurrency,
                    progressBar,
                });

                if (options.report !== undefined) {
                    const reportPath = options.report === true
                        ? path.join(outputFolder, config.batch.reportFile)
                        : path.resolve(options.report);
                    await writeReport(reportPath, results, logger);
                }

                const summary = summarizeResults(results);
                if (!isLogging) reportFailures(results, reporter);
                if (summary.failed > 0) {
                    reporter.warn(`Converted ${summary.succeeded} of ${summary.total} image(s), ${summary.failed} failed.`);
                    process.exitCode = 1;
                } else {
                    reporter.success(`Converted ${summary.succeeded} image(s) into "${outputFolder}".`);
                    process.exitCode = 0;
                }
            } catch (error) {
                reporter.error(`Batch failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });

    return program;
}
