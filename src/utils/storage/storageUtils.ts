// src/utils/storage/storageUtils.ts

import * as fs from 'node:fs';
import * as path from 'node:path';
import { config } from '../../config/index.js';

let tempFileCounter = 0;

/**
 * Ensures that the specified output directory exists, creating it and any
 * missing parents.
 */
export function ensureOutputDirectory(outputFolder: string): void {
    fs.mkdirSync(outputFolder, { recursive: true });
}

/**
 * Reads the names of the regular files in a directory, sorted by name.
 */
export function readDirectory(dirPath: string): string[] {
    return fs
        .readdirSync(dirPath, { withFileTypes: true })
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort();
}

/**
 * Checks if a file or directory exists at the given file path.
 */
export function filePathExists(filePath: string): boolean {
    try {
        fs.statSync(filePath);
        return true;
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return false;
        }
        throw error; // Re-throw if it's a different error
    }
}

/**
 * Reads a UTF-8 text file.
 */
export async function readTextFile(filePath: string): Promise<string> {
    return await fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Writes text to `filePath` through a temporary sibling that is renamed into place,
 * so readers see either the previous file or the complete new one. The temporary
 * file is removed when any step fails.
 */
export async function writeTextFileAtomic(filePath: string, contents: string): Promise<void> {
    tempFileCounter += 1;
    const tempPath = path.join(
        path.dirname(filePath),
        `.${path.basename(filePath)}.${process.pid}.${tempFileCounter}${config.tempFileSuffix}`,
    );
    try {
        await fs.promises.writeFile(tempPath, contents, 'utf-8');
        await fs.promises.rename(tempPath, filePath);
    } catch (error) {
        await fs.promises.rm(tempPath, { force: true }).catch(() => undefined);
        throw error;
    }
}

/**
 * Extracts the lower-cased extension, including the dot, from a file name.
 */
export function getFileExtension(filename: string): string {
    return path.extname(filename).toLowerCase();
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
