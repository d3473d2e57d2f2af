// src/errors/index.ts

export type PixelVhdlErrorKind =
    | 'SOURCE_READ'
    | 'DESTINATION_WRITE'
    | 'CONFIGURATION'
    | 'DIMENSION'
    | 'IDENTIFIER'
    | 'PARSE'
    | 'VERIFICATION'
    | 'UNKNOWN';

/**
 * Base class for every failure the converter reports. `path` names the file or
 * folder involved when there is one.
 */
export class PixelVhdlError extends Error {
    constructor(
        readonly kind: PixelVhdlErrorKind,
        message: string,
        readonly path?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'PixelVhdlError';
    }
}

export class SourceReadError extends PixelVhdlError {
    constructor(path: string, reason: string, options?: { cause?: unknown }) {
        super('SOURCE_READ', `Failed to read image "${path}": ${reason}`, path, options);
        this.name = 'SourceReadError';
    }
}

/** The decoded image could not be brought to 3-channel 8-bit RGB. */
export class ColorModelError extends SourceReadError {
    constructor(path: string, reason: string) {
        super(path, reason);
        this.name = 'ColorModelError';
    }
}

export class DestinationWriteError extends PixelVhdlError {
    constructor(path: string, reason: string, options?: { cause?: unknown }) {
        super('DESTINATION_WRITE', `Failed to write "${path}": ${reason}`, path, options);
        this.name = 'DestinationWriteError';
    }
}

export class ConfigurationError extends PixelVhdlError {
    constructor(message: string, path?: string, options?: { cause?: unknown }) {
        super('CONFIGURATION', message, path, options);
        this.name = 'ConfigurationError';
    }
}

export class ImageDimensionError extends PixelVhdlError {
    constructor(width: number, height: number, limit: number) {
        super('DIMENSION', `Image dimensions ${width}x${height} must each be between 1 and ${limit}`);
        this.name = 'ImageDimensionError';
    }
}

export class InvalidIdentifierError extends PixelVhdlError {
    constructor(identifier: string) {
        super('IDENTIFIER', `Invalid identifier "${identifier}": it must not be empty`);
        this.name = 'InvalidIdentifierError';
    }
}

export class ModuleParseError extends PixelVhdlError {
    constructor(message: string) {
        super('PARSE', message);
        this.name = 'ModuleParseError';
    }
}

export class VerificationError extends PixelVhdlError {
    constructor(path: string, message: string) {
        super('VERIFICATION', `Verification of "${path}" failed: ${message}`, path);
        this.name = 'VerificationError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps anything thrown during a conversion so callers always see a PixelVhdlError.
 */
export function toPixelVhdlError(error: unknown, path?: string): PixelVhdlError {
    if (error instanceof PixelVhdlError) {
        return error;
    }
    return new PixelVhdlError('UNKNOWN', errorMessage(error), path, { cause: error });
}
