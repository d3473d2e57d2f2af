// src/core/serializer/parse.ts

import { ModuleParseError } from '../../errors/index.js';

export interface IParsedModule {
    identifier: string;
    width: number;
    height: number;
    codes: number[];
}

const PACKAGE_PATTERN = /^package (\S+)_graphic is$/m;
const LITERAL_PATTERN = /X"([0-9A-F]{3})"/g;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function readConstant(text: string, name: string): number {
    const match = new RegExp(`^\\s*constant ${escapeRegExp(name)} : integer := (\\d+);$`, 'm').exec(text);
    if (!match) {
        throw new ModuleParseError(`Missing integer constant "${name}"`);
    }
    return Number.parseInt(match[1], 10);
}

/**
 * Reads a generated package back into its identifier, dimensions and the packed
 * pixels in row-major order.
 */
export function parseModule(text: string): IParsedModule {
    const packageMatch = PACKAGE_PATTERN.exec(text);
    if (!packageMatch) {
        throw new ModuleParseError('Missing package declaration');
    }
    const identifier = packageMatch[1];
    const width = readConstant(text, `${identifier}_width`);
    const height = readConstant(text, `${identifier}_height`);

    const openMarker = `constant ${identifier.toUpperCase()}_IMAGE : ${identifier}_array := (`;
    const bodyStart = text.indexOf(openMarker);
    const bodyEnd = text.lastIndexOf(`end package ${identifier}_graphic;`);
    if (bodyStart < 0 || bodyEnd < 0) {
        throw new ModuleParseError(`Missing image constant for "${identifier}"`);
    }
    const body = text.slice(bodyStart + openMarker.length, bodyEnd);

    const codes: number[] = [];
    for (const match of body.matchAll(LITERAL_PATTERN)) {
        codes.push(Number.parseInt(match[1], 16));
    }
    if (codes.length !== width * height) {
        throw new ModuleParseError(
            `Expected ${width * height} pixel literals for ${width}x${height}, found ${codes.length}`,
        );
    }
    return { identifier, width, height, codes };
}
