// src/core/serializer/index.ts

import type { IPackedGrid } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { ImageDimensionError, InvalidIdentifierError } from '../../errors/index.js';

const INDENT = '    ';

export interface IModuleNames {
    packageName: string;
    widthConstant: string;
    heightConstant: string;
    arrayType: string;
    imageConstant: string;
}

/**
 * Derives the names used inside a generated package. Everything is lower-case
 * except the image constant.
 */
export function moduleNames(identifier: string): IModuleNames {
    const trimmed = identifier.trim();
    if (trimmed.length === 0) {
        throw new InvalidIdentifierError(identifier);
    }
    const lower = trimmed.toLowerCase();
    return {
        packageName: `${lower}_graphic`,
        widthConstant: `${lower}_width`,
        heightConstant: `${lower}_height`,
        arrayType: `${lower}_array`,
        imageConstant: `${trimmed.toUpperCase()}_IMAGE`,
    };
}

export function assertDimensions(width: number, height: number): void {
    const limit = config.maxDimension;
    const valid = (value: number) => Number.isInteger(value) && value >= 1 && value <= limit;
    if (!valid(width) || !valid(height)) {
        throw new ImageDimensionError(width, height, limit);
    }
}

/** `X"hhh"` */
export function formatCode(code: number): string {
    return `X"${(code & 0xfff).toString(16).toUpperCase().padStart(3, '0')}"`;
}

/**
 * Renders one grid row as a parenthesised list of hex literals.
 */
export function formatRow(grid: IPackedGrid, row: number): string {
    const start = row * grid.width;
    const literals: string[] = [];
    for (let column = 0; column < grid.width; column++) {
        literals.push(formatCode(grid.codes[start + column]));
    }
    return `${INDENT}(${literals.join(', ')})`;
}

/**
 * Produces the lines of a VHDL package declaring the grid as a constant
 * `std_logic_vector(11 downto 0)` array.
 *
 * Rows are separated by `,` so only the last row lacks a trailing comma.
 */
export function serializeModule(grid: IPackedGrid, identifier: string): string[] {
    assertDimensions(grid.width, grid.height);
    if (grid.codes.length !== grid.width * grid.height) {
        throw new RangeError(`Expected ${grid.width * grid.height} packed pixels, got ${grid.codes.length}`);
    }
    const names = moduleNames(identifier);

    const rows: string[] = [];
    for (let row = 0; row < grid.height; row++) {
        rows.push(formatRow(grid, row));
    }

    return [
        'library ieee;',
        'use ieee.std_logic_1164.all;',
        '',
        `package ${names.packageName} is`,
        `${INDENT}constant ${names.widthConstant} : integer := ${grid.width};`,
        `${INDENT}constant ${names.heightConstant} : integer := ${grid.height};`,
        `${INDENT}type ${names.arrayType} is array (0 to ${names.heightConstant}-1, 0 to ${names.widthConstant}-1) of std_logic_vector(11 downto 0);`,
        `${INDENT}constant ${names.imageConstant} : ${names.arrayType} := (`,
        ...rows.join(',\n').split('\n'),
        `${INDENT});`,
        `end package ${names.packageName};`,
    ];
}

/**
 * Renders the complete module text, newline-terminated.
 */
export function renderModule(grid: IPackedGrid, identifier: string): string {
    return `${serializeModule(grid, identifier).join('\n')}\n`;
}
