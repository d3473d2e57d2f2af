#!/usr/bin/env node
// src/cli/index.ts

import figlet from 'figlet';
import { rainbow } from 'gradient-string';
import { createProgram } from './program.js';

console.log(rainbow.multiline(
    figlet.textSync('Pixel-VHDL', {
        font: 'Standard',
        horizontalLayout: 'default',
        verticalLayout: 'default',
        width: 80,
        whitespaceBreak: true,
    }),
));
console.log(rainbow('Turns PNG images into 12-bit VHDL ROM packages.\n'));

await createProgram().parseAsync(process.argv);
