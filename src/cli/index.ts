#!/usr/bin/env -S node --import tsx
// src/cli/index.ts

import fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import { renderBanner } from './banner.ts';
import { buildProgram } from './program.ts';

export async function main(argv: string[] = process.argv): Promise<void> {
    const program = buildProgram();
    const showBanner = !argv.includes('--no-banner') && process.stdout.isTTY;
    if (showBanner) {
        console.log(renderBanner());
    }
    await program.parseAsync(argv);
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(fs.realpathSync(entry)).href) {
    await main();
}
