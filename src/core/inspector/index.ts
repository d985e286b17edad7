// src/core/inspector/index.ts

import type { IPrintOptions } from '../../@types/index.ts';
import { readBufferFromFile } from '../../utils/storage/storageUtils.ts';
import { describePng } from '../lib/chunkOps.ts';

export async function print(options: IPrintOptions): Promise<string> {
    const { inputFile, verbose, logger } = options;
    if (verbose) logger.info(`Listing chunks of "${inputFile}"...`);
    return describePng(readBufferFromFile(inputFile));
}
