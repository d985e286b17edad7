// src/core/decoder/index.ts

import type { IDecodeOptions } from '../../@types/index.ts';
import { readBufferFromFile } from '../../utils/storage/storageUtils.ts';
import { extractMessage } from '../lib/chunkOps.ts';

/**
 * Reads the message stored in the first chunk of `options.chunkType`.
 *
 * @return The message, or `undefined` when the PNG has no such chunk.
 */
export async function decode(options: IDecodeOptions): Promise<string | undefined> {
    const { inputFile, chunkType, verbose, logger } = options;
    if (verbose) logger.info(`Looking for a "${chunkType}" chunk in "${inputFile}"...`);
    const message = extractMessage(readBufferFromFile(inputFile), chunkType);
    if (message === undefined) {
        logger.warn(`No "${chunkType}" chunk found in "${inputFile}".`);
    } else {
        logger.debug(`Decoded ${message.length} character(s) from "${chunkType}".`);
    }
    return message;
}
