// src/core/png/placement.ts

import type { IPlacementOptions } from '../../@types/index.ts';
import { config } from '../../config/index.ts';
import { DuplicateChunkError } from '../errors.ts';
import type { Chunk } from './chunk.ts';
import type { Png } from './png.ts';

/**
 * Works out where a new chunk goes in `png` under the given placement policy.
 * `before-terminal` targets the last chunk of the terminal type and falls back to the end when there is none.
 */
export function resolvePlacement(png: Png, options: IPlacementOptions = {}): number {
    const placement = options.placement ?? config.placement.strategy;
    if (placement === 'end') {
        return png.size;
    }
    const terminalIndex = png.indexOfType(options.terminalChunkType ?? config.placement.terminalChunkType, true);
    return terminalIndex === -1 ? png.size : terminalIndex;
}

/**
 * Inserts a chunk according to the placement policy and returns the position it landed at.
 *
 * @throws DuplicateChunkError when `uniqueType` is set and a chunk of the same type is already present.
 */
export function placeChunk(png: Png, chunk: Chunk, options: IPlacementOptions = {}): number {
    if (options.uniqueType && png.chunkByType(chunk.type) !== undefined) {
        throw new DuplicateChunkError(chunk.type.toString());
    }
    const position = resolvePlacement(png, options);
    png.insertChunk(chunk, position);
    return position;
}
