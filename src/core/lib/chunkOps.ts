// src/core/lib/chunkOps.ts

import type { IPlacementOptions } from '../../@types/index.ts';
import { Chunk, ChunkType, type ChunkTypeInput, Png, placeChunk } from '../png/index.ts';

/**
 * Value-in/value-out operations over PNG containers. None of these mutate their `png` argument;
 * the CLI commands are built on top of them.
 */

export function parse(bytes: Uint8Array): Png {
    return Png.fromBytes(bytes);
}

export function serialize(png: Png): Uint8Array {
    return png.toBytes();
}

/**
 * Returns a copy of `png` with a new chunk of `chunkType` holding `data`.
 * The type must be strictly valid (letters only, reserved bit clear).
 */
export function append(png: Png, chunkType: string, data: Uint8Array, options: IPlacementOptions = {}): Png {
    const copy = Png.fromChunks(png.chunks());
    placeChunk(copy, new Chunk(ChunkType.parseStrict(chunkType), data), options);
    return copy;
}

export function find(png: Png, chunkType: ChunkTypeInput): Chunk | undefined {
    return png.chunkByType(chunkType);
}

/**
 * Returns a copy of `png` without the first chunk of `chunkType`, together with that chunk's data.
 *
 * @throws ChunkNotFoundError when no chunk has that type.
 */
export function remove(png: Png, chunkType: ChunkTypeInput): { png: Png; removed: Uint8Array } {
    const copy = Png.fromChunks(png.chunks());
    const chunk = copy.removeFirstChunk(chunkType);
    return { png: copy, removed: chunk.data };
}

export function listTypes(png: Png): Iterable<string> {
    return {
        *[Symbol.iterator]() {
            for (const type of png.chunkTypes()) {
                yield type.toString();
            }
        },
    };
}

export function embedMessage(bytes: Uint8Array, chunkType: string, message: string, options: IPlacementOptions = {}): Uint8Array {
    const data = new TextEncoder().encode(message);
    return serialize(append(parse(bytes), chunkType, data, options));
}

/** Text of the first chunk of `chunkType`, or `undefined` when the PNG has none. */
export function extractMessage(bytes: Uint8Array, chunkType: string): string | undefined {
    return find(parse(bytes), chunkType)?.dataAsString();
}

export function stripChunk(bytes: Uint8Array, chunkType: string): { bytes: Uint8Array; removed: Uint8Array } {
    const { png, removed } = remove(parse(bytes), chunkType);
    return { bytes: serialize(png), removed };
}

export function describePng(bytes: Uint8Array): string {
    return parse(bytes).toString();
}
