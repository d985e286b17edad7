// src/core/png/index.ts

export { Chunk, CHUNK_OVERHEAD } from './chunk.ts';
export { ChunkType } from './chunkType.ts';
export type { ChunkTypeInput } from './chunkType.ts';
export { Png } from './png.ts';
export { placeChunk, resolvePlacement } from './placement.ts';
