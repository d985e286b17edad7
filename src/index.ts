// src/index.ts

export * from './@types/index.ts';
export { config, pngSignature } from './config/index.ts';
export * from './core/errors.ts';
export * from './core/png/index.ts';
export { append, describePng, embedMessage, extractMessage, find, listTypes, parse, remove, serialize, stripChunk } from './core/lib/chunkOps.ts';
export { encode } from './core/encoder/index.ts';
export { decode } from './core/decoder/index.ts';
export { remove as removeFromFile } from './core/remover/index.ts';
export { print } from './core/inspector/index.ts';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.ts';
