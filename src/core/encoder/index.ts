// src/core/encoder/index.ts

import type { IEncodeOptions } from '../../@types/index.ts';
import type { Chunk } from '../png/index.ts';

import { EncodeStateMachine } from './stateMachine.ts';

/**
 * Hides `options.message` in a new chunk of `options.chunkType` and writes the PNG back out.
 *
 * @return The chunk that was inserted.
 */
export async function encode(options: IEncodeOptions): Promise<Chunk> {
    const stateMachine = new EncodeStateMachine(options);
    await stateMachine.run();
    const { chunk } = stateMachine;
    if (chunk === null) {
        throw new Error('Encoding finished without inserting a chunk.');
    }
    return chunk;
}
