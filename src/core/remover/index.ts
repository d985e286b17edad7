// src/core/remover/index.ts

import type { IRemoveOptions } from '../../@types/index.ts';
import type { Chunk } from '../png/index.ts';

import { RemoveStateMachine } from './stateMachine.ts';

/**
 * Removes the first chunk of `options.chunkType` from the file and returns it.
 */
export async function remove(options: IRemoveOptions): Promise<Chunk> {
    const stateMachine = new RemoveStateMachine(options);
    await stateMachine.run();
    const { removed } = stateMachine;
    if (removed === null) {
        throw new Error('Removal finished without removing a chunk.');
    }
    return removed;
}
