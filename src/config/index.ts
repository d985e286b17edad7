// src/config/index.ts

import type { ChunkPlacement } from '../@types/index.ts';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] as const;

/** A fresh copy of the 8-byte PNG signature. */
export function pngSignature(): Uint8Array {
    return Uint8Array.from(PNG_SIGNATURE);
}

interface IConfig {
    chunkLayout: {
        lengthFieldSize: number;
        typeFieldSize: number;
        crcFieldSize: number;
        maxDataLength: number;
    };
    placement: {
        strategy: ChunkPlacement;
        terminalChunkType: string;
    };
}

export const config: IConfig = {
    chunkLayout: {
        lengthFieldSize: 4,
        typeFieldSize: 4,
        crcFieldSize: 4,
        maxDataLength: 2 ** 31 - 1, // PNG caps chunk lengths at 2^31 - 1
    },
    placement: {
        strategy: 'before-terminal',
        terminalChunkType: 'IEND',
    },
};
