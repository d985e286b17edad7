// src/core/errors.ts

export type PngChunkErrorKind =
    | 'InvalidSignature'
    | 'MalformedChunk'
    | 'InvalidChunkType'
    | 'ChunkNotFound'
    | 'InvalidEncoding'
    | 'DuplicateChunk';

/**
 * Base class for every failure raised by the chunk engine.
 * `kind` lets callers switch on the failure without instanceof chains.
 */
export abstract class PngChunkError extends Error {
    abstract readonly kind: PngChunkErrorKind;

    protected constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidSignatureError extends PngChunkError {
    readonly kind = 'InvalidSignature';

    constructor(readonly actual: Uint8Array) {
        super('Buffer does not start with the PNG signature.');
    }
}

export class MalformedChunkError extends PngChunkError {
    readonly kind = 'MalformedChunk';

    constructor(
        message: string,
        readonly offset: number,
        options?: { cause?: unknown },
    ) {
        super(`Malformed chunk at offset ${offset}: ${message}`, options);
    }
}

export class InvalidChunkTypeError extends PngChunkError {
    readonly kind = 'InvalidChunkType';

    constructor(reason: string) {
        super(`Invalid chunk type: ${reason}`);
    }
}

export class ChunkNotFoundError extends PngChunkError {
    readonly kind = 'ChunkNotFound';

    constructor(readonly chunkType: string) {
        super(`No chunk of type "${chunkType}" found.`);
    }
}

export class InvalidEncodingError extends PngChunkError {
    readonly kind = 'InvalidEncoding';

    constructor(encoding: string, options?: { cause?: unknown }) {
        super(`Chunk data is not valid ${encoding} text.`, options);
    }
}

export class DuplicateChunkError extends PngChunkError {
    readonly kind = 'DuplicateChunk';

    constructor(readonly chunkType: string) {
        super(`A chunk of type "${chunkType}" already exists.`);
    }
}
