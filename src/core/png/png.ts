// src/core/png/png.ts

import { pngSignature } from '../../config/index.ts';
import { compareUint8ArraysQuick, concatUint8Arrays } from '../../utils/misc/uint8arrayHelpers.ts';
import { ChunkNotFoundError, InvalidSignatureError } from '../errors.ts';
import { Chunk } from './chunk.ts';
import { ChunkType, type ChunkTypeInput } from './chunkType.ts';

const SIGNATURE = pngSignature();

/**
 * A PNG file seen as its signature followed by an ordered list of chunks.
 * No ordering rules (IHDR first, IEND last) are enforced here; that is left to callers.
 */
export class Png {
    /** A copy of the signature every PNG starts with. */
    static get STANDARD_HEADER(): Uint8Array {
        return Uint8Array.from(SIGNATURE);
    }

    readonly #chunks: Chunk[];

    private constructor(chunks: Chunk[]) {
        this.#chunks = chunks;
    }

    static fromChunks(chunks: Iterable<Chunk>): Png {
        return new Png([...chunks]);
    }

    /**
     * Parses a complete PNG buffer. Parsing is all-or-nothing: the first malformed chunk fails the whole buffer.
     *
     * @throws InvalidSignatureError when the buffer does not start with the PNG signature.
     * @throws MalformedChunkError for the first chunk that cannot be read.
     */
    static fromBytes(bytes: Uint8Array): Png {
        const header = bytes.subarray(0, SIGNATURE.length);
        if (!compareUint8ArraysQuick(header, SIGNATURE)) {
            throw new InvalidSignatureError(Uint8Array.from(header));
        }

        const chunks: Chunk[] = [];
        let offset = SIGNATURE.length;
        while (offset < bytes.length) {
            const { chunk, nextOffset } = Chunk.fromBytes(bytes, offset);
            chunks.push(chunk);
            offset = nextOffset;
        }
        return new Png(chunks);
    }

    get size(): number {
        return this.#chunks.length;
    }

    /** Snapshot of the chunk list; mutating it does not affect this PNG. */
    chunks(): Chunk[] {
        return [...this.#chunks];
    }

    appendChunk(chunk: Chunk): void {
        this.#chunks.push(chunk);
    }

    /**
     * Inserts a chunk so that it ends up at `position`.
     *
     * @throws RangeError when `position` is not an integer in 0..size.
     */
    insertChunk(chunk: Chunk, position: number): void {
        if (!Number.isInteger(position) || position < 0 || position > this.#chunks.length) {
            throw new RangeError(`Insert position ${position} is outside 0..${this.#chunks.length}`);
        }
        this.#chunks.splice(position, 0, chunk);
    }

    indexOfType(chunkType: ChunkTypeInput, fromEnd = false): number {
        const type = ChunkType.from(chunkType);
        const matches = (chunk: Chunk) => chunk.type.equals(type);
        return fromEnd ? this.#chunks.findLastIndex(matches) : this.#chunks.findIndex(matches);
    }

    /** First chunk of the given type, or `undefined`. */
    chunkByType(chunkType: ChunkTypeInput): Chunk | undefined {
        const type = ChunkType.from(chunkType);
        return this.#chunks.find((chunk) => chunk.type.equals(type));
    }

    chunksByType(chunkType: ChunkTypeInput): Chunk[] {
        const type = ChunkType.from(chunkType);
        return this.#chunks.filter((chunk) => chunk.type.equals(type));
    }

    /**
     * Removes the first chunk of the given type and hands it back.
     *
     * @throws ChunkNotFoundError when no chunk has that type.
     */
    removeFirstChunk(chunkType: ChunkTypeInput): Chunk {
        const index = this.indexOfType(chunkType);
        if (index === -1) {
            throw new ChunkNotFoundError(ChunkType.from(chunkType).toString());
        }
        const [removed] = this.#chunks.splice(index, 1);
        return removed;
    }

    /** Lazily yields the current chunk types; every call starts over from the live list. */
    *chunkTypes(): Generator<ChunkType, void, undefined> {
        for (let i = 0; i < this.#chunks.length; i++) {
            yield this.#chunks[i].type;
        }
    }

    toBytes(): Uint8Array {
        return concatUint8Arrays([SIGNATURE, ...this.#chunks.map((chunk) => chunk.toBytes())]);
    }

    equals(other: Png): boolean {
        return this.size === other.size && this.#chunks.every((chunk, index) => chunk.equals(other.#chunks[index]));
    }

    toString(): string {
        return [`PNG with ${this.size} chunk(s)`, ...this.#chunks.map((chunk, index) => `  [${index}] ${chunk}`)].join('\n');
    }
}
