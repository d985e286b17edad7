// src/core/png/chunk.ts

import type { IParsedChunk } from '../../@types/index.ts';
import { config } from '../../config/index.ts';
import { computeChunkCrc } from '../../utils/checksum/crc.ts';
import { compareUint8ArraysQuick, concatUint8Arrays } from '../../utils/misc/uint8arrayHelpers.ts';
import { deserializeUInt32, serializeUInt32 } from '../../utils/serialization/serializationHelpers.ts';
import { InvalidChunkTypeError, InvalidEncodingError, MalformedChunkError } from '../errors.ts';
import { ChunkType } from './chunkType.ts';

const { lengthFieldSize, typeFieldSize, crcFieldSize, maxDataLength } = config.chunkLayout;

// TextEncoder only writes UTF-8, so text is read back the same way
const TEXT_ENCODING = 'utf-8';

/** Bytes a chunk occupies besides its data. */
export const CHUNK_OVERHEAD = lengthFieldSize + typeFieldSize + crcFieldSize;

/**
 * A single PNG chunk: length, type, data and CRC.
 * Immutable; the CRC is computed once on construction and the data is only handed out as copies.
 */
export class Chunk {
    readonly type: ChunkType;
    readonly crc: number;
    readonly #data: Uint8Array;

    constructor(type: ChunkType, data: Uint8Array) {
        this.type = type;
        this.#data = Uint8Array.from(data);
        this.crc = computeChunkCrc(type.bytes(), this.#data);
    }

    /**
     * Reads one chunk starting at `offset`.
     *
     * @param bytes - Buffer holding the chunk, possibly followed by more chunks.
     * @param offset - Position of the chunk's length field.
     * @returns The chunk and the offset right after its CRC.
     * @throws MalformedChunkError when the declared length is out of bounds or the CRC does not match.
     */
    static fromBytes(bytes: Uint8Array, offset = 0): IParsedChunk<Chunk> {
        const available = bytes.length - offset;
        if (available < CHUNK_OVERHEAD) {
            throw new MalformedChunkError(
                `need at least ${CHUNK_OVERHEAD} bytes for length, type and CRC, ${available} left`,
                offset,
            );
        }

        const { value: length, newOffset: typeOffset } = deserializeUInt32(bytes, offset);
        if (length > maxDataLength) {
            throw new MalformedChunkError(`declared length ${length} exceeds the maximum of ${maxDataLength}`, offset);
        }
        if (length > available - CHUNK_OVERHEAD) {
            throw new MalformedChunkError(
                `declared length ${length} exceeds the ${available - CHUNK_OVERHEAD} data bytes available`,
                offset,
            );
        }

        const dataOffset = typeOffset + typeFieldSize;
        const crcOffset = dataOffset + length;
        const typeBytes = bytes.subarray(typeOffset, dataOffset);
        const data = bytes.subarray(dataOffset, crcOffset);
        const { value: storedCrc, newOffset: nextOffset } = deserializeUInt32(bytes, crcOffset);

        let type: ChunkType;
        try {
            type = ChunkType.fromBytes(typeBytes);
        } catch (error) {
            if (error instanceof InvalidChunkTypeError) {
                throw new MalformedChunkError(error.message, offset, { cause: error });
            }
            throw error;
        }

        const chunk = new Chunk(type, data);
        if (chunk.crc !== storedCrc) {
            throw new MalformedChunkError(
                `CRC mismatch for "${type}": stored 0x${hex(storedCrc)}, computed 0x${hex(chunk.crc)}`,
                offset,
            );
        }

        return { chunk, nextOffset };
    }

    /** Parses a buffer that holds exactly one chunk. */
    static parse(bytes: Uint8Array): Chunk {
        const { chunk, nextOffset } = Chunk.fromBytes(bytes);
        if (nextOffset !== bytes.length) {
            throw new MalformedChunkError(`${bytes.length - nextOffset} trailing bytes after chunk`, nextOffset);
        }
        return chunk;
    }

    get length(): number {
        return this.#data.length;
    }

    get data(): Uint8Array {
        return Uint8Array.from(this.#data);
    }

    /**
     * Decodes the data as text.
     *
     * @throws InvalidEncodingError when the bytes are not valid UTF-8.
     */
    dataAsString(): string {
        const decoder = new TextDecoder(TEXT_ENCODING, { fatal: true });
        try {
            return decoder.decode(this.#data);
        } catch (error) {
            throw new InvalidEncodingError(TEXT_ENCODING, { cause: error });
        }
    }

    toBytes(): Uint8Array {
        return concatUint8Arrays([
            serializeUInt32(this.length),
            this.type.bytes(),
            this.#data,
            serializeUInt32(this.crc),
        ]);
    }

    equals(other: Chunk): boolean {
        return this.type.equals(other.type) && this.crc === other.crc && compareUint8ArraysQuick(this.#data, other.#data);
    }

    toString(): string {
        return `Chunk ${this.type} length=${this.length} crc=0x${hex(this.crc)}`;
    }
}

function hex(value: number): string {
    return value.toString(16).padStart(8, '0');
}
