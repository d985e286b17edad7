// src/core/png/chunkType.ts

import { InvalidChunkTypeError } from '../errors.ts';
import { compareUint8ArraysQuick } from '../../utils/misc/uint8arrayHelpers.ts';

/** Anything a chunk type can be looked up by. */
export type ChunkTypeInput = ChunkType | string | Uint8Array;

const TYPE_LENGTH = 4;
const PROPERTY_BIT = 0x20;

function isAsciiLetter(byte: number): boolean {
    return (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a);
}

/**
 * Four-letter chunk type code. The case of each letter (bit 5) carries a property:
 * ancillary, private, reserved and safe-to-copy, in byte order.
 *
 * @see http://www.libpng.org/pub/png/spec/1.2/PNG-Structure.html#Chunk-naming-conventions
 */
export class ChunkType {
    readonly #bytes: Uint8Array;

    private constructor(bytes: Uint8Array) {
        this.#bytes = bytes;
    }

    /**
     * Builds a type from 4 raw bytes. Every byte must be an ASCII letter;
     * a set reserved bit is accepted here and reported by {@link isValid}.
     */
    static fromBytes(bytes: Uint8Array): ChunkType {
        if (bytes.length !== TYPE_LENGTH) {
            throw new InvalidChunkTypeError(`expected ${TYPE_LENGTH} bytes, got ${bytes.length}`);
        }
        const index = bytes.findIndex((byte) => !isAsciiLetter(byte));
        if (index !== -1) {
            throw new InvalidChunkTypeError(`byte ${index} (0x${bytes[index].toString(16).padStart(2, '0')}) is not an ASCII letter`);
        }
        return new ChunkType(Uint8Array.from(bytes));
    }

    static fromString(code: string): ChunkType {
        // non-ASCII characters would be truncated to a single byte below
        if (code.length !== TYPE_LENGTH || /[^\x00-\x7f]/.test(code)) {
            throw new InvalidChunkTypeError(`"${code}" is not a ${TYPE_LENGTH}-letter ASCII code`);
        }
        return ChunkType.fromBytes(Uint8Array.from(code, (char) => char.charCodeAt(0)));
    }

    /**
     * Like {@link fromString}, but also rejects a set reserved bit.
     * Used for types of chunks about to be written.
     */
    static parseStrict(code: string): ChunkType {
        const type = ChunkType.fromString(code);
        if (!type.isReservedBitValid) {
            throw new InvalidChunkTypeError(`"${code}" sets the reserved bit (third letter must be uppercase)`);
        }
        return type;
    }

    static from(input: ChunkTypeInput): ChunkType {
        if (input instanceof ChunkType) return input;
        if (typeof input === 'string') return ChunkType.fromString(input);
        return ChunkType.fromBytes(input);
    }

    bytes(): Uint8Array {
        return Uint8Array.from(this.#bytes);
    }

    get isCritical(): boolean {
        return !this.#propertyBit(0);
    }

    get isPublic(): boolean {
        return !this.#propertyBit(1);
    }

    get isReservedBitValid(): boolean {
        return !this.#propertyBit(2);
    }

    get isSafeToCopy(): boolean {
        return this.#propertyBit(3);
    }

    isValid(): boolean {
        return this.#bytes.every(isAsciiLetter) && this.isReservedBitValid;
    }

    equals(other: ChunkType): boolean {
        return compareUint8ArraysQuick(this.#bytes, other.#bytes);
    }

    toString(): string {
        return String.fromCharCode(...this.#bytes);
    }

    #propertyBit(index: number): boolean {
        return (this.#bytes[index] & PROPERTY_BIT) !== 0;
    }
}
