// tests/png.test.ts

import { describe, expect, it } from 'vitest';

import { pngSignature } from '../src/config/index.ts';
import { Png } from '../src/core/png/index.ts';
import { ChunkNotFoundError, InvalidChunkTypeError, InvalidSignatureError, MalformedChunkError } from '../src/core/errors.ts';
import { concatUint8Arrays } from '../src/utils/misc/uint8arrayHelpers.ts';
import { IDAT_DATA, makeChunk, minimalChunks, pngBytes, rawChunk } from './helpers/pngFixtures.ts';

function typesOf(png: Png): string[] {
    return [...png.chunkTypes()].map((type) => type.toString());
}

describe('Png', () => {
    describe('fromBytes', () => {
        it('should parse every chunk after the signature', () => {
            const png = Png.fromBytes(pngBytes());
            expect(png.size).toBe(3);
            expect(typesOf(png)).toEqual(['IHDR', 'IDAT', 'IEND']);
            expect(png.chunkByType('IDAT')?.data).toEqual(IDAT_DATA);
        });

        it('should reject a wrong signature', () => {
            const bytes = pngBytes();
            bytes[1] = 0x51;
            expect(() => Png.fromBytes(bytes)).toThrow(InvalidSignatureError);
        });

        it('should reject a buffer shorter than the signature', () => {
            expect(() => Png.fromBytes(Uint8Array.from([0x89, 0x50]))).toThrow(InvalidSignatureError);
        });

        it('should accept a signature with no chunks', () => {
            expect(Png.fromBytes(Png.STANDARD_HEADER).size).toBe(0);
        });

        it('should not require a terminal chunk', () => {
            const png = Png.fromBytes(pngBytes(minimalChunks().slice(0, 2)));
            expect(typesOf(png)).toEqual(['IHDR', 'IDAT']);
        });

        it('should fail the whole parse on the first corrupt chunk', () => {
            const bytes = pngBytes();
            // first byte of IDAT data: signature (8) + IHDR chunk (25) + IDAT length and type (8)
            bytes[41] ^= 0x01;
            let caught: unknown;
            try {
                Png.fromBytes(bytes);
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(MalformedChunkError);
            expect(caught instanceof MalformedChunkError && caught.offset).toBe(33);
        });

        it('should reject a huge declared length with too few bytes behind it', () => {
            const bytes = concatUint8Arrays([Png.STANDARD_HEADER, rawChunk(0xffffffff, 'ruSt', 'tiny', 0)]);
            expect(() => Png.fromBytes(bytes)).toThrow(MalformedChunkError);
        });

        it('should reject trailing bytes too short to be a chunk', () => {
            const bytes = concatUint8Arrays([pngBytes(), Uint8Array.from([0, 0, 0])]);
            expect(() => Png.fromBytes(bytes)).toThrow(MalformedChunkError);
        });
    });

    describe('toBytes', () => {
        it('should reproduce the parsed buffer exactly', () => {
            const bytes = pngBytes();
            expect(Png.fromBytes(bytes).toBytes()).toEqual(bytes);
        });

        it('should round-trip a container built from chunks', () => {
            const png = Png.fromChunks([...minimalChunks(), makeChunk('ruSt', 'x'), makeChunk('ruSt', 'y')]);
            expect(Png.fromBytes(png.toBytes()).equals(png)).toBe(true);
        });

        it('should keep its signature when callers mutate the copies they are given', () => {
            Png.STANDARD_HEADER[0] = 0;
            pngSignature()[0] = 0;
            const bytes = pngBytes();
            expect(bytes[0]).toBe(0x89);
            expect(Png.fromBytes(bytes).toBytes()[0]).toBe(0x89);
        });

        it('should start with the standard header', () => {
            expect(Png.fromChunks([]).toBytes()).toEqual(Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]));
        });
    });

    describe('lookup', () => {
        it('should return undefined for an absent type', () => {
            expect(Png.fromBytes(pngBytes()).chunkByType('ruSt')).toBeUndefined();
        });

        it('should find the first and all chunks of a type', () => {
            const png = Png.fromChunks([makeChunk('ruSt', 'first'), makeChunk('IEND'), makeChunk('ruSt', 'second')]);
            expect(png.chunkByType('ruSt')?.dataAsString()).toBe('first');
            expect(png.chunksByType('ruSt').map((chunk) => chunk.dataAsString())).toEqual(['first', 'second']);
            expect(png.chunksByType('tEXt')).toEqual([]);
        });

        it('should look up a reserved-bit type without complaint', () => {
            expect(Png.fromBytes(pngBytes()).chunkByType('Rust')).toBeUndefined();
        });

        it('should reject a lookup code with a non-letter byte', () => {
            expect(() => Png.fromBytes(pngBytes()).chunkByType('Ru1t')).toThrow(InvalidChunkTypeError);
        });

        it('should accept raw type bytes', () => {
            const png = Png.fromBytes(pngBytes());
            expect(png.chunkByType(new TextEncoder().encode('IHDR'))?.length).toBe(13);
        });
    });

    describe('mutation', () => {
        it('should append at the end', () => {
            const png = Png.fromBytes(pngBytes());
            png.appendChunk(makeChunk('ruSt', 'hi'));
            expect(typesOf(png)).toEqual(['IHDR', 'IDAT', 'IEND', 'ruSt']);
        });

        it('should insert at a given position', () => {
            const png = Png.fromBytes(pngBytes());
            png.insertChunk(makeChunk('ruSt', 'hi'), 0);
            png.insertChunk(makeChunk('teSt', 'hi'), 4);
            expect(typesOf(png)).toEqual(['ruSt', 'IHDR', 'IDAT', 'IEND', 'teSt']);
        });

        it('should reject positions outside the sequence', () => {
            const png = Png.fromBytes(pngBytes());
            expect(() => png.insertChunk(makeChunk('ruSt'), 4)).toThrow(RangeError);
            expect(() => png.insertChunk(makeChunk('ruSt'), -1)).toThrow(RangeError);
            expect(() => png.insertChunk(makeChunk('ruSt'), 1.5)).toThrow(RangeError);
        });

        it('should remove only the first chunk of a type', () => {
            const png = Png.fromChunks([makeChunk('ruSt', 'first'), makeChunk('IEND'), makeChunk('ruSt', 'second')]);
            const removed = png.removeFirstChunk('ruSt');
            expect(removed.dataAsString()).toBe('first');
            expect(typesOf(png)).toEqual(['IEND', 'ruSt']);
        });

        it('should fail to remove an absent type', () => {
            const png = Png.fromBytes(pngBytes());
            expect(() => png.removeFirstChunk('ruSt')).toThrow(ChunkNotFoundError);
            expect(png.size).toBe(3);
        });

        it('should hand out a copy of its chunk list', () => {
            const png = Png.fromBytes(pngBytes());
            png.chunks().pop();
            expect(png.size).toBe(3);
        });
    });

    describe('chunkTypes', () => {
        it('should restart on every call and follow the current chunks', () => {
            const png = Png.fromBytes(pngBytes());
            expect(typesOf(png)).toEqual(['IHDR', 'IDAT', 'IEND']);
            expect(typesOf(png)).toEqual(['IHDR', 'IDAT', 'IEND']);
            png.removeFirstChunk('IDAT');
            expect(typesOf(png)).toEqual(['IHDR', 'IEND']);
        });
    });

    describe('toString', () => {
        it('should list one line per chunk', () => {
            const lines = Png.fromBytes(pngBytes()).toString().split('\n');
            expect(lines).toHaveLength(4);
            expect(lines[0]).toBe('PNG with 3 chunk(s)');
            expect(lines[3]).toBe('  [2] Chunk IEND length=0 crc=0xae426082');
        });
    });
});
