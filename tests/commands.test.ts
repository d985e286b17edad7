// tests/commands.test.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { decode } from '../src/core/decoder/index.ts';
import { encode } from '../src/core/encoder/index.ts';
import { print } from '../src/core/inspector/index.ts';
import { remove } from '../src/core/remover/index.ts';
import { ChunkNotFoundError, DuplicateChunkError, InvalidChunkTypeError } from '../src/core/errors.ts';
import { readBufferFromFile } from '../src/utils/storage/storageUtils.ts';
import { MockLogger } from './helpers/mockLogger.ts';
import { pngBytes } from './helpers/pngFixtures.ts';

describe('Commands', () => {
    let workDir: string;
    let inputFile: string;

    beforeEach(() => {
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chunk-veil-'));
        inputFile = path.join(workDir, 'image.png');
        fs.writeFileSync(inputFile, pngBytes());
    });

    afterEach(() => {
        fs.rmSync(workDir, { recursive: true, force: true });
    });

    it('should encode, decode, print and remove a message in place', async () => {
        const logger = new MockLogger();

        const chunk = await encode({ inputFile, chunkType: 'ruSt', message: 'secret', verbose: false, logger });
        expect(chunk.toString()).toBe(`Chunk ruSt length=6 crc=0x${chunk.crc.toString(16).padStart(8, '0')}`);
        expect(logger.successMessages).toEqual([`Message hidden in a "ruSt" chunk of "${inputFile}".`]);

        expect(await decode({ inputFile, chunkType: 'ruSt', verbose: false, logger })).toBe('secret');

        const listing = await print({ inputFile, verbose: false, logger });
        expect(listing.split('\n')[3]).toBe(`  [2] ${chunk}`);

        const removed = await remove({ inputFile, chunkType: 'ruSt', verbose: false, logger });
        expect(removed.dataAsString()).toBe('secret');
        expect(readBufferFromFile(inputFile)).toEqual(pngBytes());
    });

    it('should write to a separate output file when asked', async () => {
        const outputFile = path.join(workDir, 'out', 'encoded.png');
        await encode({
            inputFile,
            outputFile,
            chunkType: 'ruSt',
            message: 'elsewhere',
            placement: 'end',
            verbose: false,
            logger: new MockLogger(),
        });

        expect(readBufferFromFile(inputFile)).toEqual(pngBytes());
        expect(await decode({ inputFile: outputFile, chunkType: 'ruSt', verbose: false, logger: new MockLogger() })).toBe(
            'elsewhere',
        );
    });

    it('should log state transitions in verbose mode', async () => {
        const logger = new MockLogger(true);
        await encode({ inputFile, chunkType: 'ruSt', message: 'x', verbose: true, logger });
        expect(logger.debugMessages).toContain('STATE :: Transitioning from state "INIT" -> "READ_INPUT"');
        expect(logger.debugMessages).toContain('STATE :: Transitioning from state "WRITE_OUTPUT" -> "COMPLETED"');
    });

    it('should reject a reserved-bit type before touching the file', async () => {
        const logger = new MockLogger();
        await expect(encode({ inputFile, chunkType: 'Rust', message: 'x', verbose: false, logger })).rejects.toThrow(
            InvalidChunkTypeError,
        );
        expect(logger.errorMessages).toEqual([
            'Error occurred during "INIT": Invalid chunk type: "Rust" sets the reserved bit (third letter must be uppercase)',
        ]);
        expect(readBufferFromFile(inputFile)).toEqual(pngBytes());
    });

    it('should refuse a duplicate type when uniqueness is requested', async () => {
        const logger = new MockLogger();
        await encode({ inputFile, chunkType: 'ruSt', message: 'one', verbose: false, logger });
        await expect(
            encode({ inputFile, chunkType: 'ruSt', message: 'two', uniqueType: true, verbose: false, logger }),
        ).rejects.toThrow(DuplicateChunkError);
        expect(await decode({ inputFile, chunkType: 'ruSt', verbose: false, logger })).toBe('one');
    });

    it('should fail on a missing input file', async () => {
        const missing = path.join(workDir, 'missing.png');
        await expect(
            encode({ inputFile: missing, chunkType: 'ruSt', message: 'x', verbose: false, logger: new MockLogger() }),
        ).rejects.toThrow(`Input file "${missing}" does not exist.`);
    });

    it('should warn and return undefined when decoding an absent type', async () => {
        const logger = new MockLogger();
        expect(await decode({ inputFile, chunkType: 'ruSt', verbose: false, logger })).toBeUndefined();
        expect(logger.warnMessages).toEqual([`No "ruSt" chunk found in "${inputFile}".`]);
    });

    it('should report what decode and print read only in verbose mode', async () => {
        const quiet = new MockLogger();
        await decode({ inputFile, chunkType: 'ruSt', verbose: false, logger: quiet });
        await print({ inputFile, verbose: false, logger: quiet });
        expect(quiet.infoMessages).toEqual([]);

        const loud = new MockLogger(true);
        await decode({ inputFile, chunkType: 'ruSt', verbose: true, logger: loud });
        await print({ inputFile, verbose: true, logger: loud });
        expect(loud.infoMessages).toEqual([
            `Looking for a "ruSt" chunk in "${inputFile}"...`,
            `Listing chunks of "${inputFile}"...`,
        ]);
    });

    it('should leave the file alone when removing an absent type', async () => {
        const logger = new MockLogger();
        await expect(remove({ inputFile, chunkType: 'ruSt', verbose: false, logger })).rejects.toThrow(ChunkNotFoundError);
        expect(logger.errorMessages).toEqual(['Error occurred during "REMOVE_CHUNK": No chunk of type "ruSt" found.']);
        expect(readBufferFromFile(inputFile)).toEqual(pngBytes());
    });
});
