// src/core/encoder/stateMachine.ts

import path from 'node:path';
import type { IEncodeOptions } from '../../@types/index.ts';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { EncoderStates } from '../../stateMachine/definedStates.ts';
import { filePathExists, readBufferFromFile, writeBufferToFile } from '../../utils/storage/storageUtils.ts';
import { Chunk, ChunkType, Png, placeChunk } from '../png/index.ts';

export class EncodeStateMachine extends AbstractStateMachine<EncoderStates, IEncodeOptions> {
    private inputData: Uint8Array | null = null;
    private png: Png | null = null;
    private embeddedChunk: Chunk | null = null;

    constructor(options: IEncodeOptions) {
        super(EncoderStates.INIT, options);
        this.stateTransitions = [
            { state: EncoderStates.INIT, handler: this.init },
            { state: EncoderStates.READ_INPUT, handler: this.readInput },
            { state: EncoderStates.PARSE_PNG, handler: this.parsePng },
            { state: EncoderStates.EMBED_CHUNK, handler: this.embedChunk },
            { state: EncoderStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    get chunk(): Chunk | null {
        return this.embeddedChunk;
    }

    protected getCompletionState(): EncoderStates {
        return EncoderStates.COMPLETED;
    }

    protected getErrorState(): EncoderStates {
        return EncoderStates.ERROR;
    }

    /**
     * Validates the chunk type up front so nothing is read for a type that can never be written.
     */
    private init(): void {
        const { chunkType, logger, verbose } = this.options;
        ChunkType.parseStrict(chunkType);
        if (verbose) logger.info(`Initializing encoding of a "${chunkType}" chunk...`);
    }

    private readInput(): void {
        const { inputFile, logger } = this.options;
        if (!filePathExists(inputFile)) {
            throw new Error(`Input file "${inputFile}" does not exist.`);
        }
        this.inputData = readBufferFromFile(inputFile);
        logger.debug(`Read ${this.inputData.length} bytes from "${inputFile}".`);
    }

    private parsePng(): void {
        const { logger } = this.options;
        this.png = Png.fromBytes(this.require(this.inputData, 'Input data'));
        logger.debug(`Parsed ${this.png.size} chunk(s).`);
    }

    private embedChunk(): void {
        const { chunkType, message, placement, uniqueType, logger } = this.options;
        const png = this.require(this.png, 'Parsed PNG');
        const chunk = new Chunk(ChunkType.parseStrict(chunkType), new TextEncoder().encode(message));
        const position = placeChunk(png, chunk, { placement, uniqueType });
        this.embeddedChunk = chunk;
        logger.debug(`Inserted ${chunk} at position ${position}.`);
    }

    private writeOutput(): void {
        const { inputFile, outputFile, logger } = this.options;
        const target = outputFile ?? inputFile;
        if (path.resolve(target) !== path.resolve(inputFile) && filePathExists(target)) {
            logger.warn(`Overwriting existing file "${target}".`);
        }
        writeBufferToFile(target, this.require(this.png, 'Parsed PNG').toBytes());
        logger.success(`Message hidden in a "${this.options.chunkType}" chunk of "${target}".`);
    }
}
