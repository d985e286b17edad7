// src/core/remover/stateMachine.ts

import type { IRemoveOptions } from '../../@types/index.ts';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { RemoverStates } from '../../stateMachine/definedStates.ts';
import { readBufferFromFile, writeBufferToFile } from '../../utils/storage/storageUtils.ts';
import { type Chunk, Png } from '../png/index.ts';

export class RemoveStateMachine extends AbstractStateMachine<RemoverStates, IRemoveOptions> {
    private inputData: Uint8Array | null = null;
    private png: Png | null = null;
    private removedChunk: Chunk | null = null;

    constructor(options: IRemoveOptions) {
        super(RemoverStates.INIT, options);
        this.stateTransitions = [
            { state: RemoverStates.INIT, handler: this.init },
            { state: RemoverStates.READ_INPUT, handler: this.readInput },
            { state: RemoverStates.PARSE_PNG, handler: this.parsePng },
            { state: RemoverStates.REMOVE_CHUNK, handler: this.removeChunk },
            { state: RemoverStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    get removed(): Chunk | null {
        return this.removedChunk;
    }

    protected getCompletionState(): RemoverStates {
        return RemoverStates.COMPLETED;
    }

    protected getErrorState(): RemoverStates {
        return RemoverStates.ERROR;
    }

    private init(): void {
        const { chunkType, logger, verbose } = this.options;
        if (verbose) logger.info(`Initializing removal of the first "${chunkType}" chunk...`);
    }

    private readInput(): void {
        const { inputFile } = this.options;
        this.inputData = readBufferFromFile(inputFile);
    }

    private parsePng(): void {
        this.png = Png.fromBytes(this.require(this.inputData, 'Input data'));
    }

    private removeChunk(): void {
        const { chunkType, logger } = this.options;
        this.removedChunk = this.require(this.png, 'Parsed PNG').removeFirstChunk(chunkType);
        logger.debug(`Removed ${this.removedChunk}.`);
    }

    /** The PNG is rewritten in place. */
    private writeOutput(): void {
        const { inputFile, chunkType, logger } = this.options;
        writeBufferToFile(inputFile, this.require(this.png, 'Parsed PNG').toBytes());
        logger.success(`Removed "${chunkType}" chunk from "${inputFile}".`);
    }
}
