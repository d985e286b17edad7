// src/stateMachine/definedStates.ts

export enum EncoderStates {
    INIT = 'INIT',
    READ_INPUT = 'READ_INPUT',
    PARSE_PNG = 'PARSE_PNG',
    EMBED_CHUNK = 'EMBED_CHUNK',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}

export enum RemoverStates {
    INIT = 'INIT',
    READ_INPUT = 'READ_INPUT',
    PARSE_PNG = 'PARSE_PNG',
    REMOVE_CHUNK = 'REMOVE_CHUNK',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
