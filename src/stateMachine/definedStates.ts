// src/stateMachine/definedStates.ts

export enum ConverterStates {
    INIT = 'INIT',
    LOAD_IMAGE = 'LOAD_IMAGE',
    VALIDATE_DIMENSIONS = 'VALIDATE_DIMENSIONS',
    QUANTIZE_PIXELS = 'QUANTIZE_PIXELS',
    SERIALIZE_MODULE = 'SERIALIZE_MODULE',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    VERIFY_OUTPUT = 'VERIFY_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
