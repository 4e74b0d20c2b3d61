import { hexzero0x } from "../util";

// Fewer bytes remain than a read requires. Fatal for the chunk being decoded.
export class ShortReadError extends Error {
    constructor(public readonly offset: number, public readonly needed: number, public readonly available: number) {
        super(`Short read at ${hexzero0x(offset)}: needed ${needed} bytes, ${available} available`);
        this.name = 'ShortReadError';
    }
}

export class UnrecognizedChunkTypeError extends Error {
    constructor(public readonly typeCode: number, public readonly offset: number) {
        super(`Unrecognized chunk type ${typeCode} at ${hexzero0x(offset)}`);
        this.name = 'UnrecognizedChunkTypeError';
    }
}

// A declared length or count was negative where the layout requires it not to be.
export class InvalidLengthError extends Error {
    constructor(public readonly what: string, public readonly length: number, public readonly offset: number) {
        super(`Invalid ${what} ${length} at ${hexzero0x(offset)}`);
        this.name = 'InvalidLengthError';
    }
}
