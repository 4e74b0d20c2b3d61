
// Color utilities

export interface Color {
    r: number;
    g: number;
    b: number;
    a: number;
}

export function colorNewFromRGBA(r: number, g: number, b: number, a: number = 1.0): Color {
    return { r, g, b, a };
}

// Byte-per-channel colors are normalized to [0, 1].
export function colorNewFromRGBA8Bytes(r: number, g: number, b: number, a: number = 0xFF): Color {
    return colorNewFromRGBA(r / 0xFF, g / 0xFF, b / 0xFF, a / 0xFF);
}
