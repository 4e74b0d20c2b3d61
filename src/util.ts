
export function assert(b: boolean, message: string = ""): asserts b {
    if (!b) {
        console.error(new Error().stack);
        throw new Error(`Assert fail: ${message}`);
    }
}

export function nArray<T>(n: number, c: (i: number) => T): T[] {
    const d = new Array<T>(n);
    for (let i = 0; i < n; i++)
        d[i] = c(i);
    return d;
}

export function hexzero(n: number, spaces: number): string {
    const S = (n >>> 0).toString(16);
    return S.padStart(spaces, '0');
}

export function hexzero0x(n: number, spaces: number = 8): string {
    if (n < 0)
        return `-0x${hexzero(-n, spaces)}`;
    else
        return `0x${hexzero(n, spaces)}`;
}
