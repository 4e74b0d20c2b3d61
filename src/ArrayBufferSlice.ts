// A read-only window over an ArrayBuffer.
//
// ArrayBuffer.prototype.slice copies, which is almost never what a decoder wants. ArrayBufferSlice
// hands out sub-windows that share the same storage.

import { assert } from "./util";

export default class ArrayBufferSlice {
    constructor(
        // Named arrayBuffer so that an ArrayBufferSlice can't be mistaken for an ArrayBuffer or an
        // ArrayBufferView by structural typing.
        public readonly arrayBuffer: ArrayBuffer,
        public readonly byteOffset: number = 0,
        public readonly byteLength: number = arrayBuffer.byteLength - byteOffset
    ) {
        assert(byteOffset >= 0 && byteLength >= 0 && (byteOffset + byteLength) <= this.arrayBuffer.byteLength);
    }

    public static fromUint8Array(array: Uint8Array): ArrayBufferSlice {
        if (array.buffer instanceof ArrayBuffer)
            return new ArrayBufferSlice(array.buffer, array.byteOffset, array.byteLength);
        // SharedArrayBuffer-backed views get copied out.
        const copy = new ArrayBuffer(array.byteLength);
        new Uint8Array(copy).set(array);
        return new ArrayBufferSlice(copy);
    }

    /**
     * Return a sub-section of the buffer starting at byte offset {@param begin} and spanning
     * {@param byteLength} bytes, or the rest of this slice if no length is given. The sub-section
     * shares storage with this slice.
     */
    public subarray(begin: number, byteLength?: number): ArrayBufferSlice {
        const absBegin = this.byteOffset + begin;
        if (byteLength === undefined)
            byteLength = this.byteLength - begin;
        assert(begin >= 0 && byteLength >= 0 && begin + byteLength <= this.byteLength);
        return new ArrayBufferSlice(this.arrayBuffer, absBegin, byteLength);
    }

    public createDataView(): DataView {
        return new DataView(this.arrayBuffer, this.byteOffset, this.byteLength);
    }

    public createUint8Array(offs: number = 0, length?: number): Uint8Array {
        if (length === undefined)
            length = this.byteLength - offs;
        return new Uint8Array(this.arrayBuffer, this.byteOffset + offs, length);
    }
}
