import type { mat4, vec2, vec3 } from "gl-matrix";
import ArrayBufferSlice from "../ArrayBufferSlice";
import { colorNewFromRGBA, colorNewFromRGBA8Bytes, type Color } from "../Color";
import { AABB } from "../Geometry";
import { InvalidLengthError, ShortReadError } from "./errors";

// Forward-only little-endian cursor. Every read checks the remaining length first and
// throws ShortReadError instead of letting DataView raise a RangeError.
export class DataStream {
    public view: DataView;

    constructor(
        public buffer: ArrayBufferSlice,
        public offs: number = 0,
    ) {
        this.view = buffer.createDataView();
    }

    public get remaining(): number {
        return this.buffer.byteLength - this.offs;
    }

    public isAtEnd(): boolean {
        return this.offs >= this.buffer.byteLength;
    }

    private ensure(size: number): void {
        if (this.remaining < size)
            throw new ShortReadError(this.offs, size, Math.max(this.remaining, 0));
    }

    public readInt8(): number {
        this.ensure(0x01);
        return this.view.getInt8(this.offs++);
    }

    public readUint8(): number {
        this.ensure(0x01);
        return this.view.getUint8(this.offs++);
    }

    public readInt16(): number {
        this.ensure(0x02);
        const v = this.view.getInt16(this.offs, true);
        this.offs += 0x02;
        return v;
    }

    public readUint16(): number {
        this.ensure(0x02);
        const v = this.view.getUint16(this.offs, true);
        this.offs += 0x02;
        return v;
    }

    public readInt32(): number {
        this.ensure(0x04);
        const v = this.view.getInt32(this.offs, true);
        this.offs += 0x04;
        return v;
    }

    public readUint32(): number {
        this.ensure(0x04);
        const v = this.view.getUint32(this.offs, true);
        this.offs += 0x04;
        return v;
    }

    public readFloat32(): number {
        this.ensure(0x04);
        const v = this.view.getFloat32(this.offs, true);
        this.offs += 0x04;
        return v;
    }

    // Booleans are stored as full 32-bit integers; anything nonzero is true.
    public readBool32(): boolean {
        return this.readInt32() !== 0;
    }

    public readVec2(): vec2 {
        return this.readFloat32Array(2);
    }

    public readVec3(): vec3 {
        return this.readFloat32Array(3);
    }

    public readMat4(): mat4 {
        return this.readFloat32Array(16);
    }

    public readRGBA(): Color {
        const r = this.readFloat32();
        const g = this.readFloat32();
        const b = this.readFloat32();
        const a = this.readFloat32();
        return colorNewFromRGBA(r, g, b, a);
    }

    public readRGBA8(): Color {
        const r = this.readUint8();
        const g = this.readUint8();
        const b = this.readUint8();
        const a = this.readUint8();
        return colorNewFromRGBA8Bytes(r, g, b, a);
    }

    public readRGB8(): Color {
        const r = this.readUint8();
        const g = this.readUint8();
        const b = this.readUint8();
        return colorNewFromRGBA8Bytes(r, g, b);
    }

    public readAABB(): AABB {
        const min = this.readVec3();
        const max = this.readVec3();
        return AABB.fromExtrema(min, max);
    }

    public readArrayStatic<T>(func: (stream: DataStream) => T, num: number): T[] {
        const ret: T[] = [];
        for (let i = 0; i < num; i++) {
            ret.push(func(this));
        }
        return ret;
    }

    private readFloat32Array(num: number): Float32Array {
        return new Float32Array(this.readArrayStatic((s) => s.readFloat32(), num));
    }

    public readSlice(size: number): ArrayBufferSlice {
        if (size < 0)
            throw new InvalidLengthError('slice size', size, this.offs);
        this.ensure(size);
        const v = this.buffer.subarray(this.offs, size);
        this.offs += size;
        return v;
    }
}
