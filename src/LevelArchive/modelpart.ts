import type { vec2, vec3 } from "gl-matrix";
import type { Color } from "../Color";
import { DataStream } from "./stream";

// Bits of ModelPart.flags selecting which vertex attributes are stored. The low byte is
// the number of UV pairs per vertex.
export const VertexFlags = {
    HAS_POSITION: 1 << 8,
    HAS_NORMAL: 1 << 9,
    HAS_RECIPROCAL_HOMOGENEOUS_W: 1 << 10,
    HAS_DIFFUSE: 1 << 11,
    HAS_WEIGHT: 1 << 12,
    HAS_INDICES: 1 << 13,
    UV_COUNT_MASK: 0xFF,
} as const;

export function getUVCount(flags: number): number {
    return flags & VertexFlags.UV_COUNT_MASK;
}

// Absent attributes are null, never zero.
export interface Vertex {
    position: vec3 | null;
    normal: vec3 | null;
    reciprocalHomogeneousW: number | null;
    diffuse: Color | null;
    weight: number | null;
    indices: [number, number] | null;
    uvs: vec2[];
}

export interface ModelPart {
    readAccessFlags: number;
    vertexReadFlags: number;
    writeAccessFlags: number;
    vertexWriteFlags: number;
    hintFlags: number;
    constantFlags: number;
    vertexFlags: number;
    renderFlags: number;
    trianglesCount: number;
    stripsCount: number;
    stripTrianglesCount: number;
    materialHash: number;
    triangleIndex0: number;
    triangleIndex1: number;
    vertexIndex0: number;
    vertexIndex1: number;
    layerZ: number;
    floorFlags: number;
    flags: number;
    lightingId: number;
    vertices: Vertex[];
}

function hasFlag(flags: number, bit: number): boolean {
    return (flags & bit) !== 0;
}

export function readVertex(data: DataStream, flags: number): Vertex {
    const position = hasFlag(flags, VertexFlags.HAS_POSITION) ? data.readVec3() : null;
    const normal = hasFlag(flags, VertexFlags.HAS_NORMAL) ? data.readVec3() : null;
    const reciprocalHomogeneousW = hasFlag(flags, VertexFlags.HAS_RECIPROCAL_HOMOGENEOUS_W) ? data.readUint32() : null;
    const diffuse = hasFlag(flags, VertexFlags.HAS_DIFFUSE) ? data.readRGBA8() : null;
    const weight = hasFlag(flags, VertexFlags.HAS_WEIGHT) ? data.readFloat32() : null;

    let indices: [number, number] | null = null;
    if (hasFlag(flags, VertexFlags.HAS_INDICES)) {
        const index0 = data.readUint16();
        const index1 = data.readUint16();
        indices = [index0, index1];
    }

    const uvs = data.readArrayStatic((s) => s.readVec2(), getUVCount(flags));
    return { position, normal, reciprocalHomogeneousW, diffuse, weight, indices, uvs };
}

export function readModelPart(data: DataStream): ModelPart {
    const readAccessFlags = data.readUint32();
    const vertexReadFlags = data.readUint32();
    const writeAccessFlags = data.readUint32();
    const vertexWriteFlags = data.readUint32();
    const hintFlags = data.readUint32();
    const constantFlags = data.readUint32();
    const vertexFlags = data.readUint32();
    const renderFlags = data.readUint32();
    const vertexCount = data.readUint32();
    const trianglesCount = data.readUint16();
    const stripsCount = data.readUint16();
    const stripTrianglesCount = data.readUint16();
    const materialHash = data.readUint32();
    const triangleIndex0 = data.readInt32();
    const triangleIndex1 = data.readInt32();
    const vertexIndex0 = data.readInt32();
    const vertexIndex1 = data.readInt32();
    const layerZ = data.readUint32();
    const floorFlags = data.readUint32();
    const flags = data.readUint32();
    const lightingId = data.readUint32();

    // The layout comes from the part's flags, not vertexFlags, and is the same for every vertex.
    const vertices = data.readArrayStatic((s) => readVertex(s, flags), vertexCount);

    return {
        readAccessFlags,
        vertexReadFlags,
        writeAccessFlags,
        vertexWriteFlags,
        hintFlags,
        constantFlags,
        vertexFlags,
        renderFlags,
        trianglesCount,
        stripsCount,
        stripTrianglesCount,
        materialHash,
        triangleIndex0,
        triangleIndex1,
        vertexIndex0,
        vertexIndex1,
        layerZ,
        floorFlags,
        flags,
        lightingId,
        vertices,
    };
}
