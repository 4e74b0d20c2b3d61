import ArrayBufferSlice from "../ArrayBufferSlice";
import { InvalidLengthError, UnrecognizedChunkTypeError } from "./errors";
import { readMaterial, readMaterialList, type Material } from "./material";
import { readModelPart, type ModelPart } from "./modelpart";
import { DataStream } from "./stream";
import { readWorld, type World } from "./world";

export enum ChunkType {
    Textures = 20002,
    Materials = 1010,
    MaterialObj = 5,
    World = 1012,
    AnimLib = 1017,
    Entities = 20000,
    Entity = 20001,
    SpLights = 1029,
    Zones = 1023,
    NavigationMesh = 1021,
    WpPoints = 1020,
    SectorOctree = 1011,
    Occlusion = 1019,
    Area = 1024,
    SkinObj = 1005,
    BoneObj = 1001,
    OcclusionMesh = 1018,
    ModelGroup = 1000,
    SPMesh = 1002,
    Collision = 1003,
    AtomicMesh = 1004,
    GLCamera = 1006,
    GLProject = 1,
    LightObj = 1007,
    LinkEmm = 1026,
    LevelObj = 1009,
}

const knownChunkTypes = new Set<number>(Object.values(ChunkType).filter((v): v is ChunkType => typeof v === 'number'));

export function isChunkType(typeCode: number): typeCode is ChunkType {
    return knownChunkTypes.has(typeCode);
}

export function getChunkTypeName(type: ChunkType): string {
    return ChunkType[type];
}

export interface ChunkHeader {
    type: ChunkType;
    size: number;
    version: number;
}

export const CHUNK_HEADER_SIZE = 0x0C;

// Size and version are not interpreted here. An unknown type is fatal: its size can't be
// trusted to find the next chunk.
export function readChunkHeader(data: DataStream): ChunkHeader {
    const offs = data.offs;
    const typeCode = data.readInt32();
    const size = data.readInt32();
    const version = data.readInt32();
    if (!isChunkType(typeCode))
        throw new UnrecognizedChunkTypeError(typeCode, offs);
    return { type: typeCode, size, version };
}

export interface Chunk {
    header: ChunkHeader;
    data: ArrayBufferSlice;
}

export function readChunk(data: DataStream): Chunk {
    const header = readChunkHeader(data);
    if (header.size < 0)
        throw new InvalidLengthError('chunk size', header.size, data.offs - 0x08);
    return { header, data: data.readSlice(header.size) };
}

export function readChunks(buffer: ArrayBufferSlice): Chunk[] {
    const data = new DataStream(buffer);
    const chunks: Chunk[] = [];
    while (!data.isAtEnd())
        chunks.push(readChunk(data));
    return chunks;
}

/**
 * Decodes one record from a chunk payload positioned at its start. Decoders throw
 * ShortReadError, InvalidLengthError or their own format errors; they never return a
 * partially built record.
 */
export type ChunkDecoder<T> = (data: DataStream, header: ChunkHeader) => T;

export type ChunkRecord =
    | { type: ChunkType.Materials, materials: Material[] }
    | { type: ChunkType.MaterialObj, material: Material }
    | { type: ChunkType.World, world: World }
    | { type: ChunkType.SPMesh, modelPart: ModelPart };

const decodeMaterials: ChunkDecoder<ChunkRecord> = (data) => ({ type: ChunkType.Materials, materials: readMaterialList(data) });
const decodeMaterialObj: ChunkDecoder<ChunkRecord> = (data) => ({ type: ChunkType.MaterialObj, material: readMaterial(data) });
const decodeWorld: ChunkDecoder<ChunkRecord> = (data) => ({ type: ChunkType.World, world: readWorld(data) });
const decodeSPMesh: ChunkDecoder<ChunkRecord> = (data) => ({ type: ChunkType.SPMesh, modelPart: readModelPart(data) });

const chunkDecoders = new Map<ChunkType, ChunkDecoder<ChunkRecord>>([
    [ChunkType.Materials, decodeMaterials],
    [ChunkType.MaterialObj, decodeMaterialObj],
    [ChunkType.World, decodeWorld],
    [ChunkType.SPMesh, decodeSPMesh],
]);

export function hasChunkDecoder(type: ChunkType): boolean {
    return chunkDecoders.has(type);
}

// Returns null for chunk kinds whose records are decoded elsewhere (textures, meshes,
// occlusion, sector octrees...).
export function decodeChunk(chunk: Chunk): ChunkRecord | null {
    const decoder = chunkDecoders.get(chunk.header.type);
    if (decoder === undefined)
        return null;

    const data = new DataStream(chunk.data);
    const record = decoder(data, chunk.header);
    if (!data.isAtEnd())
        console.warn(`${getChunkTypeName(chunk.header.type)} chunk left ${data.remaining} of ${chunk.header.size} bytes unread`);
    return record;
}
