export { default as ArrayBufferSlice } from "./ArrayBufferSlice";
export type { Color } from "./Color";
export { AABB } from "./Geometry";
export { DataStream } from "./LevelArchive/stream";
export { ShortReadError, UnrecognizedChunkTypeError, InvalidLengthError } from "./LevelArchive/errors";
export { ChunkType, isChunkType, getChunkTypeName, readChunkHeader, readChunk, readChunks, decodeChunk, hasChunkDecoder, CHUNK_HEADER_SIZE } from "./LevelArchive/chunk";
export type { ChunkHeader, Chunk, ChunkDecoder, ChunkRecord } from "./LevelArchive/chunk";
export { readMaterial, readMaterialList, serializeMaterialAttributes, computeStructuralHash, getMaterialHash, MATERIAL_SLOT_COUNT, MATERIAL_ATTRIBUTES_BYTE_SIZE } from "./LevelArchive/material";
export type { Material, MaterialAttributes, MaterialTexture, BlendModes, AlphaTestMode } from "./LevelArchive/material";
export { readModelPart, readVertex, VertexFlags, getUVCount } from "./LevelArchive/modelpart";
export type { ModelPart, Vertex } from "./LevelArchive/modelpart";
export { readWorld, readFloor } from "./LevelArchive/world";
export type { World, Floor } from "./LevelArchive/world";
