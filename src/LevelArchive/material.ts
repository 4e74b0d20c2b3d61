import * as CRC32 from "crc-32";
import type { mat4 } from "gl-matrix";
import type { Color } from "../Color";
import { assert, nArray } from "../util";
import { InvalidLengthError } from "./errors";
import { DataStream } from "./stream";

export const MATERIAL_SLOT_COUNT = 5;

export interface BlendModes {
    sourceMode: number;
    destinationMode: number;
}

export interface AlphaTestMode {
    comparisonFunction: number;
    reference: number;
}

export interface MaterialAttributes {
    flags: number;
    additiveLightingModel: boolean;
    colour: Color;
    specular: Color;
    power: number;
    shadingMode: number;
    depthBufferWrite: boolean;
    depthBufferComparisonMode: number;
    blend: boolean;
    blendModes: BlendModes;
    alphaTest: boolean;
    alphaTestMode: AlphaTestMode;
    owner: number;
    colourBufferWrite: number;
    useMatrices: boolean[];
    generators: number[];
    uvSets: number[];
    textureHashes: number[];
    envmapType: number;
    planarSheerEnvmapDistance: number;
}

export interface MaterialTexture {
    uvSet: number;
    name: string;
    format: number;
    // Decoded to keep the stream in sync; nothing downstream samples with it.
    filterMode: number;
    addressMode: number;
    maskName: string;
    borderColour: Color;
    hash: number;
}

export interface Material {
    // Assigned by the archive, unrelated to the content hash of the attributes.
    materialHash: number;
    attributes: MaterialAttributes;
    textures: (MaterialTexture | null)[];
    uvTransforms: (mat4 | null)[];
}

// Names are stored one 32-bit code point per character; only the low byte is kept.
function readWideName(data: DataStream, length: number): string {
    let S = '';
    for (let i = 0; i < length; i++)
        S += String.fromCharCode(data.readInt32() & 0xFF);
    return S;
}

function readBlendModes(data: DataStream): BlendModes {
    const sourceMode = data.readInt32();
    const destinationMode = data.readInt32();
    return { sourceMode, destinationMode };
}

function readAlphaTestMode(data: DataStream): AlphaTestMode {
    const comparisonFunction = data.readInt32();
    const reference = data.readFloat32();
    return { comparisonFunction, reference };
}

function readMaterialTexture(data: DataStream, uvSet: number, nameLength: number): MaterialTexture {
    const name = readWideName(data, nameLength);
    const format = data.readInt32();
    const filterMode = data.readInt32();
    const addressMode = data.readInt32();

    const maskNameOffs = data.offs;
    const maskNameLength = data.readInt32();
    if (maskNameLength < 0)
        throw new InvalidLengthError('mask name length', maskNameLength, maskNameOffs);
    const maskName = readWideName(data, maskNameLength);

    const borderColour = data.readRGBA();
    const hash = data.readUint32();
    return { uvSet, name, format, filterMode, addressMode, maskName, borderColour, hash };
}

export function readMaterial(data: DataStream): Material {
    const flags = data.readUint32();
    data.readUint32(); // name hash, unused
    const additiveLightingModel = data.readBool32();
    const colour = data.readRGBA();
    const specular = data.readRGBA();
    const power = data.readFloat32();
    const shadingMode = data.readInt32();
    const blend = data.readBool32();
    const blendModes = readBlendModes(data);
    const alphaTest = data.readBool32();
    const alphaTestMode = readAlphaTestMode(data);
    const depthBufferWrite = data.readBool32();
    const depthBufferComparisonMode = data.readInt32();
    const materialHash = data.readUint32();
    const owner = data.readUint32();
    const colourBufferWrite = data.readUint32();

    const uvSets = nArray(MATERIAL_SLOT_COUNT, () => 0);
    const textureHashes = nArray(MATERIAL_SLOT_COUNT, () => 0);
    const textures: (MaterialTexture | null)[] = nArray(MATERIAL_SLOT_COUNT, () => null);
    for (let i = 0; i < MATERIAL_SLOT_COUNT; i++) {
        const uvSet = data.readUint32();
        uvSets[i] = uvSet;

        // A non-positive name length marks an empty slot.
        const nameLength = data.readInt32();
        if (nameLength <= 0)
            continue;

        const texture = readMaterialTexture(data, uvSet, nameLength);
        textureHashes[i] = texture.hash;
        textures[i] = texture;
    }

    const useMatrices = nArray(MATERIAL_SLOT_COUNT, () => false);
    const uvTransforms: (mat4 | null)[] = nArray(MATERIAL_SLOT_COUNT, () => null);
    for (let i = 0; i < MATERIAL_SLOT_COUNT; i++) {
        useMatrices[i] = data.readBool32();
        if (useMatrices[i])
            uvTransforms[i] = data.readMat4();
    }

    const generators = data.readArrayStatic((s) => s.readInt32(), MATERIAL_SLOT_COUNT);

    const envmapType = data.readInt32();
    const planarSheerEnvmapDistance = data.readFloat32();

    const attributes: MaterialAttributes = {
        flags,
        additiveLightingModel,
        colour,
        specular,
        power,
        shadingMode,
        depthBufferWrite,
        depthBufferComparisonMode,
        blend,
        blendModes,
        alphaTest,
        alphaTestMode,
        owner,
        colourBufferWrite,
        useMatrices,
        generators,
        uvSets,
        textureHashes,
        envmapType,
        planarSheerEnvmapDistance,
    };

    return { materialHash, attributes, textures, uvTransforms };
}

// Materials packed back to back, filling the rest of the stream.
export function readMaterialList(data: DataStream): Material[] {
    const materials: Material[] = [];
    while (!data.isAtEnd())
        materials.push(readMaterial(data));
    return materials;
}

/**
 * Size of the packed attribute record: booleans take one byte, everything else four,
 * with no padding between fields.
 */
export const MATERIAL_ATTRIBUTES_BYTE_SIZE = 0x95;

class AttributeWriter {
    public view: DataView;
    public offs = 0;

    constructor(public buffer: ArrayBuffer) {
        this.view = new DataView(buffer);
    }

    public writeBool8(v: boolean): void {
        this.view.setUint8(this.offs++, v ? 1 : 0);
    }

    public writeInt32(v: number): void {
        this.view.setInt32(this.offs, v, true);
        this.offs += 0x04;
    }

    public writeUint32(v: number): void {
        this.view.setUint32(this.offs, v >>> 0, true);
        this.offs += 0x04;
    }

    public writeFloat32(v: number): void {
        this.view.setFloat32(this.offs, v, true);
        this.offs += 0x04;
    }

    public writeRGBA(c: Color): void {
        this.writeFloat32(c.r);
        this.writeFloat32(c.g);
        this.writeFloat32(c.b);
        this.writeFloat32(c.a);
    }
}

/**
 * Lays out {@param attributes} field by field in the order the archive tools hashed them.
 * This byte sequence is the input to {@see computeStructuralHash}; the order and widths
 * must not change or existing material hashes stop matching.
 */
export function serializeMaterialAttributes(attributes: MaterialAttributes): Uint8Array {
    const w = new AttributeWriter(new ArrayBuffer(MATERIAL_ATTRIBUTES_BYTE_SIZE));
    w.writeUint32(attributes.flags);
    w.writeBool8(attributes.additiveLightingModel);
    w.writeRGBA(attributes.colour);
    w.writeRGBA(attributes.specular);
    w.writeFloat32(attributes.power);
    w.writeInt32(attributes.shadingMode);
    w.writeBool8(attributes.depthBufferWrite);
    w.writeInt32(attributes.depthBufferComparisonMode);
    w.writeBool8(attributes.blend);
    w.writeInt32(attributes.blendModes.sourceMode);
    w.writeInt32(attributes.blendModes.destinationMode);
    w.writeBool8(attributes.alphaTest);
    w.writeInt32(attributes.alphaTestMode.comparisonFunction);
    w.writeFloat32(attributes.alphaTestMode.reference);
    w.writeUint32(attributes.owner);
    w.writeUint32(attributes.colourBufferWrite);
    for (let i = 0; i < MATERIAL_SLOT_COUNT; i++)
        w.writeBool8(attributes.useMatrices[i]);
    for (let i = 0; i < MATERIAL_SLOT_COUNT; i++)
        w.writeInt32(attributes.generators[i]);
    for (let i = 0; i < MATERIAL_SLOT_COUNT; i++)
        w.writeUint32(attributes.uvSets[i]);
    for (let i = 0; i < MATERIAL_SLOT_COUNT; i++)
        w.writeUint32(attributes.textureHashes[i]);
    w.writeInt32(attributes.envmapType);
    w.writeFloat32(attributes.planarSheerEnvmapDistance);
    assert(w.offs === MATERIAL_ATTRIBUTES_BYTE_SIZE);
    return new Uint8Array(w.buffer);
}

export function computeStructuralHash(attributes: MaterialAttributes): number {
    return CRC32.buf(serializeMaterialAttributes(attributes)) >>> 0;
}

export function getMaterialHash(material: Material): number {
    return computeStructuralHash(material.attributes);
}
