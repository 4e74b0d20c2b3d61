import { ByteWriter } from './writer';

export interface TextureFixture {
    name: string;
    format: number;
    filter: number;
    address: number;
    maskName: string;
    borderColour: [number, number, number, number];
    hash: number;
}

export interface SlotFixture {
    uvSet: number;
    // Written as the name length of an empty slot.
    emptyLength?: number;
    texture?: TextureFixture;
}

export interface MaterialFixture {
    power: number;
    materialHash: number;
    slots: SlotFixture[];
    matrices: (number[] | null)[];
    generators: number[];
}

export function defaultMaterialFixture(): MaterialFixture {
    return {
        power: 8,
        materialHash: 0xCAFEBABE,
        slots: [0, 1, 2, 3, 4].map((uvSet) => ({ uvSet })),
        matrices: [null, null, null, null, null],
        generators: [0, 1, 2, 3, 4],
    };
}

// Offset of the power field within a material payload.
export const MATERIAL_POWER_OFFS = 0x2C;

export function writeMaterial(w: ByteWriter, fixture: MaterialFixture = defaultMaterialFixture()): ByteWriter {
    w.u32(0x101);               // flags
    w.u32(0x12345678);          // name hash
    w.i32(1);                   // additive lighting model
    w.f32s(1, 0.5, 0.25, 1);    // colour
    w.f32s(0, 0, 0, 1);         // specular
    w.f32(fixture.power);
    w.i32(2);                   // shading mode
    w.i32(1);                   // blend
    w.i32(5).i32(6);            // blend modes
    w.i32(0);                   // alpha test
    w.i32(4).f32(0.5);          // alpha test mode
    w.i32(1);                   // depth buffer write
    w.i32(3);                   // depth buffer comparison mode
    w.u32(fixture.materialHash);
    w.u32(7);                   // owner
    w.u32(0xF);                 // colour buffer write

    for (const slot of fixture.slots) {
        w.u32(slot.uvSet);
        const texture = slot.texture;
        if (texture === undefined) {
            w.i32(slot.emptyLength ?? 0);
            continue;
        }
        w.wideName(texture.name);
        w.i32(texture.format).i32(texture.filter).i32(texture.address);
        w.wideName(texture.maskName);
        w.f32s(...texture.borderColour);
        w.u32(texture.hash);
    }

    for (const matrix of fixture.matrices) {
        w.i32(matrix !== null ? 1 : 0);
        if (matrix !== null)
            w.f32s(...matrix);
    }

    for (const generator of fixture.generators)
        w.i32(generator);

    w.i32(1);                   // envmap type
    w.f32(10);                  // planar sheer envmap distance
    return w;
}
