import type { Color } from "../Color";
import type { AABB } from "../Geometry";
import { InvalidLengthError } from "./errors";
import { DataStream } from "./stream";

export interface Floor {
    occlusionBSP: number;
    ghostCameraBounds: AABB;
}

export interface World {
    flags: number;
    ambient: Color;
    floors: Floor[];
    zoneCount: number;
    hasOcclusionBSP: boolean;
    hasNulls: boolean;
    hasWaypoints: boolean;
    hasMesh: boolean;
}

export function readFloor(data: DataStream): Floor {
    const occlusionBSP = data.readUint32();
    const ghostCameraBounds = data.readAABB();
    return { occlusionBSP, ghostCameraBounds };
}

export function readWorld(data: DataStream): World {
    const flags = data.readUint32();
    const ambient = data.readRGB8();

    const floorCountOffs = data.offs;
    const floorCount = data.readInt32();
    if (floorCount < 0)
        throw new InvalidLengthError('floor count', floorCount, floorCountOffs);
    const floors = data.readArrayStatic(readFloor, floorCount);

    const zoneCount = data.readInt32();
    const hasOcclusionBSP = data.readBool32();
    const hasNulls = data.readBool32();
    const hasWaypoints = data.readBool32();
    const hasMesh = data.readBool32();

    return { flags, ambient, floors, zoneCount, hasOcclusionBSP, hasNulls, hasWaypoints, hasMesh };
}
