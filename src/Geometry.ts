
import { vec3, type ReadonlyVec3 } from "gl-matrix";

export class AABB {
    public min = vec3.create();
    public max = vec3.create();

    constructor(
        minX: number = Infinity,
        minY: number = Infinity,
        minZ: number = Infinity,
        maxX: number = -Infinity,
        maxY: number = -Infinity,
        maxZ: number = -Infinity,
    ) {
        vec3.set(this.min, minX, minY, minZ);
        vec3.set(this.max, maxX, maxY, maxZ);
    }

    public static fromExtrema(min: ReadonlyVec3, max: ReadonlyVec3): AABB {
        return new AABB(min[0], min[1], min[2], max[0], max[1], max[2]);
    }

    public containsPoint(v: ReadonlyVec3): boolean {
        const pX = v[0], pY = v[1], pZ = v[2];
        return !(
            pX < this.min[0] || pX > this.max[0] ||
            pY < this.min[1] || pY > this.max[1] ||
            pZ < this.min[2] || pZ > this.max[2]
        );
    }
}
