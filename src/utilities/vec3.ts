/**
 * Plain 3D vector helpers. World space is Y-up; the ocean surface spans X/Z.
 */

export interface Vec3 {
    x: number;
    y: number;
    z: number;
}

export const UP_VEC3: Readonly<Vec3> = Object.freeze({ x: 0, y: 1, z: 0 });

export function addVec3(a: Vec3, b: Vec3): Vec3 {
    return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function scaleVec3(v: Vec3, s: number): Vec3 {
    return { x: v.x * s, y: v.y * s, z: v.z * s };
}

export function lengthVec3(v: Vec3): number {
    return Math.hypot(v.x, v.y, v.z);
}

/** Unit-length copy, or `fallback` for a zero/non-finite vector */
export function normalizeVec3(v: Vec3, fallback: Readonly<Vec3> = UP_VEC3): Vec3 {
    const len = lengthVec3(v);
    if (len === 0 || !Number.isFinite(len)) {
        return { ...fallback };
    }
    return { x: v.x / len, y: v.y / len, z: v.z / len };
}

/**
 * Project onto the horizontal plane and normalize.
 * Returns null when the vector has no horizontal component.
 */
export function flattenToXZ(v: Vec3): Vec3 | null {
    const len = Math.hypot(v.x, v.z);
    if (len === 0 || !Number.isFinite(len)) {
        return null;
    }
    return { x: v.x / len, y: 0, z: v.z / len };
}

export function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
}

export function clamp(value: number, min: number, max: number): number {
    return value < min ? min : value > max ? max : value;
}
