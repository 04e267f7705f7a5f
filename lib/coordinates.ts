import type { QuatTuple, Vec3Tuple } from './scene';

// glTF is right-handed and RF left-handed, both Y-up: mirror the Z axis.
// Under that mirror a quaternion's x and y flip while z and w stay.

export function gltfToRfVec(v: Readonly<Vec3Tuple>): Vec3Tuple {
	return [v[0], v[1], -v[2]];
}

export function gltfToRfQuat(q: Readonly<QuatTuple>): QuatTuple {
	return [-q[0], -q[1], q[2], q[3]];
}

/** Copies a gl-matrix vec3 (or any indexable) into a tuple */
export function toVec3Tuple(v: ArrayLike<number>): Vec3Tuple {
	return [v[0], v[1], v[2]];
}

/** Copies a gl-matrix quat, already in (x, y, z, w) order, into a tuple */
export function toQuatTuple(q: ArrayLike<number>): QuatTuple {
	return [q[0], q[1], q[2], q[3]];
}
