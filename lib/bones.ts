import { mat4, quat, vec3 } from 'gl-matrix';
import { MAX_BONES, SCALE_TOLERANCE } from './config';
import type { SkinContext } from './context';
import { gltfToRfQuat, gltfToRfVec, toQuatTuple, toVec3Tuple } from './coordinates';
import { ConversionError } from './errors';
import type { Mat4Tuple, QuatTuple, SceneJoint, Vec3Tuple } from './scene';

/** Bone record of the V3M/V3C mesh bone section, in RF conventions */
export interface SkeletonBone {
	name: string;
	baseRotation: QuatTuple;
	baseTranslation: Vec3Tuple;
	/** Index in the skin's joint list, -1 for a root */
	parentIndex: number;
}

export interface DecomposedTransform {
	scale: Vec3Tuple;
	rotation: QuatTuple;
	translation: Vec3Tuple;
}

/**
 * Splits an affine matrix into scale, rotation and translation.
 * A mirroring matrix (negative determinant) reports a negative x scale.
 */
export function decomposeMatrix(matrix: Mat4Tuple): DecomposedTransform {
	const scale = mat4.getScaling(vec3.create(), matrix);
	if (mat4.determinant(matrix) < 0) scale[0] = -scale[0];
	const rotation = mat4.getRotation(quat.create(), matrix);
	const translation = mat4.getTranslation(vec3.create(), matrix);
	return {
		scale: toVec3Tuple(scale),
		rotation: toQuatTuple(rotation),
		translation: toVec3Tuple(translation),
	};
}

function boneName(joint: SceneJoint, index: number): string {
	return joint.name ?? `bone_${index}`;
}

function convertBone(joint: SceneJoint, inverseBindMatrix: Mat4Tuple, index: number, context: SkinContext): SkeletonBone {
	const name = boneName(joint, index);
	const { scale, rotation, translation } = decomposeMatrix(inverseBindMatrix);
	if (scale.some((s) => Math.abs(s - 1) > SCALE_TOLERANCE)) {
		throw new ConversionError(
			'UnsupportedTransform',
			`bone ${name}: scale is not supported: [${scale.map((s) => s.toFixed(4)).join(', ')}]`
		);
	}

	return {
		name,
		baseRotation: gltfToRfQuat(rotation),
		baseTranslation: gltfToRfVec(translation),
		parentIndex: context.parentIndices[index],
	};
}

/**
 * Bone list of a skin, in joint order. Throws before producing anything when the skin
 * has too many joints, mismatched inverse bind matrices, or a scaled bind pose.
 */
export function resolveBones(context: SkinContext): SkeletonBone[] {
	const { joints, inverseBindMatrices } = context.skin;
	const numJoints = joints.length;
	if (numJoints > MAX_BONES) {
		throw new ConversionError(
			'CapacityExceeded',
			`too many bones: found ${numJoints} but only ${MAX_BONES} are supported`
		);
	}

	if (!inverseBindMatrices) {
		throw new ConversionError('DataMismatch', 'skin has no inverse bind matrices');
	}
	if (inverseBindMatrices.length !== numJoints) {
		throw new ConversionError(
			'DataMismatch',
			`invalid number of inverse bind matrices: expected ${numJoints}, got ${inverseBindMatrices.length}`
		);
	}
	const malformed = inverseBindMatrices.findIndex((m) => m.length !== 16);
	if (malformed !== -1) {
		throw new ConversionError(
			'DataMismatch',
			`inverse bind matrix ${malformed} has ${inverseBindMatrices[malformed].length} elements, expected 16`
		);
	}

	return joints.map((joint, i) => convertBone(joint, inverseBindMatrices[i], i, context));
}
