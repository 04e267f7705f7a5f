import { expect } from 'vitest';
import { isConversionError } from '../errors';
import type { ConversionError } from '../errors';
import type { Mat4Tuple, SceneAnimation, SceneChannel, SceneJoint, SceneSkin } from '../scene';

export const SQRT1_2 = Math.SQRT1_2;

/** 90 degrees about +Y, (x, y, z, w) */
export const QUAT_Y90: [number, number, number, number] = [0, SQRT1_2, 0, SQRT1_2];

export function identity(): Mat4Tuple {
	return [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
}

export function translation(x: number, y: number, z: number): Mat4Tuple {
	return [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, x, y, z, 1];
}

export function scaling(x: number, y: number, z: number): Mat4Tuple {
	return [x, 0, 0, 0, 0, y, 0, 0, 0, 0, z, 0, 0, 0, 0, 1];
}

export function joint(index: number, children: number[] = [], name?: string): SceneJoint {
	return { index, name, children };
}

export function skin(joints: SceneJoint[], inverseBindMatrices: Mat4Tuple[] | null = joints.map(() => identity())): SceneSkin {
	return { index: 0, joints, inverseBindMatrices };
}

export function rotationChannel(
	targetNode: number,
	times: number[],
	values: [number, number, number, number][],
	interpolation: SceneChannel['interpolation'] = 'LINEAR'
): SceneChannel {
	return { targetNode, interpolation, samples: { times, outputs: { kind: 'rotation', values } } };
}

export function translationChannel(
	targetNode: number,
	times: number[],
	values: [number, number, number][],
	interpolation: SceneChannel['interpolation'] = 'LINEAR'
): SceneChannel {
	return { targetNode, interpolation, samples: { times, outputs: { kind: 'translation', values } } };
}

export function animation(channels: SceneChannel[], name?: string, index = 0): SceneAnimation {
	return { index, name, channels };
}

/** The ConversionError thrown by `fn`, or undefined when it returns; other errors propagate */
export function conversionError(fn: () => unknown): ConversionError | undefined {
	try {
		fn();
	} catch (e) {
		if (isConversionError(e)) return e;
		throw e;
	}
	return undefined;
}

export function expectTupleClose(actual: readonly number[], expected: readonly number[]): void {
	expect(actual).toHaveLength(expected.length);
	actual.forEach((v, i) => expect(v).toBeCloseTo(expected[i], 5));
}
