import { describe, it, expect } from 'vitest';
import { animationName, determineAnimTimeRange, makeRfa } from '../animation';
import { createSkinContext } from '../context';
import type { BoneAnimation } from '../rfa';
import { QUAT_Y90, animation, joint, rotationChannel, skin, translationChannel } from './fixtures';

function bone(rotationTimes: number[], translationTimes: number[]): BoneAnimation {
	return {
		weight: 1,
		rotationKeys: rotationTimes.map((time) => ({ time, rotation: [0, 0, 0, 16383], easeIn: 0, easeOut: 0 })),
		translationKeys: translationTimes.map((time) => ({
			time,
			inTangent: [0, 0, 0],
			translation: [0, 0, 0],
			outTangent: [0, 0, 0],
		})),
	};
}

describe('determineAnimTimeRange', () => {
	it('is (0, 0) without keys', () => {
		expect(determineAnimTimeRange([])).toEqual([0, 0]);
		expect(determineAnimTimeRange([bone([], []), bone([], [])])).toEqual([0, 0]);
	});

	it('spans every key of every bone', () => {
		const bones = [bone([100, 300], []), bone([], [2000, 5000]), bone([], [])];

		expect(determineAnimTimeRange(bones)).toEqual([100, 5000]);
	});
});

describe('animationName', () => {
	it('uses the declared name', () => {
		expect(animationName(animation([], 'walk', 3))).toBe('walk');
	});

	it('falls back to the animation index', () => {
		expect(animationName(animation([], undefined, 2))).toBe('anim_2');
	});
});

describe('makeRfa', () => {
	// joint order differs from node order: bones follow the joint list
	const context = createSkinContext(skin([joint(2), joint(0, [1, 2]), joint(1)]));

	it('builds one bone per joint in joint order', () => {
		const anim = animation([
			rotationChannel(1, [0, 1], [[0, 0, 0, 1], QUAT_Y90]),
			translationChannel(2, [0.5, 2], [[1, 2, 3], [4, 5, 6]]),
		], 'wave');

		const rfa = makeRfa(anim, context);

		expect(rfa.bones).toHaveLength(3);
		expect(rfa.bones.map((b) => [b.rotationKeys.length, b.translationKeys.length])).toEqual([[0, 2], [0, 0], [2, 0]]);
		expect(rfa.bones.every((b) => b.weight === 1)).toBe(true);
		expect(rfa.bones[0].translationKeys.map((k) => k.time)).toEqual([2400, 9600]);
		expect(rfa.header).toEqual({
			version: 8,
			posReduction: 0,
			rotReduction: 0,
			startTime: 0,
			endTime: 9600,
			numBones: 3,
			numMorphVertices: 0,
			numMorphKeyframes: 0,
			rampInTime: 480,
			rampOutTime: 480,
			totalRotation: [0, 0, 0, 1],
			totalTranslation: [0, 0, 0],
		});
	});

	it('produces an empty range for a static animation', () => {
		const rfa = makeRfa(animation([]), context);

		expect(rfa.header.startTime).toBe(0);
		expect(rfa.header.endTime).toBe(0);
		expect(rfa.bones.every((b) => b.rotationKeys.length === 0 && b.translationKeys.length === 0)).toBe(true);
	});
});
