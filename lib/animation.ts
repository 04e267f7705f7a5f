import type { SkinContext } from './context';
import { convertRotationKeys, convertTranslationKeys } from './keyframes';
import { createHeader } from './rfa';
import type { AnimationFile, BoneAnimation } from './rfa';
import type { SceneAnimation } from './scene';

/**
 * Output name of an animation, also the base name of its .rfa file.
 */
export function animationName(animation: SceneAnimation): string {
	return animation.name ?? `anim_${animation.index}`;
}

/**
 * (start, end) ticks over every key of every bone; (0, 0) when there are no keys.
 */
export function determineAnimTimeRange(bones: readonly BoneAnimation[]): [number, number] {
	let start = Infinity;
	let end = -Infinity;
	for (const bone of bones) {
		for (const key of bone.rotationKeys) {
			start = Math.min(start, key.time);
			end = Math.max(end, key.time);
		}
		for (const key of bone.translationKeys) {
			start = Math.min(start, key.time);
			end = Math.max(end, key.time);
		}
	}
	if (start > end) return [0, 0];
	return [start, end];
}

/**
 * One bone per skin joint, in joint order, so bone indices agree with the mesh's bone list.
 */
export function makeRfa(animation: SceneAnimation, context: SkinContext): AnimationFile {
	const bones: BoneAnimation[] = context.skin.joints.map((joint) => ({
		weight: 1.0,
		rotationKeys: convertRotationKeys(joint, animation),
		translationKeys: convertTranslationKeys(joint, animation),
	}));

	const [startTime, endTime] = determineAnimTimeRange(bones);
	return {
		header: createHeader(bones.length, startTime, endTime),
		bones,
	};
}
