import { gltfToRfQuat, gltfToRfVec } from './coordinates';
import { ConversionError } from './errors';
import { warn } from './logger';
import { quantizeQuat, quantizeTime } from './quantize';
import type { RotationKey, TranslationKey } from './rfa';
import type { ChannelOutputs, Interpolation, QuatTuple, SceneAnimation, SceneJoint, Vec3Tuple } from './scene';

// ============================================================
// Keyframe extraction
// select channel -> decode samples -> convert/quantize -> group -> pair with time
// ============================================================

interface SelectedSamples<T> {
	interpolation: Interpolation;
	times: number[];
	values: T[];
}

/** (in-tangent, value, out-tangent) of one keyframe */
type Triplet<T> = [T, T, T];

/**
 * Finds the channel animating `joint` whose outputs `pick` accepts.
 * When several match, the first one is used.
 */
function selectSamples<T>(
	joint: SceneJoint,
	animation: SceneAnimation,
	label: string,
	pick: (outputs: ChannelOutputs) => T[] | undefined
): SelectedSamples<T> | undefined {
	let selected: SelectedSamples<T> | undefined;
	let matches = 0;

	for (const channel of animation.channels) {
		if (channel.targetNode !== joint.index || !channel.samples) continue;
		const values = pick(channel.samples.outputs);
		if (!values) continue;

		matches++;
		if (!selected) {
			selected = { interpolation: channel.interpolation, times: channel.samples.times, values };
		}
	}

	if (matches > 1) {
		warn(`node ${joint.index} has ${matches} ${label} channels, only the first is used`);
	}
	return selected;
}

function groupSamples<T>(values: T[], interpolation: Interpolation): Triplet<T>[] {
	if (interpolation !== 'CUBICSPLINE') {
		return values.map((v): Triplet<T> => [v, v, v]);
	}

	if (values.length % 3 !== 0) {
		throw new ConversionError(
			'DataMismatch',
			`cubic spline output count ${values.length} is not a multiple of 3`
		);
	}
	const triplets: Triplet<T>[] = [];
	for (let i = 0; i < values.length; i += 3) {
		triplets.push([values[i], values[i + 1], values[i + 2]]);
	}
	return triplets;
}

function pairWithTimes<T>(times: number[], triplets: Triplet<T>[]): { time: number; triplet: Triplet<T> }[] {
	if (times.length !== triplets.length) {
		throw new ConversionError(
			'DataMismatch',
			`channel has ${times.length} timestamps but ${triplets.length} keyframe values`
		);
	}
	return times.map((seconds, i) => ({ time: quantizeTime(seconds), triplet: triplets[i] }));
}

export function convertRotationKeys(joint: SceneJoint, animation: SceneAnimation): RotationKey[] {
	const samples = selectSamples(joint, animation, 'rotation',
		(outputs): QuatTuple[] | undefined => outputs.kind === 'rotation' ? outputs.values : undefined);
	if (!samples) return [];

	const rotations = samples.values.map((q) => quantizeQuat(gltfToRfQuat(q)));
	const triplets = groupSamples(rotations, samples.interpolation);

	// Spline tangents are not carried over, ease values stay 0
	return pairWithTimes(samples.times, triplets).map(({ time, triplet }) => ({
		time,
		rotation: triplet[1],
		easeIn: 0,
		easeOut: 0,
	}));
}

export function convertTranslationKeys(joint: SceneJoint, animation: SceneAnimation): TranslationKey[] {
	const samples = selectSamples(joint, animation, 'translation',
		(outputs): Vec3Tuple[] | undefined => outputs.kind === 'translation' ? outputs.values : undefined);
	if (!samples) return [];

	const translations = samples.values.map(gltfToRfVec);
	const triplets = groupSamples(translations, samples.interpolation);

	return pairWithTimes(samples.times, triplets).map(({ time, triplet }) => ({
		time,
		inTangent: triplet[0],
		translation: triplet[1],
		outTangent: triplet[2],
	}));
}
