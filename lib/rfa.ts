import { RAMP_TIME, RFA_VERSION } from './config';
import type { QuatTuple, Vec3Tuple } from './scene';

// ============================================================
// RFA records - RF skeletal animation file, in RF conventions
// ============================================================

export interface RotationKey {
	/** Ticks */
	time: number;
	/** Quantized (x, y, z, w), 16-bit signed */
	rotation: QuatTuple;
	easeIn: number;
	easeOut: number;
}

export interface TranslationKey {
	time: number;
	inTangent: Vec3Tuple;
	translation: Vec3Tuple;
	outTangent: Vec3Tuple;
}

export interface BoneAnimation {
	weight: number;
	rotationKeys: RotationKey[];
	translationKeys: TranslationKey[];
}

export interface AnimationFileHeader {
	version: number;
	posReduction: number;
	rotReduction: number;
	startTime: number;
	endTime: number;
	numBones: number;
	numMorphVertices: number;
	numMorphKeyframes: number;
	rampInTime: number;
	rampOutTime: number;
	/** Root motion, unused: always identity */
	totalRotation: QuatTuple;
	totalTranslation: Vec3Tuple;
}

export interface AnimationFile {
	header: AnimationFileHeader;
	bones: BoneAnimation[];
}

export function createHeader(numBones: number, startTime: number, endTime: number): AnimationFileHeader {
	return {
		version: RFA_VERSION,
		posReduction: 0,
		rotReduction: 0,
		startTime,
		endTime,
		numBones,
		numMorphVertices: 0,
		numMorphKeyframes: 0,
		rampInTime: RAMP_TIME,
		rampOutTime: RAMP_TIME,
		totalRotation: [0, 0, 0, 1],
		totalTranslation: [0, 0, 0],
	};
}
