// ============================================================
// Scene model - read-only view of the source glTF scene
// Only skeleton and animation data, in glTF conventions
// ============================================================

export type Vec3Tuple = [number, number, number];

/** Quaternion as (x, y, z, w) */
export type QuatTuple = [number, number, number, number];

/** 4x4 matrix, 16 numbers in column-major order */
export type Mat4Tuple = number[];

export type Interpolation = 'STEP' | 'LINEAR' | 'CUBICSPLINE';

export type ChannelOutputs =
	| { kind: 'rotation'; values: QuatTuple[] }
	| { kind: 'translation'; values: Vec3Tuple[] }
	| { kind: 'scale'; values: Vec3Tuple[] }
	| { kind: 'weights'; values: number[] };

export interface ChannelSamples {
	/** Timestamps in seconds */
	times: number[];
	/** For CUBICSPLINE, three outputs per timestamp: in-tangent, value, out-tangent */
	outputs: ChannelOutputs;
}

export interface SceneChannel {
	/** Scene node index of the animated joint */
	targetNode: number;
	interpolation: Interpolation;
	/** Absent when the sampler has no readable input or output data */
	samples?: ChannelSamples;
}

export interface SceneAnimation {
	/** Position among the scene's animations */
	index: number;
	name?: string;
	channels: SceneChannel[];
}

export interface SceneJoint {
	/** Scene node index */
	index: number;
	name?: string;
	/** Scene node indices of the direct children */
	children: number[];
}

export interface SceneSkin {
	index: number;
	name?: string;
	joints: SceneJoint[];
	/** One matrix per joint, in joint order; null when the skin declares none */
	inverseBindMatrices: Mat4Tuple[] | null;
}

export interface Scene {
	skins: SceneSkin[];
	animations: SceneAnimation[];
}
