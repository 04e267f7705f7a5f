import { dirname, resolve } from 'path';

// ============================================================
// RF format constants
// ============================================================

/** Animation time is counted in ticks: 30 frames per second, 160 ticks per frame */
export const FRAMES_PER_SECOND = 30;
export const TICKS_PER_FRAME = 160;

/** Fixed-point scale of a quantized quaternion component */
export const ROTATION_SCALE = 16383;

export const RAMP_TIME = 480;

/** Maximum number of bones a V3C mesh can reference */
export const MAX_BONES = 50;

export const SCALE_TOLERANCE = 0.01;

export const RFA_EXTENSION = 'rfa';
export const RFA_MAGIC = 0x46564d56; // "VMVF"
export const RFA_VERSION = 8;

export const BONE_SECTION_ID = 0x454e4f42; // "BONE"
export const BONE_NAME_SIZE = 24;

// ============================================================
// Conversion options
// ============================================================

export interface ConvertOptions {
	/** Directory receiving one .rfa per animation */
	outputDir: string;
	/** Skin the animations are bound to */
	skinIndex: number;
	logFile?: string;
}

/**
 * Fills in defaults: output goes next to the input file, skin 0 is used.
 */
export function resolveOptions(inputPath: string, overrides: Partial<ConvertOptions> = {}): ConvertOptions {
	return {
		outputDir: resolve(overrides.outputDir ?? dirname(inputPath)),
		skinIndex: overrides.skinIndex ?? 0,
		logFile: overrides.logFile,
	};
}
