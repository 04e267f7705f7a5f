import { FRAMES_PER_SECOND, ROTATION_SCALE, TICKS_PER_FRAME } from './config';
import type { QuatTuple } from './scene';

// Both conversions multiply in single precision and truncate toward zero,
// which existing RF assets depend on. NaN converts to 0.

export function quantizeTime(seconds: number): number {
	const frames = Math.fround(seconds * FRAMES_PER_SECOND);
	return Math.trunc(Math.fround(frames * TICKS_PER_FRAME)) || 0;
}

function quantizeComponent(c: number): number {
	return Math.trunc(Math.fround(c * ROTATION_SCALE)) || 0;
}

/**
 * Unit quaternion to 16-bit fixed point. Components are not clamped; ±1.0 maps to ±16383.
 */
export function quantizeQuat(q: Readonly<QuatTuple>): QuatTuple {
	return [
		quantizeComponent(q[0]),
		quantizeComponent(q[1]),
		quantizeComponent(q[2]),
		quantizeComponent(q[3]),
	];
}
