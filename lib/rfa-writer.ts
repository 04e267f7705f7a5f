import { RFA_MAGIC } from './config';
import { ConversionError } from './errors';
import type { AnimationFile, AnimationFileHeader, BoneAnimation, RotationKey, TranslationKey } from './rfa';

export const HEADER_SIZE = 72; // 11 x 4 (magic..ramp out) + 16 (total rotation) + 12 (total translation)
export const BONE_HEADER_SIZE = 8; // 4 (weight) + 2 (rotation key count) + 2 (translation key count)
export const ROTATION_KEY_SIZE = 16; // 4 (time) + 8 (quat) + 1 (ease in) + 1 (ease out) + 2 (pad)
export const TRANSLATION_KEY_SIZE = 40; // 4 (time) + 12 x 3 (in tangent, translation, out tangent)

const MAX_KEYS = 0x7fff;

function boneSize(bone: BoneAnimation): number {
	return BONE_HEADER_SIZE +
		ROTATION_KEY_SIZE * bone.rotationKeys.length +
		TRANSLATION_KEY_SIZE * bone.translationKeys.length;
}

function writeVec3(dataView: DataView, offset: number, v: readonly number[]): number {
	dataView.setFloat32(offset, v[0], true);
	dataView.setFloat32(offset + 4, v[1], true);
	dataView.setFloat32(offset + 8, v[2], true);
	return offset + 12;
}

function writeHeader(dataView: DataView, header: AnimationFileHeader): number {
	let offset = 0;
	dataView.setUint32(offset, RFA_MAGIC, true);
	dataView.setInt32(offset + 4, header.version, true);
	dataView.setFloat32(offset + 8, header.posReduction, true);
	dataView.setFloat32(offset + 12, header.rotReduction, true);
	dataView.setInt32(offset + 16, header.startTime, true);
	dataView.setInt32(offset + 20, header.endTime, true);
	dataView.setInt32(offset + 24, header.numBones, true);
	dataView.setInt32(offset + 28, header.numMorphVertices, true);
	dataView.setInt32(offset + 32, header.numMorphKeyframes, true);
	dataView.setInt32(offset + 36, header.rampInTime, true);
	dataView.setInt32(offset + 40, header.rampOutTime, true);
	offset += 44;

	const [rx, ry, rz, rw] = header.totalRotation;
	dataView.setFloat32(offset, rx, true);
	dataView.setFloat32(offset + 4, ry, true);
	dataView.setFloat32(offset + 8, rz, true);
	dataView.setFloat32(offset + 12, rw, true);
	offset += 16;

	return writeVec3(dataView, offset, header.totalTranslation);
}

function writeRotationKey(dataView: DataView, offset: number, key: RotationKey): number {
	dataView.setInt32(offset, key.time, true);
	offset += 4;
	for (let i = 0; i < 4; i++) {
		dataView.setInt16(offset + i * 2, key.rotation[i], true);
	}
	offset += 8;
	dataView.setInt8(offset, key.easeIn);
	dataView.setInt8(offset + 1, key.easeOut);
	dataView.setUint16(offset + 2, 0, true);
	return offset + 4;
}

function writeTranslationKey(dataView: DataView, offset: number, key: TranslationKey): number {
	dataView.setInt32(offset, key.time, true);
	offset += 4;
	offset = writeVec3(dataView, offset, key.inTangent);
	offset = writeVec3(dataView, offset, key.translation);
	return writeVec3(dataView, offset, key.outTangent);
}

function writeBone(dataView: DataView, offset: number, bone: BoneAnimation): number {
	dataView.setFloat32(offset, bone.weight, true);
	dataView.setInt16(offset + 4, bone.rotationKeys.length, true);
	dataView.setInt16(offset + 6, bone.translationKeys.length, true);
	offset += BONE_HEADER_SIZE;

	for (const key of bone.rotationKeys) {
		offset = writeRotationKey(dataView, offset, key);
	}
	for (const key of bone.translationKeys) {
		offset = writeTranslationKey(dataView, offset, key);
	}
	return offset;
}

/**
 * Serializes a version 8 RFA file. Layout: header, morph vertex and morph keyframe
 * offsets, one absolute offset per bone, then the bones themselves.
 * Morph data is never written, so both morph offsets point at the first bone.
 */
export function encodeRfa(file: AnimationFile): Uint8Array {
	const { header, bones } = file;
	if (header.numBones !== bones.length) {
		throw new ConversionError('DataMismatch', `header declares ${header.numBones} bones, got ${bones.length}`);
	}
	bones.forEach((bone, i) => {
		if (bone.rotationKeys.length > MAX_KEYS || bone.translationKeys.length > MAX_KEYS) {
			throw new ConversionError(
				'DataMismatch',
				`bone ${i} has ${bone.rotationKeys.length} rotation and ${bone.translationKeys.length} translation keys, at most ${MAX_KEYS} are supported`
			);
		}
	});

	const offsetTableSize = 4 + 4 + 4 * bones.length;
	const dataStart = HEADER_SIZE + offsetTableSize;
	const totalSize = dataStart + bones.reduce((sum, bone) => sum + boneSize(bone), 0);

	const buffer = new ArrayBuffer(totalSize);
	const dataView = new DataView(buffer);
	let offset = writeHeader(dataView, header);

	dataView.setInt32(offset, dataStart, true);
	dataView.setInt32(offset + 4, dataStart, true);
	offset += 8;

	let boneOffset = dataStart;
	for (const bone of bones) {
		dataView.setInt32(offset, boneOffset, true);
		offset += 4;
		boneOffset += boneSize(bone);
	}

	for (const bone of bones) {
		offset = writeBone(dataView, offset, bone);
	}

	return new Uint8Array(buffer);
}
