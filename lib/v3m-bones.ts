import Encoding from 'encoding-japanese';
import { BONE_NAME_SIZE, BONE_SECTION_ID } from './config';
import { ConversionError } from './errors';
import type { SkeletonBone } from './bones';

const BONE_RECORD_SIZE = BONE_NAME_SIZE + 16 + 12 + 4; // name + rotation + translation + parent

// Names are single-byte text; anything outside ASCII encodes to bytes >= 0x80 in UTF-8
function encodeAscii(str: string): Uint8Array {
	const unicodeArray = Encoding.stringToCode(str);
	const utf8Array = Encoding.convert(unicodeArray, { to: 'UTF8', from: 'UNICODE' });
	if (utf8Array.some((c) => c > 0x7f)) {
		throw new ConversionError('DataMismatch', `bone name "${str}" is not ASCII`);
	}
	return new Uint8Array(utf8Array);
}

function writeBone(dataView: DataView, offset: number, bone: SkeletonBone): number {
	const nameBytes = encodeAscii(bone.name);
	if (nameBytes.length >= BONE_NAME_SIZE) {
		throw new ConversionError(
			'DataMismatch',
			`bone name "${bone.name}" is longer than ${BONE_NAME_SIZE - 1} characters`
		);
	}
	for (let i = 0; i < BONE_NAME_SIZE; i++) {
		dataView.setUint8(offset + i, i < nameBytes.length ? nameBytes[i] : 0);
	}
	offset += BONE_NAME_SIZE;

	for (let i = 0; i < 4; i++) {
		dataView.setFloat32(offset + i * 4, bone.baseRotation[i], true);
	}
	offset += 16;
	for (let i = 0; i < 3; i++) {
		dataView.setFloat32(offset + i * 4, bone.baseTranslation[i], true);
	}
	offset += 12;

	dataView.setInt32(offset, bone.parentIndex, true);
	return offset + 4;
}

/**
 * Encodes the BONE section of a V3M/V3C mesh file: section id, payload size,
 * bone count, then one fixed-size record per bone.
 */
export function encodeBoneSection(bones: readonly SkeletonBone[]): Uint8Array {
	const payloadSize = 4 + BONE_RECORD_SIZE * bones.length;
	const buffer = new ArrayBuffer(8 + payloadSize);
	const dataView = new DataView(buffer);

	dataView.setUint32(0, BONE_SECTION_ID, true);
	dataView.setUint32(4, payloadSize, true);
	dataView.setInt32(8, bones.length, true);

	let offset = 12;
	for (const bone of bones) {
		offset = writeBone(dataView, offset, bone);
	}
	return new Uint8Array(buffer);
}
