import { RFA_MAGIC } from './config';
import { ConversionError } from './errors';
import { BONE_HEADER_SIZE, HEADER_SIZE, ROTATION_KEY_SIZE, TRANSLATION_KEY_SIZE } from './rfa-writer';
import type { AnimationFile, AnimationFileHeader, BoneAnimation, RotationKey, TranslationKey } from './rfa';
import type { QuatTuple, Vec3Tuple } from './scene';

// Little-endian cursor over a byte array (which may be a view into a larger buffer)
class BinaryReader {
	private view: DataView;
	offset: number;

	constructor(binary: Uint8Array) {
		this.view = new DataView(binary.buffer, binary.byteOffset, binary.byteLength);
		this.offset = 0;
	}

	get length(): number {
		return this.view.byteLength;
	}

	private take(size: number): number {
		if (this.offset + size > this.view.byteLength) {
			throw new ConversionError('DataMismatch', `unexpected end of RFA data at offset ${this.offset}`);
		}
		const at = this.offset;
		this.offset += size;
		return at;
	}

	readInt8(): number {
		return this.view.getInt8(this.take(1));
	}

	readInt16(): number {
		return this.view.getInt16(this.take(2), true);
	}

	readUint16(): number {
		return this.view.getUint16(this.take(2), true);
	}

	readInt32(): number {
		return this.view.getInt32(this.take(4), true);
	}

	readUint32(): number {
		return this.view.getUint32(this.take(4), true);
	}

	readFloat32(): number {
		return this.view.getFloat32(this.take(4), true);
	}

	readVec3(): Vec3Tuple {
		return [this.readFloat32(), this.readFloat32(), this.readFloat32()];
	}
}

function readHeader(data: BinaryReader): AnimationFileHeader {
	if (data.length < HEADER_SIZE) throw new ConversionError('DataMismatch', 'Not an RFA file: too short');
	const magic = data.readUint32();
	if (magic !== RFA_MAGIC) {
		throw new ConversionError('DataMismatch', `Not an RFA file: bad magic 0x${magic.toString(16)}`);
	}

	const version = data.readInt32();
	const posReduction = data.readFloat32();
	const rotReduction = data.readFloat32();
	const startTime = data.readInt32();
	const endTime = data.readInt32();
	const numBones = data.readInt32();
	const numMorphVertices = data.readInt32();
	const numMorphKeyframes = data.readInt32();
	const rampInTime = data.readInt32();
	const rampOutTime = data.readInt32();
	const totalRotation: QuatTuple = [data.readFloat32(), data.readFloat32(), data.readFloat32(), data.readFloat32()];
	const totalTranslation = data.readVec3();

	return {
		version,
		posReduction,
		rotReduction,
		startTime,
		endTime,
		numBones,
		numMorphVertices,
		numMorphKeyframes,
		rampInTime,
		rampOutTime,
		totalRotation,
		totalTranslation,
	};
}

function readRotationKey(data: BinaryReader): RotationKey {
	const time = data.readInt32();
	const rotation: QuatTuple = [data.readInt16(), data.readInt16(), data.readInt16(), data.readInt16()];
	const easeIn = data.readInt8();
	const easeOut = data.readInt8();
	data.readUint16(); // pad
	return { time, rotation, easeIn, easeOut };
}

function readTranslationKey(data: BinaryReader): TranslationKey {
	const time = data.readInt32();
	const inTangent = data.readVec3();
	const translation = data.readVec3();
	const outTangent = data.readVec3();
	return { time, inTangent, translation, outTangent };
}

function readBone(data: BinaryReader): BoneAnimation {
	const start = data.offset;
	const weight = data.readFloat32();
	const numRotationKeys = data.readInt16();
	const numTranslationKeys = data.readInt16();
	const end = start + BONE_HEADER_SIZE + numRotationKeys * ROTATION_KEY_SIZE + numTranslationKeys * TRANSLATION_KEY_SIZE;
	if (numRotationKeys < 0 || numTranslationKeys < 0 || end > data.length) {
		throw new ConversionError('DataMismatch', `bone at offset ${start} does not fit in the file`);
	}

	const rotationKeys: RotationKey[] = [];
	for (let i = 0; i < numRotationKeys; i++) rotationKeys.push(readRotationKey(data));
	const translationKeys: TranslationKey[] = [];
	for (let i = 0; i < numTranslationKeys; i++) translationKeys.push(readTranslationKey(data));

	return { weight, rotationKeys, translationKeys };
}

/**
 * Parses a version 8 RFA file, following the bone offset table.
 */
export function readRfa(binary: Uint8Array): AnimationFile {
	const data = new BinaryReader(binary);
	const header = readHeader(data);
	if (header.numBones < 0) throw new ConversionError('DataMismatch', `invalid bone count ${header.numBones}`);

	data.readInt32(); // morph vertices offset
	data.readInt32(); // morph keyframes offset
	const boneOffsets: number[] = [];
	for (let i = 0; i < header.numBones; i++) boneOffsets.push(data.readInt32());

	const bones = boneOffsets.map((offset) => {
		data.offset = offset;
		return readBone(data);
	});

	return { header, bones };
}
