import { describe, it, expect } from 'vitest';
import { Document } from '@gltf-transform/core';
import { readScene } from '../gltf';
import { convertRotationKeys } from '../keyframes';

function buildDocument(): Document {
	const doc = new Document();
	const buffer = doc.createBuffer();

	const root = doc.createNode('root');
	const spine = doc.createNode('spine');
	const tip = doc.createNode();
	root.addChild(spine);
	spine.addChild(tip);

	const ibm = doc.createAccessor()
		.setType('MAT4')
		.setBuffer(buffer)
		.setArray(new Float32Array([
			1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1,
			1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, -1, 0, 1,
			1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, -2, 0, 1,
		]));
	doc.createSkin('body').addJoint(root).addJoint(spine).addJoint(tip).setInverseBindMatrices(ibm);

	const times = doc.createAccessor().setType('SCALAR').setBuffer(buffer).setArray(new Float32Array([0, 1]));
	const rotations = doc.createAccessor()
		.setType('VEC4')
		.setBuffer(buffer)
		.setArray(new Float32Array([0, 0, 0, 1, 0, 0.5, 0, 0.5]));
	const translations = doc.createAccessor()
		.setType('VEC3')
		.setBuffer(buffer)
		.setArray(new Float32Array([0, 1, 0, 0, 2, 0]));

	const rotationSampler = doc.createAnimationSampler().setInput(times).setOutput(rotations).setInterpolation('LINEAR');
	const translationSampler = doc.createAnimationSampler().setInput(times).setOutput(translations).setInterpolation('STEP');
	const rotationChannel = doc.createAnimationChannel().setTargetNode(spine).setTargetPath('rotation').setSampler(rotationSampler);
	const translationChannel = doc.createAnimationChannel().setTargetNode(root).setTargetPath('translation').setSampler(translationSampler);

	doc.createAnimation('wave')
		.addSampler(rotationSampler)
		.addSampler(translationSampler)
		.addChannel(rotationChannel)
		.addChannel(translationChannel);
	doc.createAnimation();

	return doc;
}

describe('readScene', () => {
	const scene = readScene(buildDocument());

	it('reads skins with joints by node index', () => {
		expect(scene.skins).toHaveLength(1);
		const [skin] = scene.skins;
		expect(skin.name).toBe('body');
		expect(skin.joints).toEqual([
			{ index: 0, name: 'root', children: [1] },
			{ index: 1, name: 'spine', children: [2] },
			{ index: 2, name: undefined, children: [] },
		]);
	});

	it('reads inverse bind matrices in column-major order', () => {
		const matrices = scene.skins[0].inverseBindMatrices;
		expect(matrices).toHaveLength(3);
		expect(matrices?.[1]).toEqual([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, -1, 0, 1]);
	});

	it('reads channels with samples and interpolation', () => {
		const [wave] = scene.animations;
		expect(wave.name).toBe('wave');
		expect(wave.channels).toEqual([
			{
				targetNode: 1,
				interpolation: 'LINEAR',
				samples: { times: [0, 1], outputs: { kind: 'rotation', values: [[0, 0, 0, 1], [0, 0.5, 0, 0.5]] } },
			},
			{
				targetNode: 0,
				interpolation: 'STEP',
				samples: { times: [0, 1], outputs: { kind: 'translation', values: [[0, 1, 0], [0, 2, 0]] } },
			},
		]);
	});

	it('leaves unnamed animations unnamed', () => {
		expect(scene.animations[1]).toEqual({ index: 1, name: undefined, channels: [] });
	});

	it('reports a skin without inverse bind matrices as null', () => {
		const doc = new Document();
		doc.createSkin().addJoint(doc.createNode('only'));

		expect(readScene(doc).skins[0].inverseBindMatrices).toBeNull();
	});

	it('decodes normalized integer rotations to floats', () => {
		const doc = new Document();
		const buffer = doc.createBuffer();
		const node = doc.createNode('head');
		const times = doc.createAccessor().setType('SCALAR').setBuffer(buffer).setArray(new Float32Array([0, 1]));
		const rotations = doc.createAccessor()
			.setType('VEC4')
			.setBuffer(buffer)
			.setArray(new Int16Array([0, 0, 0, 32767, 0, -32767, 0, 0]))
			.setNormalized(true);
		const sampler = doc.createAnimationSampler().setInput(times).setOutput(rotations);
		const channel = doc.createAnimationChannel().setTargetNode(node).setTargetPath('rotation').setSampler(sampler);
		doc.createAnimation('turn').addSampler(sampler).addChannel(channel);

		expect(readScene(doc).animations[0].channels[0].samples?.outputs).toEqual({
			kind: 'rotation',
			values: [[0, 0, 0, 1], [0, -1, 0, 0]],
		});
	});

	it('keeps a channel without output data but gives it no samples', () => {
		const doc = new Document();
		const buffer = doc.createBuffer();
		const node = doc.createNode('root');
		doc.createSkin().addJoint(node);
		const times = doc.createAccessor().setType('SCALAR').setBuffer(buffer).setArray(new Float32Array([0, 1]));
		const sampler = doc.createAnimationSampler().setInput(times);
		const channel = doc.createAnimationChannel().setTargetNode(node).setTargetPath('rotation').setSampler(sampler);
		doc.createAnimation('idle').addSampler(sampler).addChannel(channel);

		const scene = readScene(doc);
		const [idle] = scene.animations;
		expect(idle.channels).toHaveLength(1);
		expect(idle.channels[0].targetNode).toBe(0);
		expect(idle.channels[0].samples).toBeUndefined();
		expect(convertRotationKeys(scene.skins[0].joints[0], idle)).toEqual([]);
	});
});
