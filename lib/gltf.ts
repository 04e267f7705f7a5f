import { NodeIO } from '@gltf-transform/core';
import type { Accessor, Animation, AnimationChannel, Document, Node, Skin } from '@gltf-transform/core';
import { ConversionError } from './errors';
import type {
	ChannelOutputs,
	ChannelSamples,
	Mat4Tuple,
	QuatTuple,
	Scene,
	SceneAnimation,
	SceneChannel,
	SceneJoint,
	SceneSkin,
	Vec3Tuple,
} from './scene';

// ============================================================
// glTF reader - adapts a glTF-Transform document to the scene model
// No RF-specific conversions - returns glTF conventions
// ============================================================

function optionalName(name: string): string | undefined {
	return name === '' ? undefined : name;
}

/** Elements of an accessor, normalized integers decoded to floats */
function readElements(accessor: Accessor): number[][] {
	const elements: number[][] = [];
	for (let i = 0; i < accessor.getCount(); i++) {
		const element: number[] = [];
		accessor.getElement(i, element);
		elements.push(element);
	}
	return elements;
}

function readScalars(accessor: Accessor): number[] {
	const scalars: number[] = [];
	for (let i = 0; i < accessor.getCount(); i++) {
		scalars.push(accessor.getScalar(i));
	}
	return scalars;
}

function readOutputs(path: string, accessor: Accessor): ChannelOutputs | undefined {
	switch (path) {
		case 'rotation':
			return { kind: 'rotation', values: readElements(accessor).map((e): QuatTuple => [e[0], e[1], e[2], e[3]]) };
		case 'translation':
			return { kind: 'translation', values: readElements(accessor).map((e): Vec3Tuple => [e[0], e[1], e[2]]) };
		case 'scale':
			return { kind: 'scale', values: readElements(accessor).map((e): Vec3Tuple => [e[0], e[1], e[2]]) };
		case 'weights':
			return { kind: 'weights', values: readScalars(accessor) };
		default:
			return undefined;
	}
}

class SceneReader {
	private nodeIndex: Map<Node, number>;

	constructor(private document: Document) {
		this.nodeIndex = new Map(document.getRoot().listNodes().map((node, i): [Node, number] => [node, i]));
	}

	read(): Scene {
		const root = this.document.getRoot();
		return {
			skins: root.listSkins().map((skin, i) => this.readSkin(skin, i)),
			animations: root.listAnimations().map((animation, i) => this.readAnimation(animation, i)),
		};
	}

	private indexOf(node: Node): number {
		const index = this.nodeIndex.get(node);
		if (index === undefined) {
			throw new ConversionError('DataMismatch', `node "${node.getName()}" is not part of the document`);
		}
		return index;
	}

	private readJoint(node: Node): SceneJoint {
		return {
			index: this.indexOf(node),
			name: optionalName(node.getName()),
			children: node.listChildren().map((child) => this.indexOf(child)),
		};
	}

	private readSkin(skin: Skin, index: number): SceneSkin {
		const accessor = skin.getInverseBindMatrices();
		const inverseBindMatrices: Mat4Tuple[] | null = accessor ? readElements(accessor) : null;
		return {
			index,
			name: optionalName(skin.getName()),
			joints: skin.listJoints().map((joint) => this.readJoint(joint)),
			inverseBindMatrices,
		};
	}

	private readChannel(channel: AnimationChannel): SceneChannel | undefined {
		const node = channel.getTargetNode();
		const sampler = channel.getSampler();
		if (!node || !sampler) return undefined;

		const input = sampler.getInput();
		const output = sampler.getOutput();
		const path = channel.getTargetPath();
		let samples: ChannelSamples | undefined;
		if (input && output && path) {
			const outputs = readOutputs(path, output);
			if (outputs) samples = { times: readScalars(input), outputs };
		}

		return {
			targetNode: this.indexOf(node),
			interpolation: sampler.getInterpolation(),
			samples,
		};
	}

	private readAnimation(animation: Animation, index: number): SceneAnimation {
		const channels: SceneChannel[] = [];
		for (const channel of animation.listChannels()) {
			const converted = this.readChannel(channel);
			if (converted) channels.push(converted);
		}
		return { index, name: optionalName(animation.getName()), channels };
	}
}

export function readScene(document: Document): Scene {
	return new SceneReader(document).read();
}

export async function loadScene(path: string): Promise<Scene> {
	const document = await new NodeIO().read(path);
	return readScene(document);
}
