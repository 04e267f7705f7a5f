import type { SceneSkin } from './scene';

/**
 * Read-only lookups derived once per skin and shared by the keyframe
 * extractor, the animation assembler and the bone resolver.
 */
export interface SkinContext {
	readonly skin: SceneSkin;
	/** Hierarchy index (position in the joint list) by scene node index */
	readonly jointIndexByNode: ReadonlyMap<number, number>;
	/** Parent hierarchy index per joint, -1 for roots */
	readonly parentIndices: readonly number[];
}

export function createSkinContext(skin: SceneSkin): SkinContext {
	const jointIndexByNode = new Map<number, number>();
	skin.joints.forEach((joint, i) => {
		if (!jointIndexByNode.has(joint.index)) jointIndexByNode.set(joint.index, i);
	});

	// child node -> parent node, restricted to joints of this skin; the first joint listing a child wins
	const parentNodeByNode = new Map<number, number>();
	for (const joint of skin.joints) {
		for (const child of joint.children) {
			if (jointIndexByNode.has(child) && !parentNodeByNode.has(child)) {
				parentNodeByNode.set(child, joint.index);
			}
		}
	}

	const parentIndices = skin.joints.map((joint) => {
		const parentNode = parentNodeByNode.get(joint.index);
		if (parentNode === undefined) return -1;
		return jointIndexByNode.get(parentNode) ?? -1;
	});

	return { skin, jointIndexByNode, parentIndices };
}
