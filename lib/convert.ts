import { renameSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { animationName, makeRfa } from './animation';
import { resolveBones } from './bones';
import type { SkeletonBone } from './bones';
import { RFA_EXTENSION } from './config';
import type { ConvertOptions } from './config';
import { createSkinContext } from './context';
import type { SkinContext } from './context';
import { ConversionError } from './errors';
import { log, warn } from './logger';
import { encodeRfa } from './rfa-writer';
import type { Scene, SceneAnimation, SceneSkin } from './scene';
import { encodeBoneSection } from './v3m-bones';

export interface ConversionResult {
	bones: SkeletonBone[];
	/** Paths of the written .rfa files, in animation order */
	files: string[];
}

/**
 * Writes through a temporary file renamed over `path`, so a failed write never
 * leaves a truncated file behind.
 */
function writeFileAtomic(path: string, data: Uint8Array): void {
	const tmpPath = `${path}.tmp`;
	try {
		writeFileSync(tmpPath, data);
		renameSync(tmpPath, path);
	} catch (e) {
		rmSync(tmpPath, { force: true });
		throw e;
	}
}

export function convertAnimationToRfa(animation: SceneAnimation, context: SkinContext, outputDir: string): string {
	const name = animationName(animation);
	log(`Processing animation ${name}`);
	const fileName = join(outputDir, `${name}.${RFA_EXTENSION}`);
	const rfa = makeRfa(animation, context);
	writeFileAtomic(fileName, encodeRfa(rfa));
	return fileName;
}

export function convertBones(skin: SceneSkin): SkeletonBone[] {
	return resolveBones(createSkinContext(skin));
}

/** Writes the mesh BONE section for `bones` to `path` */
export function writeBoneSection(bones: readonly SkeletonBone[], path: string): string {
	writeFileAtomic(path, encodeBoneSection(bones));
	log(`Wrote ${bones.length} bones to ${path}`);
	return path;
}

/**
 * Resolves the selected skin's bones, then writes one .rfa per animation of the scene.
 * A skeleton failure aborts before any animation is written.
 */
export function convertScene(scene: Scene, options: ConvertOptions): ConversionResult {
	const skin = scene.skins[options.skinIndex];
	if (!skin) {
		throw new ConversionError(
			'DataMismatch',
			`skin ${options.skinIndex} not found: the scene has ${scene.skins.length} skin(s)`
		);
	}

	const context = createSkinContext(skin);
	const bones = resolveBones(context);
	log(`Skin ${skin.name ?? skin.index}: ${bones.length} bones`);

	const seen = new Set<string>();
	for (const animation of scene.animations) {
		const name = animationName(animation);
		if (seen.has(name)) {
			warn(`animation name "${name}" is used more than once, the later one overwrites ${name}.${RFA_EXTENSION}`);
		}
		seen.add(name);
	}

	const files = scene.animations.map((animation) => convertAnimationToRfa(animation, context, options.outputDir));
	return { bones, files };
}
