#!/usr/bin/env npx tsx
/**
 * glTF to Red Faction animation converter
 *
 * Usage:
 *   npx tsx app/cli.ts <command> [args...]
 *
 * Commands:
 *   convert <input.gltf|glb> [-o dir] [--skin n] [--log-file path]
 *                           Write one .rfa per animation, bound to skin n
 *   bones <input.gltf|glb> [--skin n] [-o file]
 *                           Print the resolved bone table of skin n,
 *                           optionally writing it as a mesh BONE section
 *   info <file.rfa>         Show an RFA header and per-bone key counts
 */

import { existsSync, mkdirSync, readFileSync } from 'fs';
import { basename, dirname, resolve } from 'path';
import { resolveOptions } from '../lib/config';
import type { ConvertOptions } from '../lib/config';
import { convertBones, convertScene, writeBoneSection } from '../lib/convert';
import { isConversionError } from '../lib/errors';
import { loadScene } from '../lib/gltf';
import { closeLogger, error, initLogger, log } from '../lib/logger';
import { readRfa } from '../lib/rfa-reader';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class UsageError extends Error {}

interface ParsedArgs {
	positional: string[];
	flags: Map<string, string>;
}

const FLAG_ALIASES: Record<string, string> = { '-o': '--output' };

function parseArgs(args: string[]): ParsedArgs {
	const positional: string[] = [];
	const flags = new Map<string, string>();
	for (let i = 0; i < args.length; i++) {
		const arg = FLAG_ALIASES[args[i]] ?? args[i];
		if (!arg.startsWith('--')) {
			positional.push(arg);
			continue;
		}
		const value = args[i + 1];
		if (value === undefined) throw new UsageError(`Missing value for ${arg}`);
		flags.set(arg, value);
		i++;
	}
	return { positional, flags };
}

function parseSkinIndex(flags: Map<string, string>): number | undefined {
	const value = flags.get('--skin');
	if (value === undefined) return undefined;
	const index = Number(value);
	if (!Number.isInteger(index) || index < 0) throw new UsageError(`Invalid skin index: ${value}`);
	return index;
}

function inputFile(positional: string[], usage: string): string {
	if (!positional[0]) throw new UsageError(`Usage: ${usage}`);
	const path = resolve(positional[0]);
	if (!existsSync(path)) throw new UsageError(`File not found: ${path}`);
	return path;
}

function fmt(values: readonly number[], digits = 4): string {
	return values.map((v) => v.toFixed(digits)).join(', ');
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function cmdConvert(args: ParsedArgs): Promise<void> {
	const input = inputFile(args.positional, 'convert <input.gltf|glb> [-o dir] [--skin n] [--log-file path]');
	const options: ConvertOptions = resolveOptions(input, {
		outputDir: args.flags.get('--output'),
		skinIndex: parseSkinIndex(args.flags),
		logFile: args.flags.get('--log-file'),
	});
	if (options.logFile) initLogger(resolve(options.logFile));

	log(`Loading ${basename(input)}`);
	const scene = await loadScene(input);
	mkdirSync(options.outputDir, { recursive: true });

	const result = convertScene(scene, options);
	log(`Wrote ${result.files.length} animation(s) to ${options.outputDir}`);
}

async function cmdBones(args: ParsedArgs): Promise<void> {
	const input = inputFile(args.positional, 'bones <input.gltf|glb> [--skin n] [-o file]');
	const skinIndex = parseSkinIndex(args.flags) ?? 0;
	const scene = await loadScene(input);
	const skin = scene.skins[skinIndex];
	if (!skin) throw new UsageError(`Skin ${skinIndex} not found: the scene has ${scene.skins.length} skin(s)`);

	const bones = convertBones(skin);
	console.log(`\n=== Bones: ${skin.name ?? `skin ${skinIndex}`} (${bones.length}) ===\n`);
	bones.forEach((bone, i) => {
		console.log(`  [${String(i).padStart(2)}] ${bone.name.padEnd(24)} parent=${String(bone.parentIndex).padStart(2)}`);
		console.log(`       rotation=(${fmt(bone.baseRotation)})  translation=(${fmt(bone.baseTranslation)})`);
	});

	const output = args.flags.get('--output');
	if (output) {
		const path = resolve(output);
		mkdirSync(dirname(path), { recursive: true });
		writeBoneSection(bones, path);
	}
}

function cmdInfo(args: ParsedArgs): void {
	const path = inputFile(args.positional, 'info <file.rfa>');
	const { header, bones } = readRfa(readFileSync(path));

	console.log(`\n=== RFA Info: ${basename(path)} ===\n`);
	console.log(`  Version:          ${header.version}`);
	console.log(`  Time range:       ${header.startTime} .. ${header.endTime} ticks`);
	console.log(`  Ramp in/out:      ${header.rampInTime} / ${header.rampOutTime}`);
	console.log(`  Morph:            ${header.numMorphVertices} vertices, ${header.numMorphKeyframes} keyframes`);
	console.log(`  Total rotation:   (${fmt(header.totalRotation)})`);
	console.log(`  Total translation:(${fmt(header.totalTranslation)})`);
	console.log(`\nBones: ${header.numBones}`);
	bones.forEach((bone, i) => {
		console.log(`  [${String(i).padStart(2)}] weight=${bone.weight.toFixed(2)}  rot=${bone.rotationKeys.length}  pos=${bone.translationKeys.length}`);
	});
}

function printUsage(): void {
	console.log(`
rfa-convert - glTF skeletal animation to Red Faction RFA

Usage: npx tsx app/cli.ts <command> [args...]

Commands:
  convert <input> [-o dir] [--skin n] [--log-file path]
                              Write one .rfa per animation
  bones <input> [--skin n] [-o file]
                              Print the resolved bone table, optionally
                              writing the mesh BONE section to file
  info <file.rfa>             RFA header and per-bone key counts
`);
}

async function main(argv: string[]): Promise<void> {
	const [command, ...rest] = argv;
	if (!command || command === '--help' || command === '-h') {
		printUsage();
		return;
	}

	const args = parseArgs(rest);
	switch (command) {
		case 'convert':
			await cmdConvert(args);
			break;
		case 'bones':
			await cmdBones(args);
			break;
		case 'info':
			cmdInfo(args);
			break;
		default:
			throw new UsageError(`Unknown command: ${command}`);
	}
}

main(process.argv.slice(2))
	.then(() => closeLogger())
	.catch(async (e: unknown) => {
		if (e instanceof UsageError) {
			console.error(`Error: ${e.message}`);
		} else if (isConversionError(e)) {
			error(`${e.kind}: ${e.message}`);
		} else {
			error('Conversion failed', e);
		}
		await closeLogger();
		process.exit(1);
	});
