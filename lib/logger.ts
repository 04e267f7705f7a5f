import { createWriteStream, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { WriteStream } from 'fs';

let stream: WriteStream | null = null;

function ts(): string { return new Date().toISOString().slice(11, 23); }

/**
 * Mirrors every log line into `logPath` (truncated on open) until closeLogger().
 */
export function initLogger(logPath: string): void {
	mkdirSync(dirname(logPath), { recursive: true });
	const opened = createWriteStream(logPath, { flags: 'w' });
	opened.on('error', (err) => {
		// Keep logging to the console only
		if (stream === opened) stream = null;
		console.error(`${ts()} [ERROR] Cannot write log file ${logPath}: ${err.message}`);
	});
	opened.write(`=== rfa-convert started ${new Date().toISOString()} ===\n`);
	stream = opened;
}

export function closeLogger(): Promise<void> {
	const current = stream;
	stream = null;
	return new Promise((resolve) => {
		if (!current) {
			resolve();
			return;
		}
		current.end(() => resolve());
	});
}

function write(level: string, msg: string): void {
	stream?.write(`${ts()} [${level}] ${msg}\n`);
}

export function log(msg: string): void {
	console.log(`${ts()} ${msg}`);
	write('INFO', msg);
}

export function warn(msg: string): void {
	console.warn(`${ts()} [WARN] ${msg}`);
	write('WARN', msg);
}

export function error(msg: string, err?: unknown): void {
	const detail = err ? ` ${err instanceof Error ? err.stack || err.message : String(err)}` : '';
	console.error(`${ts()} [ERROR] ${msg}${detail}`);
	write('ERROR', `${msg}${detail}`);
}
