/**
 * Capture file naming and output layout
 *
 * Captures for an output `<dir>/<name>.png` are stored beside it as
 * `<dir>/<name>_<NN>.png`, zero-padded to the digit count of the capture
 * limit, so a directory listing sorts them in capture order.
 *
 * @module capture/captureNaming
 */

import { existsSync, mkdirSync, readdirSync, unlinkSync } from 'node:fs';
import { dirname, join, parse } from 'node:path';
import { CaptureSetupError } from './errors';

/** Upper bound on auto-numbered output files per directory */
export const MAX_OUTPUT_FILES = 1000;

/**
 * Zero-pad `num` to the number of digits needed for indices below `max`
 */
export function paddedIndex(max: number, num: number): string {
	const digits = Math.ceil(Math.log10(max));
	return String(num).padStart(digits, '0');
}

/**
 * Path of capture `num` for a given prefix
 */
export function captureFilePath(dir: string, prefix: string, max: number, num: number): string {
	return `${join(dir, prefix)}${paddedIndex(max, num)}.png`;
}

/**
 * First `<dir>/<fileBase><index>.png` that does not exist yet
 */
export function findNextFileName(dir: string, fileBase: string, max: number): string {
	for (let i = 0; i < max; i++) {
		const name = captureFilePath(dir, fileBase, max, i);
		if (!existsSync(name)) {
			return name;
		}
	}
	throw new CaptureSetupError('Too many captures in directory. Could not generate filename.');
}

/**
 * Number of consecutive captures already on disk for a prefix
 */
export function findNumCaptures(dir: string, prefix: string, max: number): number {
	const next = findNextFileName(dir, prefix, max);
	const stem = parse(next).name;
	const index = Number.parseInt(stem.slice(stem.lastIndexOf('_') + 1), 10);
	if (Number.isNaN(index)) {
		throw new CaptureSetupError(`Could not read a capture index from ${next}`);
	}
	return index;
}

/**
 * Inputs for resolving the output file and capture layout
 */
export interface SetupFilesOptions {
	outDir: string;
	/** Auto-numbered output prefix, used when `name` is not given */
	prefix: string;
	/** Explicit output file name (overwritten if present) */
	name?: string;
	/** Whether new captures will be taken */
	capture: boolean;
	maxCaptures: number;
}

/**
 * Resolved output file and capture layout
 */
export interface FileLayout {
	outFile: string;
	captureDir: string;
	capturePrefix: string;
	/** Captures to take (capture mode) or already on disk (stitch-only mode) */
	captureCount: number;
}

/**
 * Resolve where the stitched image and its captures live
 *
 * Capture mode creates the output directory when missing; stitch-only mode
 * requires it and requires an explicit file name.
 */
export function setupFiles(options: SetupFilesOptions): FileLayout {
	const { outDir, prefix, name, capture, maxCaptures } = options;

	if (!existsSync(outDir)) {
		if (!capture) {
			throw new CaptureSetupError('Capture directory does not exist. Cannot stitch.');
		}
		mkdirSync(outDir, { recursive: true });
	}

	let outFile: string;
	if (name !== undefined) {
		outFile = join(outDir, name);
	} else if (capture) {
		outFile = findNextFileName(outDir, prefix, MAX_OUTPUT_FILES);
	} else {
		throw new CaptureSetupError('Must specify file-name in no-capture mode');
	}

	const { dir, name: stem } = parse(outFile);
	if (!stem) {
		throw new CaptureSetupError(`Invalid path, prefix, or file provided: ${outDir}, ${prefix}, ${name}`);
	}

	const capturePrefix = `${stem}_`;
	const captureDir = dir || dirname(outFile);
	const captureCount = capture ? maxCaptures : findNumCaptures(captureDir, capturePrefix, maxCaptures);

	return { outFile, captureDir, capturePrefix, captureCount };
}

/**
 * Delete every `<prefix>*.png` in a directory, returning how many were removed
 */
export function removeCaptures(dir: string, prefix: string): number {
	if (!existsSync(dir)) {
		return 0;
	}

	let removed = 0;
	for (const entry of readdirSync(dir)) {
		if (entry.startsWith(prefix) && entry.endsWith('.png')) {
			unlinkSync(join(dir, entry));
			removed++;
		}
	}
	return removed;
}
