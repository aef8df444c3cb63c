/**
 * stitch - capture a scrolling screen over adb and stitch it into one image
 *
 * Usage: npm run stitch -- [options]   (see --help)
 *
 * @module cli/stitch
 */

import { pathToFileURL } from 'node:url';
import chalk from 'chalk';
import {
	DirectoryFrameSource,
	createAdbCaptureSession,
	removeCaptures,
	setupFiles,
	type AdbCaptureDeps
} from '$lib/capture';
import { writePng } from '$lib/codec';
import { stitchSource, type StitchResult } from '$lib/stitch';
import { USAGE, UsageError, parseCliArgs, type CliOptions } from './args';

/**
 * Outcome of a CLI run
 */
export interface RunResult {
	outFile: string;
	frameCount: number;
	result: StitchResult;
}

/**
 * Capture (unless disabled), stitch and write the output image
 */
export async function run(options: CliOptions, deps: Partial<AdbCaptureDeps> = {}): Promise<RunResult> {
	const layout = setupFiles({
		outDir: options.outDir,
		prefix: options.filePrefix,
		name: options.fileName,
		capture: options.capture,
		maxCaptures: options.maxCaptures
	});

	let frameCount = layout.captureCount;
	if (options.capture) {
		removeCaptures(layout.captureDir, layout.capturePrefix);
		const session = createAdbCaptureSession(
			{
				adbArgs: options.adbArgs,
				interCaptureDelayMs: options.interCaptureDelayMs,
				maxCaptures: options.maxCaptures
			},
			deps
		);
		({ count: frameCount } = await session.capture(layout.captureDir, layout.capturePrefix));
	}

	const source = new DirectoryFrameSource(
		layout.captureDir,
		layout.capturePrefix,
		options.maxCaptures,
		frameCount
	);
	const result = await stitchSource(source, {
		useCircularMask: options.round,
		useTransparency: options.transparency
	});

	await writePng(result.canvas, layout.outFile);
	console.log('\n' + chalk.blue(`Wrote ${layout.outFile}`));

	if (!options.keepCaptures) {
		removeCaptures(layout.captureDir, layout.capturePrefix);
	}

	return { outFile: layout.outFile, frameCount, result };
}

/**
 * Parse argv, run, and map the outcome to a process exit code
 */
export async function main(argv: readonly string[]): Promise<number> {
	let options: CliOptions;
	try {
		options = parseCliArgs(argv);
	} catch (error: unknown) {
		if (error instanceof UsageError) {
			console.error(chalk.red(error.message));
			console.error(USAGE);
			return 2;
		}
		throw error;
	}

	if (options.help) {
		console.log(USAGE);
		return 0;
	}

	try {
		await run(options);
		return 0;
	} catch (error: unknown) {
		const message = error instanceof Error ? error.message : String(error);
		console.error(chalk.red(message));
		return 1;
	}
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
	main(process.argv.slice(2)).then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			console.error(error);
			process.exitCode = 1;
		}
	);
}
