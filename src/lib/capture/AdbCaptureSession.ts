/**
 * AdbCaptureSession - Scroll a device and capture each screen over adb
 *
 * Each iteration takes a screenshot on the device, sends a short upward
 * swipe, then pulls the screenshot. Two byte-identical captures in a row
 * mean the content stopped scrolling: the duplicate is dropped and the
 * session ends.
 *
 * @module capture/AdbCaptureSession
 */

import { execFile } from 'node:child_process';
import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { promisify } from 'node:util';
import { captureFilePath, paddedIndex } from './captureNaming';
import { CaptureError } from './errors';

const execFileAsync = promisify(execFile);

/**
 * Runs an external command to completion, rejecting on failure
 */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<void>;

/**
 * Configuration for a capture session
 */
export interface AdbCaptureConfig {
	/** Extra adb arguments, whitespace separated (e.g. "-e" or "-s emulator-5554") */
	adbArgs: string;
	/** Wait after each capture so the scrollbar can fade, in milliseconds */
	interCaptureDelayMs: number;
	/** Upper bound on captures */
	maxCaptures: number;
	/** Device directory screenshots are written to */
	remoteDir: string;
	/** Swipe gesture sent between captures */
	swipe: { x: number; fromY: number; toY: number };
}

/**
 * Default configuration
 */
export const DEFAULT_ADB_CAPTURE_CONFIG: AdbCaptureConfig = {
	adbArgs: '',
	interCaptureDelayMs: 1000,
	maxCaptures: 50,
	remoteDir: '/sdcard',
	swipe: { x: 50, fromY: 200, toY: 100 }
};

/**
 * Injectable side effects
 */
export interface AdbCaptureDeps {
	runner: CommandRunner;
	sleep: (ms: number) => Promise<void>;
}

/**
 * Outcome of a capture session
 */
export interface CaptureSessionResult {
	/** Distinct captures on disk, numbered from 0 */
	count: number;
	/** Whether the session stopped on a duplicate rather than the limit */
	reachedEnd: boolean;
}

/**
 * Default runner: spawn the command directly, no shell
 */
export const execFileRunner: CommandRunner = async (file, args) => {
	await execFileAsync(file, [...args]);
};

async function md5Of(path: string): Promise<string> {
	return createHash('md5')
		.update(await readFile(path))
		.digest('hex');
}

/**
 * AdbCaptureSession - Captures a scrolling screen into numbered PNGs
 *
 * @example
 * ```typescript
 * const session = new AdbCaptureSession({ adbArgs: '-e', maxCaptures: 20 });
 * const { count } = await session.capture('./shots', 'stitch000_');
 * ```
 */
export class AdbCaptureSession {
	readonly config: AdbCaptureConfig;
	private readonly deps: AdbCaptureDeps;

	/**
	 * @param config - Session configuration
	 * @param deps - Command runner and sleep, replaced in tests
	 */
	constructor(config: Partial<AdbCaptureConfig> = {}, deps: Partial<AdbCaptureDeps> = {}) {
		this.config = { ...DEFAULT_ADB_CAPTURE_CONFIG, ...config };
		this.deps = {
			runner: deps.runner ?? execFileRunner,
			sleep: deps.sleep ?? ((ms) => delay(ms))
		};
	}

	/**
	 * Run `adb <adbArgs> <command...>`
	 */
	async adb(...command: string[]): Promise<void> {
		const args = [...this.config.adbArgs.split(/\s+/).filter(Boolean), ...command];
		console.log(`[AdbCaptureSession] Executing adb command: adb ${args.join(' ')}`);
		try {
			await this.deps.runner('adb', args);
		} catch (error: unknown) {
			const message = error instanceof Error ? error.message : String(error);
			throw new CaptureError(`adb ${args.join(' ')} failed: ${message}`);
		}
	}

	/**
	 * Capture until the screen stops changing or the limit is hit
	 *
	 * @param captureDir - Local directory for the pulled PNGs
	 * @param capturePrefix - File prefix, e.g. "stitch000_"
	 */
	async capture(captureDir: string, capturePrefix: string): Promise<CaptureSessionResult> {
		const { maxCaptures, remoteDir, swipe, interCaptureDelayMs } = this.config;
		let previousDigest: string | null = null;

		for (let i = 0; i < maxCaptures; i++) {
			const remoteFile = `${remoteDir}/${paddedIndex(maxCaptures, i)}.png`;
			const localFile = captureFilePath(captureDir, capturePrefix, maxCaptures, i);

			console.log(`[AdbCaptureSession] Capturing image ${i}`);
			await this.adb('shell', 'screencap', '-p', remoteFile);
			await this.adb(
				'shell',
				'input',
				'swipe',
				String(swipe.x),
				String(swipe.fromY),
				String(swipe.x),
				String(swipe.toY)
			);
			await this.adb('pull', remoteFile, localFile);

			if (!existsSync(localFile)) {
				throw new CaptureError('Failed to capture screenshot. Is your device connected?');
			}

			const digest = await md5Of(localFile);
			if (digest === previousDigest) {
				return { count: i, reachedEnd: true };
			}
			previousDigest = digest;

			await this.deps.sleep(interCaptureDelayMs);
		}

		return { count: maxCaptures, reachedEnd: false };
	}
}

/**
 * Create an AdbCaptureSession instance
 */
export function createAdbCaptureSession(
	config?: Partial<AdbCaptureConfig>,
	deps?: Partial<AdbCaptureDeps>
): AdbCaptureSession {
	return new AdbCaptureSession(config, deps);
}
