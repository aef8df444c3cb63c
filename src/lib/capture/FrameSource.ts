/**
 * Frame sources - where the stitcher's frames come from
 *
 * @module capture/FrameSource
 */

import { decodePng } from '$lib/codec';
import type { Frame, FrameSource } from '$lib/stitch';
import { captureFilePath } from './captureNaming';

/**
 * Numbered PNG captures in a directory: `<dir>/<prefix><NN>.png`
 *
 * @example
 * ```typescript
 * const source = new DirectoryFrameSource('./shots', 'stitch000_', 50, 12);
 * const result = await stitchSource(source);
 * ```
 */
export class DirectoryFrameSource implements FrameSource {
	readonly count: number;
	private readonly dir: string;
	private readonly prefix: string;
	private readonly maxCaptures: number;

	constructor(dir: string, prefix: string, maxCaptures: number, count: number) {
		this.dir = dir;
		this.prefix = prefix;
		this.maxCaptures = maxCaptures;
		this.count = count;
	}

	/** File backing frame `index` */
	pathOf(index: number): string {
		return captureFilePath(this.dir, this.prefix, this.maxCaptures, index);
	}

	load(index: number): Promise<Frame> {
		if (index < 0 || index >= this.count) {
			return Promise.reject(new RangeError(`Frame ${index} out of range [0, ${this.count})`));
		}
		return decodePng(this.pathOf(index));
	}
}

/**
 * Frames already decoded in memory
 */
export class MemoryFrameSource implements FrameSource {
	private readonly frames: readonly Frame[];

	constructor(frames: readonly Frame[]) {
		this.frames = frames;
	}

	get count(): number {
		return this.frames.length;
	}

	load(index: number): Promise<Frame> {
		const frame = this.frames[index];
		if (!frame) {
			return Promise.reject(new RangeError(`Frame ${index} out of range [0, ${this.frames.length})`));
		}
		return Promise.resolve(frame);
	}
}
