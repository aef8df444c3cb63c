/**
 * Stitcher - Frames in, one composited canvas out
 *
 * Pipeline (strictly in frame order, fully synchronous):
 *   validate -> RowHasher -> ContributionAggregator (OffsetMatcher) -> Compositor
 *
 * @module stitch/Stitcher
 */

import { composite } from './Compositor';
import { aggregateContributions } from './ContributionAggregator';
import { StitchInputError } from './errors';
import { computeRowHashes, isDegenerateBand } from './RowHasher';
import {
	CHANNELS,
	DEFAULT_STITCH_CONFIG,
	type Frame,
	type Result,
	type StitchConfig,
	type StitchResult,
	type StitchWarning
} from './types';

/**
 * Anything that can hand over frames by index
 */
export interface FrameSource {
	readonly count: number;
	load(index: number): Promise<Frame>;
}

/**
 * Check the frame sequence before any hashing
 */
export function validateFrames(frames: readonly Frame[]): Result<readonly Frame[], StitchInputError> {
	if (frames.length === 0) {
		return { success: false, error: new StitchInputError('At least one frame is required') };
	}

	const { width } = frames[0];
	for (let i = 0; i < frames.length; i++) {
		const frame = frames[i];
		if (frame.width !== width) {
			return {
				success: false,
				error: new StitchInputError(`Frame ${i} is ${frame.width}px wide, expected ${width}px`)
			};
		}
		if (frame.data.length !== frame.width * frame.height * CHANNELS) {
			return {
				success: false,
				error: new StitchInputError(
					`Frame ${i} has ${frame.data.length} bytes, expected ${frame.width * frame.height * CHANNELS} for RGBA`
				)
			};
		}
	}

	return { success: true, data: frames };
}

/**
 * Stitch an ordered frame sequence
 *
 * @throws StitchInputError when the frames cannot be stitched
 */
export function stitchFrames(frames: readonly Frame[], config: Partial<StitchConfig> = {}): StitchResult {
	const resolved: StitchConfig = { ...DEFAULT_STITCH_CONFIG, ...config };

	const validation = validateFrames(frames);
	if (!validation.success) {
		throw validation.error;
	}

	const warnings: StitchWarning[] = [];
	if (isDegenerateBand(frames[0].width)) {
		// Widths are equal, so every frame shares the empty band
		frames.forEach((frame, frameIndex) => {
			warnings.push({
				kind: 'degenerate-hash',
				frameIndex,
				width: frame.width,
				message: `Frame ${frameIndex} is ${frame.width}px wide; no columns sampled, every row hashes to 1`
			});
		});
	}

	const rowHashes = frames.map((frame) => computeRowHashes(frame));
	const { map, alignments } = aggregateContributions(rowHashes);

	for (const alignment of alignments.slice(1)) {
		console.log(
			`[Stitcher] Match for frame ${alignment.frameIndex} - (${alignment.score}, ${alignment.offset})`
		);
	}
	console.log(`[Stitcher] Producing an image with height ${map.height}`);

	const { canvas, warnings: compositeWarnings } = composite(map, frames, resolved);
	warnings.push(...compositeWarnings);

	for (const warning of warnings) {
		console.warn(`[Stitcher] ${warning.message}`);
	}

	return {
		canvas,
		diagnostics: { matches: alignments, warnings }
	};
}

/**
 * Load every frame from a source, in index order, then stitch
 */
export async function stitchSource(
	source: FrameSource,
	config: Partial<StitchConfig> = {}
): Promise<StitchResult> {
	const frames: Frame[] = [];
	for (let i = 0; i < source.count; i++) {
		frames.push(await source.load(i));
	}
	return stitchFrames(frames, config);
}

/**
 * Stitcher bound to one configuration
 */
export interface Stitcher {
	readonly config: StitchConfig;
	stitch(frames: readonly Frame[]): StitchResult;
	stitchSource(source: FrameSource): Promise<StitchResult>;
}

/**
 * Create a Stitcher with defaults filled in
 */
export function createStitcher(config: Partial<StitchConfig> = {}): Stitcher {
	const resolved: StitchConfig = { ...DEFAULT_STITCH_CONFIG, ...config };
	return {
		config: resolved,
		stitch: (frames) => stitchFrames(frames, resolved),
		stitchSource: (source) => stitchSource(source, resolved)
	};
}
