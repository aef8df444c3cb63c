/**
 * Stitch Module - Scroll capture alignment and compositing
 *
 * Components:
 * - RowHasher: per-row fingerprints over the central column band
 * - OffsetMatcher: exhaustive scroll offset search between two frames
 * - ContributionAggregator: absolute placement of every source row
 * - Compositor: per-pixel resolution with round-display masking
 * - Stitcher: the end-to-end pipeline
 *
 * @module stitch
 */

export {
	computeRowHashes,
	hashRow,
	rgbToInt,
	samplingBand,
	isDegenerateBand,
	type SamplingBand
} from './RowHasher';

export { findBestOffset, scoreOffset, scoreAllOffsets } from './OffsetMatcher';

export { ContributionMap, aggregateContributions, type Aggregation } from './ContributionAggregator';

export { composite, frameMiddle, isInsideCircle, type CompositeResult } from './Compositor';

export {
	stitchFrames,
	stitchSource,
	validateFrames,
	createStitcher,
	type Stitcher,
	type FrameSource
} from './Stitcher';

export { StitchInputError } from './errors';

export {
	CHANNELS,
	DEFAULT_STITCH_CONFIG,
	allocFrame,
	pixelAt,
	type Frame,
	type RowHash,
	type Rgba,
	type OffsetMatch,
	type Alignment,
	type Contribution,
	type StitchConfig,
	type StitchWarning,
	type StitchDiagnostics,
	type StitchResult,
	type Result
} from './types';
