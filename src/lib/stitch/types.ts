/**
 * Stitch data model
 *
 * Frames are row-major RGBA, the same layout as ImageData.data.
 * Everything else here is derived per run and never persisted.
 *
 * @module stitch/types
 */

/** Bytes per pixel in every frame and in the output canvas */
export const CHANNELS = 4;

/**
 * A decoded capture (or the composited canvas)
 */
export interface Frame {
	width: number;
	height: number;
	/** RGBA bytes, length = width * height * 4 */
	data: Uint8ClampedArray;
}

/** One unsigned 64-bit fingerprint per frame row */
export type RowHash = BigUint64Array;

/** RGBA tuple in 0-255 range */
export type Rgba = [r: number, g: number, b: number, a: number];

/**
 * Best vertical shift between two consecutive frames
 */
export interface OffsetMatch {
	/** Number of rows whose hashes agree at this offset */
	score: number;
	/** Rows scrolled relative to the previous frame */
	offset: number;
}

/**
 * Placement of a single frame in the output canvas
 */
export interface Alignment {
	frameIndex: number;
	/** Shift relative to the previous frame (0 for frame 0) */
	offset: number;
	/** Sum of offsets up to and including this frame */
	absoluteOffset: number;
	/** Match score that chose the offset (frame height for frame 0) */
	score: number;
}

/**
 * A source sample available for an output row
 */
export interface Contribution {
	frameIndex: number;
	sourceRow: number;
}

/**
 * Compositing configuration
 */
export interface StitchConfig {
	/** Display is round: samples outside the inscribed circle are off-screen */
	useCircularMask: boolean;
	/** Fill unsampled edge corners with transparent black instead of the nearest sample */
	useTransparency: boolean;
}

/**
 * Default configuration (round display, opaque corners)
 */
export const DEFAULT_STITCH_CONFIG: StitchConfig = {
	useCircularMask: true,
	useTransparency: false
};

/**
 * Non-fatal conditions collected while stitching
 */
export type StitchWarning =
	| {
			kind: 'degenerate-hash';
			frameIndex: number;
			width: number;
			message: string;
	  }
	| {
			kind: 'compositing-gap';
			/** Output row containing the unresolved pixels */
			row: number;
			/** Number of pixels in the row left transparent */
			pixelCount: number;
			message: string;
	  };

/**
 * Observability output of a stitch run
 */
export interface StitchDiagnostics {
	/** One entry per frame, in frame order */
	matches: Alignment[];
	warnings: StitchWarning[];
}

/**
 * Result of a complete stitch
 */
export interface StitchResult {
	canvas: Frame;
	diagnostics: StitchDiagnostics;
}

// Result monad for consistent error handling
export type Result<T, E = Error> =
	| { success: true; data: T }
	| { success: false; error: E };

/**
 * Allocate a zeroed (fully transparent) frame
 */
export function allocFrame(width: number, height: number): Frame {
	return {
		width,
		height,
		data: new Uint8ClampedArray(width * height * CHANNELS)
	};
}

/**
 * Read the RGBA value at (x, y)
 */
export function pixelAt(frame: Frame, x: number, y: number): Rgba {
	const i = (y * frame.width + x) * CHANNELS;
	return [frame.data[i], frame.data[i + 1], frame.data[i + 2], frame.data[i + 3]];
}
