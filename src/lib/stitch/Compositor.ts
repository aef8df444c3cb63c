/**
 * Compositor - Resolve every output pixel from its overlapping samples
 *
 * Per output pixel (x, y):
 * 1. Split the row's samples into on-screen and off-screen. With the
 *    circular mask, a sample is on-screen only inside the circle inscribed
 *    in its source frame (a round display has no corners).
 * 2. Any on-screen sample: use the one whose source row is nearest the
 *    frame's vertical centre (first seen wins ties).
 * 3. Otherwise, inside the interior band H/2 <= y < outputHeight - H/2,
 *    copy the already-resolved pixel at (x, y - 2).
 * 4. Otherwise (top or bottom edge): transparent black when transparency is
 *    on, else the off-screen sample nearest the centre.
 *
 * Rule 3 reads earlier output rows, so rows are resolved strictly top to
 * bottom into a dense canvas.
 *
 * @module stitch/Compositor
 */

import type { ContributionMap } from './ContributionAggregator';
import { StitchInputError } from './errors';
import { CHANNELS, allocFrame, type Frame, type StitchConfig, type StitchWarning } from './types';

/** Row distance of the interior fallback sample */
const FALLBACK_ROW_DISTANCE = 2;

/** Margin between the frame edge and the circular mask, in pixels */
const MASK_MARGIN = 2;

/**
 * Output of the compositing pass
 */
export interface CompositeResult {
	canvas: Frame;
	warnings: StitchWarning[];
}

/**
 * A contribution with its per-row geometry precomputed
 */
interface Sample {
	frame: Frame;
	row: number;
	/** Vertical centre of the source frame */
	mid: number;
	/** |row - mid| */
	distance: number;
	/** (row - mid)^2, the row term of the mask test */
	rowTerm: number;
	/** Squared radius of the inscribed circle */
	radiusSquared: number;
}

/**
 * Vertical (and, for a round display, horizontal) centre of a frame
 */
export function frameMiddle(frameHeight: number): number {
	return (frameHeight - 1) / 2;
}

/**
 * Whether (x, row) lies inside the circle inscribed in a frame of the given height
 */
export function isInsideCircle(x: number, row: number, frameHeight: number): boolean {
	const mid = frameMiddle(frameHeight);
	const radius = frameHeight / 2 - MASK_MARGIN;
	return (x - mid) ** 2 + (row - mid) ** 2 < radius ** 2;
}

function toSample(frame: Frame, row: number): Sample {
	const mid = frameMiddle(frame.height);
	return {
		frame,
		row,
		mid,
		distance: Math.abs(row - mid),
		rowTerm: (row - mid) ** 2,
		radiusSquared: (frame.height / 2 - MASK_MARGIN) ** 2
	};
}

function copyPixel(source: Frame, sx: number, sy: number, target: Frame, tx: number, ty: number): void {
	const from = (sy * source.width + sx) * CHANNELS;
	const to = (ty * target.width + tx) * CHANNELS;
	target.data[to] = source.data[from];
	target.data[to + 1] = source.data[from + 1];
	target.data[to + 2] = source.data[from + 2];
	target.data[to + 3] = source.data[from + 3];
}

function clearPixel(target: Frame, x: number, y: number): void {
	const i = (y * target.width + x) * CHANNELS;
	target.data.fill(0, i, i + CHANNELS);
}

/**
 * Resolve samples for every row, rejecting references to missing frames or rows
 */
function resolveSamples(map: ContributionMap, frames: readonly Frame[], height: number): Sample[][] {
	const samples: Sample[][] = [];

	for (let y = 0; y < height; y++) {
		samples.push(
			map.get(y).map(({ frameIndex, sourceRow }) => {
				const frame = frames[frameIndex];
				if (!frame) {
					throw new StitchInputError(`Output row ${y} references missing frame ${frameIndex}`);
				}
				if (!Number.isInteger(sourceRow) || sourceRow < 0 || sourceRow >= frame.height) {
					throw new StitchInputError(
						`Output row ${y} references row ${sourceRow} of frame ${frameIndex} (height ${frame.height})`
					);
				}
				return toSample(frame, sourceRow);
			})
		);
	}

	return samples;
}

/**
 * Composite the canvas from a contribution map
 *
 * Canvas width is the width of frame 0, height is map.height. The interior
 * band is measured with the height of frame 0.
 */
export function composite(
	map: ContributionMap,
	frames: readonly Frame[],
	config: StitchConfig
): CompositeResult {
	if (frames.length === 0) {
		throw new StitchInputError('At least one frame is required');
	}

	const width = frames[0].width;
	const frameHeight = frames[0].height;
	for (let i = 1; i < frames.length; i++) {
		if (frames[i].width !== width) {
			throw new StitchInputError(`Frame ${i} is ${frames[i].width}px wide, expected ${width}px`);
		}
	}

	const outputHeight = map.height;
	const canvas = allocFrame(width, outputHeight);
	const warnings: StitchWarning[] = [];
	const samplesByRow = resolveSamples(map, frames, outputHeight);
	const bandStart = frameHeight / 2;
	const bandEnd = outputHeight - frameHeight / 2;

	for (let y = 0; y < outputHeight; y++) {
		const samples = samplesByRow[y];
		const inInteriorBand = y >= bandStart && y < bandEnd && y >= FALLBACK_ROW_DISTANCE;
		let gapPixels = 0;

		for (let x = 0; x < width; x++) {
			let onScreen: Sample | null = null;
			let offScreen: Sample | null = null;

			for (const sample of samples) {
				const visible =
					!config.useCircularMask || (x - sample.mid) ** 2 + sample.rowTerm < sample.radiusSquared;

				if (visible) {
					if (!onScreen || sample.distance < onScreen.distance) onScreen = sample;
				} else if (!offScreen || sample.distance < offScreen.distance) {
					offScreen = sample;
				}
			}

			if (onScreen) {
				copyPixel(onScreen.frame, x, onScreen.row, canvas, x, y);
			} else if (inInteriorBand) {
				copyPixel(canvas, x, y - FALLBACK_ROW_DISTANCE, canvas, x, y);
			} else if (config.useTransparency) {
				clearPixel(canvas, x, y);
			} else if (offScreen) {
				copyPixel(offScreen.frame, x, offScreen.row, canvas, x, y);
			} else {
				clearPixel(canvas, x, y);
				gapPixels++;
			}
		}

		if (gapPixels > 0) {
			warnings.push({
				kind: 'compositing-gap',
				row: y,
				pixelCount: gapPixels,
				message: `Row ${y}: ${gapPixels} pixel(s) had no sample and were left transparent`
			});
		}
	}

	return { canvas, warnings };
}
