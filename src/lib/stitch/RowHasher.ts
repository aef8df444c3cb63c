/**
 * RowHasher - Per-row content fingerprints for overlap detection
 *
 * Each row is hashed as a polynomial over its packed RGB values
 * (Horner scheme, seed 1, multiplier 31, modulo 2^64). Only the central
 * 40% of the row is sampled: a round display crops the left and right
 * edges differently as content scrolls, so the edges cannot be trusted
 * to line up between captures.
 *
 * @module stitch/RowHasher
 */

import { CHANNELS, type Frame, type RowHash } from './types';

/** Polynomial multiplier */
const HASH_MULTIPLIER = BigInt(31);

/** Initial hash value for every row */
const HASH_SEED = BigInt(1);

/** Left edge of the sampled band, as a fraction of width */
const BAND_START = 0.3;

/** Right edge (exclusive) of the sampled band, as a fraction of width */
const BAND_END = 0.7;

/**
 * Half-open column range [start, end) sampled by the hasher
 */
export interface SamplingBand {
	start: number;
	end: number;
}

/**
 * Columns sampled for a frame of the given width
 */
export function samplingBand(width: number): SamplingBand {
	return {
		start: Math.floor(width * BAND_START),
		end: Math.floor(width * BAND_END)
	};
}

/**
 * True when no column is sampled and every row hashes to the seed
 */
export function isDegenerateBand(width: number): boolean {
	const { start, end } = samplingBand(width);
	return end <= start;
}

/**
 * Pack an RGB triple into one integer (alpha is ignored)
 */
export function rgbToInt(r: number, g: number, b: number): number {
	return r * 0x10000 + g * 0x100 + b;
}

/**
 * Hash a single row of a frame over the sampled band
 */
export function hashRow(frame: Frame, y: number, band: SamplingBand = samplingBand(frame.width)): bigint {
	const { data, width } = frame;
	const rowStart = y * width * CHANNELS;
	let hash = HASH_SEED;

	for (let x = band.start; x < band.end; x++) {
		const i = rowStart + x * CHANNELS;
		const value = BigInt(rgbToInt(data[i], data[i + 1], data[i + 2]));
		hash = BigInt.asUintN(64, hash * HASH_MULTIPLIER + value);
	}

	return hash;
}

/**
 * Compute the RowHash of a frame, one value per row
 */
export function computeRowHashes(frame: Frame): RowHash {
	const band = samplingBand(frame.width);
	const hashes = new BigUint64Array(frame.height);

	for (let y = 0; y < frame.height; y++) {
		hashes[y] = hashRow(frame, y, band);
	}

	return hashes;
}
