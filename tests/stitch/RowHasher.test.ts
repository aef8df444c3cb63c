/**
 * RowHasher Tests
 *
 * Tests cover:
 * - Sampling band bounds
 * - RGB packing
 * - Exact polynomial values, including 64-bit wraparound
 * - Independence from pixels outside the band and from alpha
 * - Degenerate widths
 */

import { describe, it, expect } from 'vitest';
import {
	computeRowHashes,
	hashRow,
	isDegenerateBand,
	rgbToInt,
	samplingBand
} from '$lib/stitch/RowHasher';
import { frameFromRows, setPixel, solidFrame } from '../helpers';

describe('RowHasher', () => {
	describe('samplingBand', () => {
		it('should cover the central 40% of the row', () => {
			expect(samplingBand(10)).toEqual({ start: 3, end: 7 });
			expect(samplingBand(100)).toEqual({ start: 30, end: 70 });
		});

		it('should floor both edges', () => {
			expect(samplingBand(8)).toEqual({ start: 2, end: 5 });
			expect(samplingBand(16)).toEqual({ start: 4, end: 11 });
		});

		it('should be empty only for widths below 2', () => {
			expect(isDegenerateBand(0)).toBe(true);
			expect(isDegenerateBand(1)).toBe(true);
			expect(isDegenerateBand(2)).toBe(false);
			expect(isDegenerateBand(3)).toBe(false);
		});
	});

	describe('rgbToInt', () => {
		it('should pack channels as R*65536 + G*256 + B', () => {
			expect(rgbToInt(1, 2, 3)).toBe(66051);
			expect(rgbToInt(255, 255, 255)).toBe(0xffffff);
			expect(rgbToInt(0, 0, 0)).toBe(0);
		});
	});

	describe('hashRow', () => {
		it('should apply hash = hash * 31 + value from a seed of 1', () => {
			// Band [3, 7): four samples of value 1
			const frame = solidFrame(10, 1, [0, 0, 1, 255]);
			expect(hashRow(frame, 0)).toBe(BigInt(954305));
		});

		it('should hash columns left to right', () => {
			const frame = solidFrame(10, 1, [0, 0, 0, 255]);
			setPixel(frame, 3, 0, [0x0a, 0x14, 0x1e, 255]);
			setPixel(frame, 4, 0, [0x28, 0x32, 0x3c, 255]);
			setPixel(frame, 5, 0, [0x0a, 0x14, 0x1e, 255]);
			setPixel(frame, 6, 0, [0x28, 0x32, 0x3c, 255]);
			expect(hashRow(frame, 0)).toBe(BigInt(22232849341));
		});

		it('should wrap modulo 2^64', () => {
			// Band [30, 70): forty white samples
			const frame = solidFrame(100, 1, [255, 255, 255, 255]);
			expect(hashRow(frame, 0)).toBe(BigInt('12976549085419870337'));
		});

		it('should return the seed when the band is empty', () => {
			const frame = solidFrame(1, 3, [200, 100, 50, 255]);
			expect(hashRow(frame, 1)).toBe(BigInt(1));
		});
	});

	describe('computeRowHashes', () => {
		it('should produce one hash per row', () => {
			const frame = frameFromRows(10, 6, (y) => [y, y, y, 255]);
			const result = computeRowHashes(frame);

			expect(result).toBeInstanceOf(BigUint64Array);
			expect(result.length).toBe(6);
		});

		it('should match hashRow for every row', () => {
			const frame = frameFromRows(10, 3, (y) => [0x10 * y, 0x20, 0x30, 255]);
			const result = computeRowHashes(frame);

			for (let y = 0; y < 3; y++) {
				expect(result[y]).toBe(hashRow(frame, y));
			}
			expect(result[1]).toBe(BigInt(32533947265));
		});

		it('should give equal rows equal hashes', () => {
			const frame = solidFrame(10, 4, [9, 8, 7, 255]);
			const result = computeRowHashes(frame);

			expect(new Set(result).size).toBe(1);
		});

		it('should ignore pixels outside the band', () => {
			const a = solidFrame(10, 2, [50, 60, 70, 255]);
			const b = solidFrame(10, 2, [50, 60, 70, 255]);
			setPixel(b, 0, 0, [1, 1, 1, 255]);
			setPixel(b, 2, 1, [1, 1, 1, 255]);
			setPixel(b, 7, 0, [1, 1, 1, 255]);
			setPixel(b, 9, 1, [1, 1, 1, 255]);

			expect(computeRowHashes(b)).toEqual(computeRowHashes(a));
		});

		it('should change when a pixel inside the band changes', () => {
			const a = solidFrame(10, 2, [50, 60, 70, 255]);
			const b = solidFrame(10, 2, [50, 60, 70, 255]);
			setPixel(b, 6, 1, [50, 60, 71, 255]);

			const ha = computeRowHashes(a);
			const hb = computeRowHashes(b);
			expect(hb[0]).toBe(ha[0]);
			expect(hb[1]).not.toBe(ha[1]);
		});

		it('should ignore alpha', () => {
			const opaque = solidFrame(10, 1, [50, 60, 70, 255]);
			const clear = solidFrame(10, 1, [50, 60, 70, 0]);

			expect(computeRowHashes(clear)).toEqual(computeRowHashes(opaque));
		});

		it('should return an empty array for a zero-height frame', () => {
			expect(computeRowHashes(solidFrame(10, 0, [0, 0, 0, 255])).length).toBe(0);
		});

		it('should hash every row to 1 when the frame is one pixel wide', () => {
			const frame = frameFromRows(1, 3, (y) => [y * 40, 0, 0, 255]);
			expect(Array.from(computeRowHashes(frame))).toEqual([BigInt(1), BigInt(1), BigInt(1)]);
		});
	});
});
