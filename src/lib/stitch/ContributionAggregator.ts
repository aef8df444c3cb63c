/**
 * ContributionAggregator - Place every source row in the output canvas
 *
 * Frame 0 sits at absolute offset 0. Each later frame is matched against
 * its immediate predecessor only and its offset added to a running total,
 * so alignment error can accumulate across a long capture; there is no
 * global re-alignment pass.
 *
 * @module stitch/ContributionAggregator
 */

import { findBestOffset } from './OffsetMatcher';
import type { Alignment, Contribution, RowHash } from './types';

const NO_CONTRIBUTIONS: readonly Contribution[] = Object.freeze([]);

/**
 * Absolute output row -> ordered (frame, source row) samples
 *
 * Lists keep insertion order: frame index ascending, then source row ascending.
 */
export class ContributionMap {
	private readonly rowsByAbsolute = new Map<number, Contribution[]>();
	private maxRow = -1;
	private total = 0;

	/** Output height: highest populated row + 1 (0 when empty) */
	get height(): number {
		return this.maxRow + 1;
	}

	/** Total number of (frame, row) pairs */
	get size(): number {
		return this.total;
	}

	/**
	 * Record that `sourceRow` of `frameIndex` lands on output row `row`
	 */
	append(row: number, contribution: Contribution): void {
		if (!Number.isInteger(row) || row < 0) {
			throw new RangeError(`Output row must be a non-negative integer, got ${row}`);
		}

		const list = this.rowsByAbsolute.get(row);
		if (list) {
			list.push(contribution);
		} else {
			this.rowsByAbsolute.set(row, [contribution]);
		}

		this.total++;
		if (row > this.maxRow) {
			this.maxRow = row;
		}
	}

	/**
	 * Samples for an output row, empty when none
	 */
	get(row: number): readonly Contribution[] {
		return this.rowsByAbsolute.get(row) ?? NO_CONTRIBUTIONS;
	}

	/** Populated output rows in ascending order */
	rows(): number[] {
		return Array.from(this.rowsByAbsolute.keys()).sort((a, b) => a - b);
	}

	/** All pairs, in output row order */
	*entries(): IterableIterator<[row: number, contribution: Contribution]> {
		for (const row of this.rows()) {
			for (const contribution of this.get(row)) {
				yield [row, contribution];
			}
		}
	}
}

/**
 * Aggregated placement of all frames
 */
export interface Aggregation {
	map: ContributionMap;
	/** One entry per frame, in frame order */
	alignments: Alignment[];
}

/**
 * Append every row of a frame at its absolute offset
 */
function placeFrame(map: ContributionMap, frameIndex: number, height: number, absoluteOffset: number): void {
	for (let y = 0; y < height; y++) {
		map.append(y + absoluteOffset, { frameIndex, sourceRow: y });
	}
}

/**
 * Build the contribution map from the row hashes of frames in capture order
 *
 * The length of each RowHash is the height of its frame.
 */
export function aggregateContributions(rowHashes: readonly RowHash[]): Aggregation {
	const map = new ContributionMap();
	const alignments: Alignment[] = [];

	if (rowHashes.length === 0) {
		return { map, alignments };
	}

	placeFrame(map, 0, rowHashes[0].length, 0);
	alignments.push({ frameIndex: 0, offset: 0, absoluteOffset: 0, score: rowHashes[0].length });

	let absoluteOffset = 0;
	for (let i = 1; i < rowHashes.length; i++) {
		const { score, offset } = findBestOffset(rowHashes[i - 1], rowHashes[i]);
		absoluteOffset += offset;
		placeFrame(map, i, rowHashes[i].length, absoluteOffset);
		alignments.push({ frameIndex: i, offset, absoluteOffset, score });
	}

	return { map, alignments };
}
