/**
 * OffsetMatcher - Find the vertical scroll distance between two captures
 *
 * Every candidate offset o is scored by counting rows z where
 * current[z] === previous[z + o]. The winner maximizes (score, offset)
 * lexicographically, so equal scores resolve to the larger offset.
 *
 * Exhaustive: O(H^2) hash comparisons per frame pair.
 *
 * @module stitch/OffsetMatcher
 */

import type { OffsetMatch, RowHash } from './types';

/**
 * Count matching rows when `current` is shifted down by `offset` rows
 */
export function scoreOffset(previous: RowHash, current: RowHash, offset: number): number {
	const overlap = Math.min(current.length, previous.length - offset);
	let score = 0;

	for (let z = 0; z < overlap; z++) {
		if (current[z] === previous[z + offset]) {
			score++;
		}
	}

	return score;
}

/**
 * Score every offset in [0, previous.length)
 *
 * Index i of the returned array holds the score for offset i.
 */
export function scoreAllOffsets(previous: RowHash, current: RowHash): Uint32Array {
	const scores = new Uint32Array(previous.length);
	for (let offset = 0; offset < previous.length; offset++) {
		scores[offset] = scoreOffset(previous, current, offset);
	}
	return scores;
}

/**
 * Best offset of `current` relative to `previous`
 *
 * An empty `previous` has no candidates and yields { score: 0, offset: 0 }.
 */
export function findBestOffset(previous: RowHash, current: RowHash): OffsetMatch {
	const scores = scoreAllOffsets(previous, current);
	let best: OffsetMatch = { score: 0, offset: 0 };

	for (let offset = 0; offset < scores.length; offset++) {
		// >= so that a later (larger) offset wins a tie
		if (scores[offset] >= best.score) {
			best = { score: scores[offset], offset };
		}
	}

	return best;
}
