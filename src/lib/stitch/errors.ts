/**
 * Fatal stitch errors
 *
 * Recoverable conditions are reported as StitchWarning values instead.
 *
 * @module stitch/errors
 */

/**
 * Frames or contribution data the stitcher cannot work with
 */
export class StitchInputError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'StitchInputError';
	}
}
