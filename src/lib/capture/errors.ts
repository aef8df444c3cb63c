/**
 * Fatal capture errors
 *
 * @module capture/errors
 */

/**
 * A device capture step failed
 */
export class CaptureError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'CaptureError';
	}
}

/**
 * Output or capture file layout could not be resolved
 */
export class CaptureSetupError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'CaptureSetupError';
	}
}
