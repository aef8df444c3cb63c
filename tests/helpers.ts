import { allocFrame, CHANNELS, type Frame, type Rgba } from '$lib/stitch';

/**
 * Frame filled with one colour
 */
export function solidFrame(width: number, height: number, color: Rgba): Frame {
	const frame = allocFrame(width, height);
	for (let i = 0; i < width * height; i++) {
		frame.data.set(color, i * CHANNELS);
	}
	return frame;
}

/**
 * Frame whose row y is filled with rowColor(y)
 */
export function frameFromRows(width: number, height: number, rowColor: (y: number) => Rgba): Frame {
	const frame = allocFrame(width, height);
	for (let y = 0; y < height; y++) {
		const color = rowColor(y);
		for (let x = 0; x < width; x++) {
			frame.data.set(color, (y * width + x) * CHANNELS);
		}
	}
	return frame;
}

/**
 * Opaque colour that is unique for every id below 65536
 */
export function idColor(id: number): Rgba {
	return [id & 0xff, (id >> 8) & 0xff, 7, 255];
}

/**
 * Window of `height` rows of a virtual strip where strip row r has colour idColor(r)
 */
export function stripWindow(width: number, height: number, top: number): Frame {
	return frameFromRows(width, height, (y) => idColor(top + y));
}

/**
 * Overwrite one pixel
 */
export function setPixel(frame: Frame, x: number, y: number, color: Rgba): void {
	frame.data.set(color, (y * frame.width + x) * CHANNELS);
}

/**
 * Build a BigUint64Array from plain numbers
 */
export function hashes(...values: number[]): BigUint64Array {
	return BigUint64Array.from(values.map((v) => BigInt(v)));
}
