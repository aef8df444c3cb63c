/**
 * PngCodec - Frame <-> PNG through sharp
 *
 * Decoding always yields 8-bit sRGB RGBA so every frame shares the layout
 * the stitcher expects, whatever the capture's own colour type.
 *
 * @module codec/PngCodec
 */

import sharp from 'sharp';
import { CHANNELS, type Frame } from '$lib/stitch';

/**
 * Decode a PNG (file path or bytes) into an RGBA frame
 */
export async function decodePng(input: string | Buffer): Promise<Frame> {
	const { data, info } = await sharp(input)
		.toColourspace('srgb')
		.ensureAlpha()
		.raw()
		.toBuffer({ resolveWithObject: true });

	if (info.channels !== CHANNELS) {
		throw new Error(`Expected ${CHANNELS} channels after decode, got ${info.channels}`);
	}

	return {
		width: info.width,
		height: info.height,
		data: new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength)
	};
}

function rawInput(frame: Frame): sharp.Sharp {
	if (frame.width === 0 || frame.height === 0) {
		throw new Error(`Cannot encode an empty ${frame.width}x${frame.height} image`);
	}

	return sharp(Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength), {
		raw: { width: frame.width, height: frame.height, channels: CHANNELS }
	});
}

/**
 * Encode an RGBA frame as PNG bytes
 */
export async function encodePng(frame: Frame): Promise<Buffer> {
	return rawInput(frame).png().toBuffer();
}

/**
 * Encode an RGBA frame and write it to disk
 */
export async function writePng(frame: Frame, path: string): Promise<void> {
	await rawInput(frame).png().toFile(path);
}
