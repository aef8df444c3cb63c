/**
 * PngCodec Tests
 *
 * sharp runs in process; files go to a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import sharp from 'sharp';
import { decodePng, encodePng, writePng } from '$lib/codec';
import { allocFrame, pixelAt } from '$lib/stitch';
import { setPixel, solidFrame } from '../helpers';

describe('PngCodec', () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'png-codec-'));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it('should keep RGBA pixels through encode and decode', async () => {
		const frame = solidFrame(4, 3, [12, 34, 56, 255]);
		setPixel(frame, 0, 0, [0, 0, 0, 0]);
		setPixel(frame, 3, 2, [200, 100, 50, 255]);

		const decoded = await decodePng(await encodePng(frame));

		expect(decoded.width).toBe(4);
		expect(decoded.height).toBe(3);
		expect(decoded.data).toEqual(frame.data);
	});

	it('should add an opaque alpha channel to RGB images', async () => {
		const png = await sharp({
			create: { width: 2, height: 2, channels: 3, background: { r: 10, g: 20, b: 30 } }
		})
			.png()
			.toBuffer();

		const decoded = await decodePng(png);

		expect(decoded.data.length).toBe(16);
		expect(pixelAt(decoded, 1, 1)).toEqual([10, 20, 30, 255]);
	});

	it('should write a PNG file that decodes from its path', async () => {
		const path = join(dir, 'out.png');

		await writePng(solidFrame(2, 5, [1, 2, 3, 255]), path);

		expect(existsSync(path)).toBe(true);
		const decoded = await decodePng(path);
		expect(decoded.height).toBe(5);
		expect(pixelAt(decoded, 1, 4)).toEqual([1, 2, 3, 255]);
	});

	it('should refuse to encode an empty image', async () => {
		await expect(encodePng(allocFrame(0, 0))).rejects.toThrow('Cannot encode an empty 0x0 image');
	});
});
