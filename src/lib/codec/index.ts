/**
 * Codec Module - PNG decode/encode for captures and the stitched output
 *
 * @module codec
 */

export { decodePng, encodePng, writePng } from './PngCodec';
