/**
 * Scroll capture stitching
 *
 * @module scrollstitch
 */

export * from './stitch';
export * from './capture';
export * from './codec';
