/**
 * Capture Module - Device capture and on-disk frame layout
 *
 * Components:
 * - captureNaming: numbered capture files and output file resolution
 * - FrameSource: directory and in-memory frame sources for the stitcher
 * - AdbCaptureSession: scroll-and-screenshot loop over adb
 *
 * @module capture
 */

export {
	paddedIndex,
	captureFilePath,
	findNextFileName,
	findNumCaptures,
	setupFiles,
	removeCaptures,
	MAX_OUTPUT_FILES,
	type SetupFilesOptions,
	type FileLayout
} from './captureNaming';

export { DirectoryFrameSource, MemoryFrameSource } from './FrameSource';

export {
	AdbCaptureSession,
	createAdbCaptureSession,
	execFileRunner,
	type AdbCaptureConfig,
	type AdbCaptureDeps,
	type CaptureSessionResult,
	type CommandRunner,
	DEFAULT_ADB_CAPTURE_CONFIG
} from './AdbCaptureSession';

export { CaptureError, CaptureSetupError } from './errors';
