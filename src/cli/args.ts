/**
 * Command-line options for the stitch tool
 *
 * @module cli/args
 */

import { parseArgs } from 'node:util';

/**
 * Fully resolved CLI options
 */
export interface CliOptions {
	outDir: string;
	filePrefix: string;
	fileName?: string;
	adbArgs: string;
	capture: boolean;
	round: boolean;
	transparency: boolean;
	interCaptureDelayMs: number;
	keepCaptures: boolean;
	maxCaptures: number;
	help: boolean;
}

/**
 * Invalid command line
 */
export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'UsageError';
	}
}

export const USAGE = `Usage: stitch [options]

Take scrolling screenshots using adb and stitch them together.

Output:
  --out-dir <dir>              Directory to output to (default: .)
  --file-prefix <prefix>       Auto-numbered output file prefix (default: stitch).
                               Mutually exclusive with --file-name.
  --file-name <name>           Output file name, overwritten if present.
                               Mutually exclusive with --file-prefix.
  --adb-args <args>            Extra adb arguments, e.g. --adb-args "-e"

Capture:
  --capture | --no-capture     Capture new images, or stitch existing ones (default: capture)
  --round | --square           Display shape; round frames the result with round borders (default: round)
  --transparency | --no-transparency
                               Transparent corners where a round screen has no pixels (default: off)
  --inter-capture-delay <ms>   Wait between captures for the scrollbar to fade (default: 1000)
  --keep-captures | --no-keep-captures
                               Keep the intermediate captures (default: discard)
  --max-captures <n>           Maximum number of screens to capture (default: 50)
  -h, --help                   Show this help
`;

const OPTIONS = {
	'out-dir': { type: 'string' },
	'file-prefix': { type: 'string' },
	'file-name': { type: 'string' },
	'adb-args': { type: 'string' },
	capture: { type: 'boolean' },
	'no-capture': { type: 'boolean' },
	round: { type: 'boolean' },
	square: { type: 'boolean' },
	transparency: { type: 'boolean' },
	'no-transparency': { type: 'boolean' },
	'inter-capture-delay': { type: 'string' },
	'keep-captures': { type: 'boolean' },
	'no-keep-captures': { type: 'boolean' },
	'max-captures': { type: 'string' },
	help: { type: 'boolean', short: 'h' }
} as const;

/**
 * Value of a pair of opposing flags; the last one given wins
 */
function lastToggle(
	tokens: ReadonlyArray<{ kind: string; name?: string }>,
	on: string,
	off: string,
	fallback: boolean
): boolean {
	let value = fallback;
	for (const token of tokens) {
		if (token.kind !== 'option') continue;
		if (token.name === on) value = true;
		else if (token.name === off) value = false;
	}
	return value;
}

function parseCount(flag: string, raw: string | undefined, fallback: number, min: number): number {
	if (raw === undefined) return fallback;
	const value = Number(raw);
	if (!Number.isInteger(value) || value < min) {
		throw new UsageError(`--${flag} expects an integer >= ${min}, got "${raw}"`);
	}
	return value;
}

function tokenize(argv: readonly string[]) {
	try {
		return parseArgs({ args: [...argv], options: OPTIONS, strict: true, tokens: true });
	} catch (error: unknown) {
		throw new UsageError(error instanceof Error ? error.message : String(error));
	}
}

/**
 * Parse argv (without the node and script entries)
 *
 * @throws UsageError on unknown flags, bad numbers or conflicting options
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
	const { values, tokens } = tokenize(argv);

	if (values['file-prefix'] !== undefined && values['file-name'] !== undefined) {
		throw new UsageError('--file-prefix and --file-name are mutually exclusive');
	}

	return {
		outDir: values['out-dir'] ?? '.',
		filePrefix: values['file-prefix'] ?? 'stitch',
		fileName: values['file-name'],
		adbArgs: values['adb-args'] ?? '',
		capture: lastToggle(tokens, 'capture', 'no-capture', true),
		round: lastToggle(tokens, 'round', 'square', true),
		transparency: lastToggle(tokens, 'transparency', 'no-transparency', false),
		interCaptureDelayMs: parseCount('inter-capture-delay', values['inter-capture-delay'], 1000, 0),
		keepCaptures: lastToggle(tokens, 'keep-captures', 'no-keep-captures', false),
		maxCaptures: parseCount('max-captures', values['max-captures'], 50, 1),
		help: values.help ?? false
	};
}
