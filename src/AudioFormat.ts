import { InvalidHeaderError } from './errors';

/** Canonical format order: fallback candidates are tried in this order */
export const FORMATS = ['wav', 'mp3', 'flac', 'wavpack'] as const;

export type Format = (typeof FORMATS)[number];

export const VALID_BIT_DEPTHS: ReadonlySet<number> = new Set([8, 16, 24, 32]);

export interface Header {
	format: Format;
	channelCount: number;
	frameCount: number;
	sampleRate: number;
	bitDepth: number;
}

/**
 * On-disk numeric representation used when encoding.
 * 'int' is fixed-point scaled by the bit depth, 'float' is unnormalized and
 * 'normalized-float' is full-scale normalized.
 */
export type StorageType = 'int' | 'float' | 'normalized-float';

export type FormatStrategy = 'only' | 'first';

export interface FormatHint {
	format: Format;
	strategy: FormatStrategy;
}

export type OperationResult = 'success' | 'abort';

export type ShouldAbort = () => boolean;

export const neverAbort: ShouldAbort = () => false;

export function isFormat(value: unknown): value is Format {
	return typeof value === 'string' && (FORMATS as readonly string[]).includes(value);
}

/**
 * Returns the reason a header breaks the channel/bit-depth invariant, or null when it is valid.
 */
export function getHeaderProblem(header: Header): string | null {
	if (!Number.isInteger(header.channelCount) || header.channelCount <= 0) {
		return `channelCount must be a positive integer, got: ${header.channelCount}`;
	}
	if (!VALID_BIT_DEPTHS.has(header.bitDepth)) {
		return `bitDepth must be one of [${[...VALID_BIT_DEPTHS].join(', ')}], got: ${header.bitDepth}`;
	}
	if (!Number.isInteger(header.frameCount) || header.frameCount < 0) {
		return `frameCount must be a non-negative integer, got: ${header.frameCount}`;
	}
	if (!Number.isInteger(header.sampleRate) || header.sampleRate <= 0) {
		return `sampleRate must be a positive integer, got: ${header.sampleRate}`;
	}
	return null;
}

/**
 * Validates a caller-supplied header and returns a frozen copy.
 * Throws InvalidHeaderError if validation fails.
 */
export function validateHeader(header: Header): Readonly<Header> {
	const problem = getHeaderProblem(header);
	if (problem) {
		throw new InvalidHeaderError(problem);
	}
	return freezeHeader(header);
}

export function freezeHeader(header: Header): Readonly<Header> {
	return Object.freeze({
		format: header.format,
		channelCount: header.channelCount,
		frameCount: header.frameCount,
		sampleRate: header.sampleRate,
		bitDepth: header.bitDepth,
	});
}
