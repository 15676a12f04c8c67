/**
 * Error taxonomy for audio stream operations.
 *
 * Format-probe failures are not errors: they are OpenResult values consumed by
 * the format resolution loop. Everything here reaches the caller.
 */

import type { Format } from './AudioFormat';

export type AudioStage = 'open' | 'header' | 'transfer' | 'commit';

export class AudioStreamError extends Error {
	readonly stage: AudioStage;

	constructor(stage: AudioStage, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'AudioStreamError';
		this.stage = stage;
	}
}

/**
 * No candidate format could open the input.
 */
export class UnrecognizedFormatError extends AudioStreamError {
	readonly formatsTried: readonly Format[];

	constructor(formatsTried: readonly Format[]) {
		super('open', `Unrecognized audio format (tried: ${formatsTried.join(', ')})`);
		this.name = 'UnrecognizedFormatError';
		this.formatsTried = formatsTried;
	}
}

/**
 * A frame source or sink moved a different number of frames than requested.
 */
export class IncompleteTransferError extends AudioStreamError {
	readonly direction: 'read' | 'write';
	readonly expected: number;
	readonly actual: number;

	constructor(direction: 'read' | 'write', expected: number, actual: number) {
		super('transfer', `Incomplete ${direction}: expected ${expected} frames, got ${actual}`);
		this.name = 'IncompleteTransferError';
		this.direction = direction;
		this.expected = expected;
		this.actual = actual;
	}
}

/**
 * A codec engine, encoder or file resource could not be acquired.
 */
export class BackendUnavailableError extends AudioStreamError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('open', message, options);
		this.name = 'BackendUnavailableError';
	}
}

/**
 * A caller-supplied header breaks the channel/bit-depth invariant.
 */
export class InvalidHeaderError extends AudioStreamError {
	constructor(message: string) {
		super('header', message);
		this.name = 'InvalidHeaderError';
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
