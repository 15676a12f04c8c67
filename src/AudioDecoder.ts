import type { Format, Header } from './AudioFormat';

/**
 * Which codec engine family sits behind a decoder or encoder handle.
 * Carried explicitly from the moment the handle is opened.
 */
export type BackendKind = 'container' | 'wavpack';

/**
 * Result of probing a stream with one candidate format. A failed probe is an
 * expected outcome during format resolution, not an error.
 */
export type OpenResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export function opened<T>(value: T): OpenResult<T> {
	return { ok: true, value };
}

export function probeFailed<T>(reason: string): OpenResult<T> {
	return { ok: false, reason };
}

/**
 * Uniform decoder capability over the codec backends.
 */
export interface AudioDecoder {
	readonly backend: BackendKind;
	readonly format: Format;

	/**
	 * Header parsed when the decoder was opened. Immutable.
	 */
	readonly header: Readonly<Header>;

	/**
	 * Decode up to `frames` frames into buffer as interleaved floats.
	 * @returns Number of frames actually decoded
	 */
	readPcmFrames(buffer: Float32Array, frames: number): Promise<number>;

	/**
	 * Move the decode position to an absolute frame index.
	 */
	seekToPcmFrame(frame: number): Promise<boolean>;

	/**
	 * Release the native codec context. Safe to call more than once.
	 */
	free(): void;
}
