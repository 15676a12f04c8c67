import type { Format } from './AudioFormat';
import type { BackendKind } from './AudioDecoder';

/**
 * Uniform encoder capability over the codec backends.
 */
export interface AudioEncoder {
	readonly backend: BackendKind;
	readonly format: Format;

	/**
	 * Encode the first `frames` interleaved float frames of buffer.
	 * @returns Number of frames actually accepted
	 */
	writePcmFrames(buffer: Float32Array, frames: number): Promise<number>;

	/**
	 * Flush trailing codec state to the byte sink.
	 */
	finish(): Promise<void>;

	/**
	 * Release the native codec context. Safe to call more than once.
	 */
	free(): void;
}
