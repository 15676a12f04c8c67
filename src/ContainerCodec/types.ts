export type ContainerFormat = 'wav' | 'mp3' | 'flac';

export interface PcmInfo {
	channelCount: number;
	frameCount: number;
	sampleRate: number;
	bitDepth: number;
}

/**
 * Whole-stream decode produced by a container codec library.
 */
export interface DecodedPcm extends PcmInfo {
	/** Interleaved float frames, full scale at ±1 */
	samples: Float32Array;
}

/**
 * Per-format frame reader behind a container decoder.
 */
export interface PcmSource {
	readonly info: Readonly<PcmInfo>;

	/**
	 * Decode up to `frames` interleaved frames into buffer.
	 * @returns Number of frames decoded
	 */
	read(buffer: Float32Array, frames: number): Promise<number>;

	seek(frame: number): Promise<boolean>;

	free(): void;
}
