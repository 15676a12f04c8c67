import type { Header } from './AudioFormat';

export type Awaitable<T> = T | Promise<T>;

/**
 * Source of interleaved float frames.
 */
export interface FrameSource {
	/**
	 * Fill buffer with up to `frames` interleaved frames.
	 * @returns Number of frames actually read
	 */
	readFrames(buffer: Float32Array, frames: number): Awaitable<number>;
}

/**
 * Sink of interleaved float frames.
 */
export interface FrameSink {
	/**
	 * Consume the first `frames` interleaved frames of buffer.
	 * @returns Number of frames actually written
	 */
	writeFrames(buffer: Float32Array, frames: number): Awaitable<number>;
}

/**
 * Destination of a decode: receives the header once per attempt, then frames.
 * The format resolution loop rewinds it with seek(0) before retrying.
 */
export interface FrameOutputStream extends FrameSink {
	writeHeader(header: Readonly<Header>): void;
	seek(frame: number): boolean;
	commit(): void;
}
