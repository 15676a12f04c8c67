/**
 * Binding surface of a WavPack engine.
 *
 * No WavPack codec ships on the npm registry, so the engine is supplied by the
 * host application (a wasm build of libwavpack, a native addon) through
 * setWavpackLibrary(). The shapes below follow libwavpack's stream-reader and
 * block-output API; samples always travel as 32-bit integers, with float data
 * carried bit-for-bit in the integer words.
 */

import type { SeekOrigin } from '../ByteStream';

/** Mode flag: samples are IEEE floats stored in the 32-bit words */
export const MODE_FLOAT = 0x8;

/** Open flag: read only the first stream of a multichannel file (at most two channels) */
export const OPEN_2CH_MAX = 0x8;

/** Front left + front right */
export const CHANNEL_MASK_STEREO = 0x3;
/** Front centre */
export const CHANNEL_MASK_MONO = 0x4;

/** floatNormExp for unnormalized floats */
export const FLOAT_NORM_EXP_FLOAT = 128;
/** floatNormExp for floats normalized to ±1.0 */
export const FLOAT_NORM_EXP_NORMALIZED = 127;

/**
 * Byte source callbacks the engine pulls the compressed stream through.
 */
export interface WavpackStreamReader {
	readBytes(buffer: Uint8Array): number;
	getPos(): number;
	setPosAbs(position: number): boolean;
	setPosRel(delta: number, origin: SeekOrigin): boolean;
	pushBackByte(byte: number): boolean;
	getLength(): number | null;
	canSeek(): boolean;
	close(): boolean;
}

/**
 * Receives each finished compressed block. Returning false aborts packing.
 */
export type WavpackBlockOutput = (block: Uint8Array) => boolean;

export interface WavpackConfig {
	bytesPerSample: number;
	bitsPerSample: number;
	channelMask: number;
	numChannels: number;
	sampleRate: number;
	/** 0 for integer data */
	floatNormExp: number;
}

export interface WavpackInputContext {
	getNumChannels(): number;
	/** Total frames, or -1 when the stream does not record it */
	getNumSamples(): number;
	getSampleRate(): number;
	getBitsPerSample(): number;
	getMode(): number;
	/**
	 * Unpack up to `frames` interleaved frames into buffer.
	 * @returns Number of frames unpacked
	 */
	unpackSamples(buffer: Int32Array, frames: number): number;
	seekSample(frame: number): boolean;
	close(): void;
}

export interface WavpackOutputContext {
	setConfiguration(config: WavpackConfig, totalFrames: number): boolean;
	packInit(): boolean;
	/**
	 * Pack `frames` interleaved frames from buffer.
	 * @returns false on failure
	 */
	packSamples(buffer: Int32Array, frames: number): boolean;
	flushSamples(): boolean;
	getErrorMessage(): string;
	close(): void;
}

export type WavpackOpenResult = { context: WavpackInputContext } | { error: string };

export interface WavpackLibrary {
	openInput(reader: WavpackStreamReader, flags: number): WavpackOpenResult;
	openOutput(blockOutput: WavpackBlockOutput): WavpackOutputContext;
}

let _library: WavpackLibrary | null = null;

/**
 * Register the engine used by every later WavPack open. Pass null to unregister.
 */
export function setWavpackLibrary(library: WavpackLibrary | null): void {
	_library = library;
}

export function getWavpackLibrary(): WavpackLibrary | null {
	return _library;
}
