import { interleave } from '../SampleConversion';
import { isMpegAudio } from './sniff';
import type { DecodedPcm, PcmInfo, PcmSource } from './types';

/** mpg123 decodes to 32-bit float */
const MPEG_DECODE_BIT_DEPTH = 32;

/**
 * Decode a complete MPEG audio stream.
 *
 * MPEG frames carry no total length, so the frame count is only known once
 * the whole stream has been decoded.
 */
export async function decodeMp3(bytes: Uint8Array): Promise<DecodedPcm> {
	if (!isMpegAudio(bytes)) {
		throw new Error('No MPEG audio frame header');
	}
	const { MPEGDecoder } = await import('mpg123-decoder');
	const decoder = new MPEGDecoder();
	try {
		await decoder.ready;
		const decoded = await decoder.decode(bytes);
		if (decoded.samplesDecoded === 0 || decoded.channelData.length === 0) {
			throw new Error('No MPEG audio frames decoded');
		}
		return {
			samples: interleave(decoded.channelData, undefined, 0, decoded.samplesDecoded),
			channelCount: decoded.channelData.length,
			frameCount: decoded.samplesDecoded,
			sampleRate: decoded.sampleRate,
			bitDepth: MPEG_DECODE_BIT_DEPTH,
		};
	} finally {
		decoder.free();
	}
}

/**
 * Frames of a fully decoded stream; reads and seeks index the samples.
 */
export class DecodedPcmSource implements PcmSource {
	readonly info: Readonly<PcmInfo>;

	private readonly _samples: Float32Array;
	private _pos = 0;

	constructor(decoded: DecodedPcm) {
		const { samples, ...info } = decoded;
		this.info = info;
		this._samples = samples;
	}

	async read(buffer: Float32Array, frames: number): Promise<number> {
		const channels = this.info.channelCount;
		const toRead = Math.max(0, Math.min(frames, this.info.frameCount - this._pos, Math.floor(buffer.length / channels)));
		const start = this._pos * channels;
		buffer.set(this._samples.subarray(start, start + toRead * channels));
		this._pos += toRead;
		return toRead;
	}

	async seek(frame: number): Promise<boolean> {
		if (!Number.isInteger(frame) || frame < 0 || frame > this.info.frameCount) {
			return false;
		}
		this._pos = frame;
		return true;
	}

	free(): void {}
}
