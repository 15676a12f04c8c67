import type { FLACDecoder } from '@wasm-audio-decoders/flac';
import { readFully, type ByteInputStream } from '../ByteStream';
import { interleave } from '../SampleConversion';
import { findFlacMarker, ID3_HEADER_SIZE, skipId3v2 } from './sniff';
import type { PcmInfo, PcmSource } from './types';

export interface FlacStreamInfo {
	sampleRate: number;
	channelCount: number;
	bitsPerSample: number;
	/** Total frames; 0 when the encoder did not know it */
	totalFrames: number;
}

const METADATA_BLOCK_HEADER_SIZE = 4;
const STREAMINFO_SIZE = 34;
const STREAMINFO_TYPE = 0;
/** 'fLaC' marker, metadata block header and STREAMINFO body */
const STREAMINFO_PREFIX_SIZE = 4 + METADATA_BLOCK_HEADER_SIZE + STREAMINFO_SIZE;

/** Compressed bytes handed to the decoder per refill */
const FEED_BYTES = 64 * 1024;
/** Frames decoded and dropped per step while seeking forward */
const SKIP_FRAMES = 4096;

/**
 * Parse the mandatory STREAMINFO block following the 'fLaC' marker.
 */
export function parseStreamInfo(bytes: Uint8Array): FlacStreamInfo {
	const marker = findFlacMarker(bytes);
	if (marker < 0) {
		throw new Error('Missing fLaC marker');
	}
	const block = marker + 4;
	if (bytes.length < block + METADATA_BLOCK_HEADER_SIZE + STREAMINFO_SIZE) {
		throw new Error('Truncated FLAC STREAMINFO block');
	}
	if ((bytes[block] & 0x7f) !== STREAMINFO_TYPE) {
		throw new Error('First FLAC metadata block is not STREAMINFO');
	}
	const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	// Skip block/frame size fields (10 bytes) to the packed rate/channels/bps/total field
	const info = block + METADATA_BLOCK_HEADER_SIZE + 10;
	const sampleRate = (bytes[info] << 12) | (bytes[info + 1] << 4) | (bytes[info + 2] >> 4);
	const channelCount = ((bytes[info + 2] >> 1) & 0x07) + 1;
	const bitsPerSample = (((bytes[info + 2] & 0x01) << 4) | (bytes[info + 3] >> 4)) + 1;
	const totalFrames = (bytes[info + 3] & 0x0f) * 2 ** 32 + view.getUint32(info + 4, false);
	return { sampleRate, channelCount, bitsPerSample, totalFrames };
}

/**
 * Smallest supported container bit depth that holds `bits` bits.
 */
export function roundUpBitDepth(bits: number): number {
	if (bits <= 8) return 8;
	if (bits <= 16) return 16;
	if (bits <= 24) return 24;
	return 32;
}

/**
 * Streams FLAC through the wasm decoder, feeding it one block of compressed
 * bytes whenever the decoded frames run out. The header comes from STREAMINFO,
 * so opening reads only the stream prefix.
 */
export class FlacSource implements PcmSource {
	readonly info: Readonly<PcmInfo>;

	private readonly _stream: ByteInputStream;
	/** Stream offset of the 'fLaC' marker */
	private readonly _start: number;
	private readonly _decoder: FLACDecoder;
	private _pending = new Float32Array(0);
	private _pendingOffset = 0;
	private _pos = 0;
	private _drained = false;

	private constructor(stream: ByteInputStream, start: number, decoder: FLACDecoder, info: PcmInfo) {
		this._stream = stream;
		this._start = start;
		this._decoder = decoder;
		this.info = info;
	}

	/**
	 * Read STREAMINFO and load the decoder. Throws when the stream does not
	 * record its length or the decoder cannot be loaded.
	 */
	static async open(stream: ByteInputStream): Promise<FlacSource> {
		const origin = stream.getPos();
		const start = origin + skipId3v2(readFully(stream, ID3_HEADER_SIZE));
		if (!stream.seek(start, 'start')) {
			throw new Error('FLAC stream ends inside its ID3v2 tag');
		}
		const streamInfo = parseStreamInfo(readFully(stream, STREAMINFO_PREFIX_SIZE));
		if (streamInfo.totalFrames === 0) {
			throw new Error('FLAC stream does not record its length');
		}
		if (!stream.seek(start, 'start')) {
			throw new Error('Cannot rewind FLAC stream');
		}

		const { FLACDecoder } = await import('@wasm-audio-decoders/flac');
		const decoder = new FLACDecoder();
		await decoder.ready;
		return new FlacSource(stream, start, decoder, {
			channelCount: streamInfo.channelCount,
			frameCount: streamInfo.totalFrames,
			sampleRate: streamInfo.sampleRate,
			bitDepth: roundUpBitDepth(streamInfo.bitsPerSample),
		});
	}

	async read(buffer: Float32Array, frames: number): Promise<number> {
		const channels = this.info.channelCount;
		const wanted = Math.max(0, Math.min(frames, this.info.frameCount - this._pos, Math.floor(buffer.length / channels)));
		let done = 0;
		while (done < wanted) {
			const available = (this._pending.length - this._pendingOffset) / channels;
			if (available === 0) {
				if (!(await this.refill())) {
					break;
				}
				continue;
			}
			const n = Math.min(available, wanted - done);
			buffer.set(this._pending.subarray(this._pendingOffset, this._pendingOffset + n * channels), done * channels);
			this._pendingOffset += n * channels;
			done += n;
		}
		this._pos += done;
		return done;
	}

	/**
	 * Seeking backwards restarts decoding from the marker; forward seeks decode and drop frames.
	 */
	async seek(frame: number): Promise<boolean> {
		if (!Number.isInteger(frame) || frame < 0 || frame > this.info.frameCount) {
			return false;
		}
		if (frame < this._pos) {
			if (!this._stream.seek(this._start, 'start')) {
				return false;
			}
			await this._decoder.reset();
			this._pending = new Float32Array(0);
			this._pendingOffset = 0;
			this._pos = 0;
			this._drained = false;
		}
		const scratch = new Float32Array(SKIP_FRAMES * this.info.channelCount);
		while (this._pos < frame) {
			if ((await this.read(scratch, Math.min(SKIP_FRAMES, frame - this._pos))) === 0) {
				return false;
			}
		}
		return true;
	}

	free(): void {
		this._decoder.free();
	}

	/**
	 * Decode the next block of bytes, or flush the decoder at end of stream.
	 * @returns false once the decoder has been flushed
	 */
	private async refill(): Promise<boolean> {
		if (this._drained) {
			return false;
		}
		const bytes = readFully(this._stream, FEED_BYTES);
		const decoded = bytes.length > 0 ? await this._decoder.decode(bytes) : await this._decoder.flush();
		this._drained = bytes.length === 0;
		if (decoded.errors.length > 0) {
			throw new Error(`FLAC decode failed: ${decoded.errors[0].message}`);
		}
		if (decoded.samplesDecoded > 0) {
			if (decoded.channelData.length !== this.info.channelCount) {
				throw new Error(`FLAC frame has ${decoded.channelData.length} channels, stream has ${this.info.channelCount}`);
			}
			this._pending = interleave(decoded.channelData, undefined, 0, decoded.samplesDecoded);
			this._pendingOffset = 0;
		}
		return true;
	}
}
