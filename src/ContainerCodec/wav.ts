import type { Header, StorageType } from '../AudioFormat';
import { readFully, type ByteInputStream } from '../ByteStream';
import { floatToInt, intScale } from '../SampleConversion';
import { isWav } from './sniff';
import type { PcmInfo, PcmSource } from './types';

/** 8-bit WAV samples are unsigned and centred on this value */
const U8_OFFSET = 128;

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const FMT_PCM_SIZE = 16;
const FMT_EXTENSIBLE_SIZE = 40;

/** RIFF header, a 16-byte fmt chunk and the data chunk header */
export const WAV_HEADER_SIZE = RIFF_HEADER_SIZE + CHUNK_HEADER_SIZE + FMT_PCM_SIZE + CHUNK_HEADER_SIZE;

const MAX_RIFF_SIZE = 0xffffffff;

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export type WavSampleFormat = 'int' | 'float';

/**
 * Where the samples of a WAV stream live and how they are stored.
 */
export interface WavLayout extends PcmInfo {
	sampleFormat: WavSampleFormat;
	/** Bytes per interleaved frame */
	blockAlign: number;
	/** Stream offset of the first sample byte */
	dataOffset: number;
}

interface WavFormatChunk {
	channelCount: number;
	sampleRate: number;
	bitDepth: number;
	sampleFormat: WavSampleFormat;
}

function dataView(bytes: Uint8Array): DataView {
	return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function chunkId(bytes: Uint8Array): string {
	return String.fromCharCode(bytes[0], bytes[1], bytes[2], bytes[3]);
}

function parseFormatChunk(body: Uint8Array): WavFormatChunk {
	const view = dataView(body);
	let formatTag = view.getUint16(0, true);
	const channelCount = view.getUint16(2, true);
	const sampleRate = view.getUint32(4, true);
	const bitDepth = view.getUint16(14, true);
	if (formatTag === WAVE_FORMAT_EXTENSIBLE) {
		if (body.length < FMT_EXTENSIBLE_SIZE) {
			throw new Error('Truncated WAVE_FORMAT_EXTENSIBLE fmt chunk');
		}
		// Leading two bytes of the sub-format GUID
		formatTag = view.getUint16(24, true);
	}
	if (channelCount === 0) {
		throw new Error('WAV fmt chunk declares no channels');
	}
	if (formatTag === WAVE_FORMAT_PCM && [8, 16, 24, 32].includes(bitDepth)) {
		return { channelCount, sampleRate, bitDepth, sampleFormat: 'int' };
	}
	if (formatTag === WAVE_FORMAT_IEEE_FLOAT && bitDepth === 32) {
		return { channelCount, sampleRate, bitDepth, sampleFormat: 'float' };
	}
	throw new Error(`Unsupported WAV sample format: tag 0x${formatTag.toString(16)}, ${bitDepth} bits`);
}

/**
 * Walk the RIFF chunks up to the data chunk and leave the stream at its first sample.
 * A data size running past the end of a stream of known length is cut to what the stream holds.
 */
export function readWavLayout(stream: ByteInputStream): WavLayout {
	const riff = readFully(stream, RIFF_HEADER_SIZE);
	if (!isWav(riff)) {
		throw new Error('Not a RIFF/WAVE stream');
	}

	let fmt: WavFormatChunk | null = null;
	for (;;) {
		const chunk = readFully(stream, CHUNK_HEADER_SIZE);
		if (chunk.length < CHUNK_HEADER_SIZE) {
			throw new Error('WAV data chunk missing');
		}
		const id = chunkId(chunk);
		const size = dataView(chunk).getUint32(4, true);

		if (id === 'data') {
			if (!fmt) {
				throw new Error('WAV data chunk precedes the fmt chunk');
			}
			const dataOffset = stream.getPos();
			const length = stream.getLength();
			const dataSize = length === null ? size : Math.min(size, Math.max(0, length - dataOffset));
			const blockAlign = fmt.channelCount * (fmt.bitDepth / 8);
			return {
				...fmt,
				blockAlign,
				dataOffset,
				frameCount: Math.floor(dataSize / blockAlign),
			};
		}

		if (id === 'fmt ') {
			const body = readFully(stream, size);
			if (size < FMT_PCM_SIZE || body.length < size) {
				throw new Error('Truncated WAV fmt chunk');
			}
			fmt = parseFormatChunk(body);
			if (size & 1 && !stream.seek(1, 'current')) {
				throw new Error('Truncated WAV fmt chunk');
			}
		} else if (!stream.seek(size + (size & 1), 'current')) {
			throw new Error(`Cannot skip WAV ${id} chunk`);
		}
	}
}

/**
 * Convert `count` packed samples to floats: integers divide by intScale(bitDepth),
 * 8-bit samples after removing their unsigned offset.
 */
export function unpackWavSamples(bytes: Uint8Array, layout: WavLayout, out: Float32Array, count: number): void {
	const view = dataView(bytes);
	if (layout.sampleFormat === 'float') {
		for (let i = 0; i < count; i++) {
			out[i] = view.getFloat32(i * 4, true);
		}
		return;
	}
	const scale = intScale(layout.bitDepth);
	switch (layout.bitDepth) {
		case 8:
			for (let i = 0; i < count; i++) {
				out[i] = (bytes[i] - U8_OFFSET) / scale;
			}
			break;
		case 16:
			for (let i = 0; i < count; i++) {
				out[i] = view.getInt16(i * 2, true) / scale;
			}
			break;
		case 24:
			for (let i = 0; i < count; i++) {
				const o = i * 3;
				// Sign-extend from bit 23
				out[i] = (((bytes[o] | (bytes[o + 1] << 8) | (bytes[o + 2] << 16)) << 8) >> 8) / scale;
			}
			break;
		case 32:
			for (let i = 0; i < count; i++) {
				out[i] = view.getInt32(i * 4, true) / scale;
			}
			break;
	}
}

/**
 * Sample storage for a bit depth: integer for 8/16/24 bits, and for 32 bits
 * integer or IEEE float depending on the storage type.
 */
export function wavSampleFormat(bitDepth: number, storageType: StorageType): WavSampleFormat {
	switch (bitDepth) {
		case 8:
		case 16:
		case 24:
			return 'int';
		case 32:
			return storageType === 'int' ? 'int' : 'float';
		default:
			throw new Error(`Unsupported WAV bit depth: ${bitDepth}`);
	}
}

/**
 * Pack the first `count` samples little-endian. Integer samples are rounded and clamped by floatToInt.
 */
export function packWavSamples(samples: Float32Array, count: number, bitDepth: number, sampleFormat: WavSampleFormat): Uint8Array {
	const bytes = new Uint8Array(count * (bitDepth / 8));
	const view = dataView(bytes);
	if (sampleFormat === 'float') {
		for (let i = 0; i < count; i++) {
			view.setFloat32(i * 4, samples[i], true);
		}
		return bytes;
	}
	const ints = floatToInt(samples, bitDepth, undefined, count);
	switch (bitDepth) {
		case 8:
			for (let i = 0; i < count; i++) {
				bytes[i] = ints[i] + U8_OFFSET;
			}
			break;
		case 16:
			for (let i = 0; i < count; i++) {
				view.setInt16(i * 2, ints[i], true);
			}
			break;
		case 24:
			for (let i = 0; i < count; i++) {
				const o = i * 3;
				bytes[o] = ints[i] & 0xff;
				bytes[o + 1] = (ints[i] >> 8) & 0xff;
				bytes[o + 2] = (ints[i] >> 16) & 0xff;
			}
			break;
		case 32:
			for (let i = 0; i < count; i++) {
				view.setInt32(i * 4, ints[i], true);
			}
			break;
	}
	return bytes;
}

/**
 * The 44-byte header of a WAV file holding `frameCount` frames.
 */
export function writeWavHeader(header: Readonly<Header>, sampleFormat: WavSampleFormat, frameCount: number): Uint8Array {
	const { channelCount, sampleRate, bitDepth } = header;
	const blockAlign = channelCount * (bitDepth / 8);
	const dataSize = frameCount * blockAlign;
	const riffSize = WAV_HEADER_SIZE - CHUNK_HEADER_SIZE + dataSize + (dataSize & 1);
	if (riffSize > MAX_RIFF_SIZE) {
		throw new Error(`WAV data of ${dataSize} bytes exceeds the RIFF size limit`);
	}

	const bytes = new Uint8Array(WAV_HEADER_SIZE);
	const view = dataView(bytes);
	const ascii = (offset: number, text: string) => {
		for (let i = 0; i < text.length; i++) {
			bytes[offset + i] = text.charCodeAt(i);
		}
	};
	ascii(0, 'RIFF');
	view.setUint32(4, riffSize, true);
	ascii(8, 'WAVE');
	ascii(12, 'fmt ');
	view.setUint32(16, FMT_PCM_SIZE, true);
	view.setUint16(20, sampleFormat === 'float' ? WAVE_FORMAT_IEEE_FLOAT : WAVE_FORMAT_PCM, true);
	view.setUint16(22, channelCount, true);
	view.setUint32(24, sampleRate, true);
	view.setUint32(28, sampleRate * blockAlign, true);
	view.setUint16(32, blockAlign, true);
	view.setUint16(34, bitDepth, true);
	ascii(36, 'data');
	view.setUint32(40, dataSize, true);
	return bytes;
}

/**
 * Reads PCM straight from the byte stream, one request at a time.
 */
export class WavSource implements PcmSource {
	readonly info: Readonly<WavLayout>;

	private readonly _stream: ByteInputStream;
	private _pos = 0;

	private constructor(stream: ByteInputStream, layout: WavLayout) {
		this._stream = stream;
		this.info = layout;
	}

	static open(stream: ByteInputStream): WavSource {
		return new WavSource(stream, readWavLayout(stream));
	}

	async read(buffer: Float32Array, frames: number): Promise<number> {
		const { channelCount, blockAlign, frameCount } = this.info;
		const toRead = Math.max(0, Math.min(frames, frameCount - this._pos, Math.floor(buffer.length / channelCount)));
		if (toRead === 0) {
			return 0;
		}
		const bytes = readFully(this._stream, toRead * blockAlign);
		const got = Math.floor(bytes.length / blockAlign);
		unpackWavSamples(bytes, this.info, buffer, got * channelCount);
		this._pos += got;
		return got;
	}

	async seek(frame: number): Promise<boolean> {
		if (!Number.isInteger(frame) || frame < 0 || frame > this.info.frameCount) {
			return false;
		}
		if (!this._stream.seek(this.info.dataOffset + frame * this.info.blockAlign, 'start')) {
			return false;
		}
		this._pos = frame;
		return true;
	}

	free(): void {}
}
