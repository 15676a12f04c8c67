import { freezeHeader, getHeaderProblem, type Header } from '../AudioFormat';
import { opened, probeFailed, type AudioDecoder, type OpenResult } from '../AudioDecoder';
import { readFully, type ByteInputStream } from '../ByteStream';
import { errorMessage } from '../errors';
import logger from '../logger';
import { FlacSource } from './flac';
import { decodeMp3, DecodedPcmSource } from './mp3';
import { findFlacMarker, isMpegAudio, isWav, skipId3v2 } from './sniff';
import type { ContainerFormat, PcmSource } from './types';
import { WavSource } from './wav';

const READ_CHUNK_BYTES = 64 * 1024;
/** Enough for the RIFF/WAVE header, the largest magic checked */
const SNIFF_BYTES = 12;

/**
 * Drain a byte stream from its current position to the end.
 */
export function readAllBytes(stream: ByteInputStream): Uint8Array {
	const chunks: Uint8Array[] = [];
	let total = 0;
	for (;;) {
		const chunk = new Uint8Array(READ_CHUNK_BYTES);
		const n = stream.readBytes(chunk);
		if (n <= 0) {
			break;
		}
		chunks.push(n === chunk.length ? chunk : chunk.subarray(0, n));
		total += n;
	}
	const bytes = new Uint8Array(total);
	let offset = 0;
	for (const chunk of chunks) {
		bytes.set(chunk, offset);
		offset += chunk.length;
	}
	return bytes;
}

/**
 * The first bytes of the stream, or of what follows a leading ID3v2 tag.
 */
function readSniffWindow(stream: ByteInputStream, start: number): Uint8Array {
	const head = readFully(stream, SNIFF_BYTES);
	const skip = skipId3v2(head);
	if (skip === 0) {
		return head;
	}
	return stream.seek(start + skip, 'start') ? readFully(stream, SNIFF_BYTES) : new Uint8Array(0);
}

function hasMagic(window: Uint8Array, format: ContainerFormat): boolean {
	switch (format) {
		case 'wav':
			return isWav(window);
		case 'flac':
			return findFlacMarker(window) === 0;
		case 'mp3':
			return isMpegAudio(window);
	}
}

async function openSource(stream: ByteInputStream, format: ContainerFormat): Promise<PcmSource> {
	switch (format) {
		case 'wav':
			return WavSource.open(stream);
		case 'flac':
			return FlacSource.open(stream);
		case 'mp3':
			return new DecodedPcmSource(await decodeMp3(readAllBytes(stream)));
	}
}

/**
 * Decoder for the container formats (WAV, MP3, FLAC).
 *
 * WAV and FLAC are read from the byte stream as frames are requested. MP3
 * has no reliable frame count without a full decode, so it is decoded whole
 * on open.
 */
export class ContainerDecoder implements AudioDecoder {
	readonly backend = 'container' as const;
	readonly format: ContainerFormat;
	readonly header: Readonly<Header>;

	private _source: PcmSource | null;

	private constructor(format: ContainerFormat, header: Readonly<Header>, source: PcmSource) {
		this.format = format;
		this.header = header;
		this._source = source;
	}

	static async open(stream: ByteInputStream, format: ContainerFormat): Promise<OpenResult<ContainerDecoder>> {
		const start = stream.getPos();
		if (!hasMagic(readSniffWindow(stream, start), format)) {
			return probeFailed(`not a ${format} stream`);
		}
		if (!stream.seek(start, 'start')) {
			return probeFailed(`cannot rewind the ${format} stream`);
		}

		let source: PcmSource;
		try {
			source = await openSource(stream, format);
		} catch (err) {
			return probeFailed(`${format} open failed: ${errorMessage(err)}`);
		}

		const { channelCount, frameCount, sampleRate, bitDepth } = source.info;
		const header: Header = { format, channelCount, frameCount, sampleRate, bitDepth };
		const problem = getHeaderProblem(header);
		if (problem) {
			source.free();
			return probeFailed(`${format} header rejected: ${problem}`);
		}

		logger.debug(
			`Opened ${format}: ${header.channelCount}ch ${header.sampleRate}Hz ${header.bitDepth}-bit, ${header.frameCount} frames`,
		);
		return opened(new ContainerDecoder(format, freezeHeader(header), source));
	}

	async readPcmFrames(buffer: Float32Array, frames: number): Promise<number> {
		if (this._source === null) {
			throw new Error(`${this.format} decoder already freed`);
		}
		return this._source.read(buffer, frames);
	}

	async seekToPcmFrame(frame: number): Promise<boolean> {
		if (this._source === null) {
			return false;
		}
		return this._source.seek(frame);
	}

	free(): void {
		this._source?.free();
		this._source = null;
	}
}
