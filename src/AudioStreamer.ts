import type { FormatHint, Header } from './AudioFormat';
import { createDecoder, type AnyAudioDecoder } from './AudioDecoderFactory';
import type { ByteInputStream } from './ByteStream';
import { AudioStreamError } from './errors';
import { FileByteInputStream } from './FileByteStream';
import type { FrameSource } from './FrameStream';
import { MemoryByteInputStream } from './MemoryByteStream';

/**
 * Random-access reader over an encoded stream: frames are decoded on demand
 * from the current position instead of into a whole in-memory item.
 */
export class AudioStreamer implements FrameSource {
	private readonly _input: ByteInputStream;
	private _decoder: AnyAudioDecoder | null;

	private constructor(input: ByteInputStream, decoder: AnyAudioDecoder) {
		this._input = input;
		this._decoder = decoder;
	}

	/**
	 * Open a file. Throws UnrecognizedFormatError when no candidate format opens it.
	 */
	static async open(filePath: string, hint: FormatHint): Promise<AudioStreamer> {
		return AudioStreamer.fromStream(new FileByteInputStream(filePath), hint);
	}

	static async fromBytes(bytes: Uint8Array, hint: FormatHint): Promise<AudioStreamer> {
		return AudioStreamer.fromStream(new MemoryByteInputStream(bytes), hint);
	}

	private static async fromStream(input: ByteInputStream, hint: FormatHint): Promise<AudioStreamer> {
		try {
			return new AudioStreamer(input, await createDecoder(input, hint));
		} catch (err) {
			input.close();
			throw err;
		}
	}

	get header(): Readonly<Header> {
		return this.decoder.header;
	}

	/**
	 * Decode up to `frames` interleaved frames from the current position.
	 * @returns Number of frames decoded; fewer than requested at the end of the stream
	 */
	readFrames(buffer: Float32Array, frames: number): Promise<number> {
		return this.decoder.readPcmFrames(buffer, frames);
	}

	/**
	 * Move to an absolute frame index. Returns false for an out-of-range frame.
	 */
	seek(frame: number): Promise<boolean> {
		return this.decoder.seekToPcmFrame(frame);
	}

	close(): void {
		if (this._decoder) {
			this._decoder.free();
			this._decoder = null;
			this._input.close();
		}
	}

	private get decoder(): AnyAudioDecoder {
		if (!this._decoder) {
			throw new AudioStreamError('transfer', 'Audio streamer is closed');
		}
		return this._decoder;
	}
}

export function open(filePath: string, hint: FormatHint): Promise<AudioStreamer> {
	return AudioStreamer.open(filePath, hint);
}

export function openBytes(bytes: Uint8Array, hint: FormatHint): Promise<AudioStreamer> {
	return AudioStreamer.fromBytes(bytes, hint);
}
