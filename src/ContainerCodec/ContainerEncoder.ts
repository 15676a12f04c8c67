import type { Header, StorageType } from '../AudioFormat';
import type { AudioEncoder } from '../AudioEncoder';
import type { ByteOutputStream } from '../ByteStream';
import { AudioStreamError, BackendUnavailableError } from '../errors';
import logger from '../logger';
import { packWavSamples, WAV_HEADER_SIZE, wavSampleFormat, writeWavHeader, type WavSampleFormat } from './wav';

/**
 * WAV encoder. The header is written up front from the declared frame count
 * and each chunk of PCM goes to the sink as it arrives. finish() rewrites the
 * header only when fewer frames than declared were written.
 */
export class ContainerEncoder implements AudioEncoder {
	readonly backend = 'container' as const;
	readonly format = 'wav' as const;

	private readonly _out: ByteOutputStream;
	private readonly _header: Readonly<Header>;
	private readonly _sampleFormat: WavSampleFormat;
	private readonly _blockAlign: number;
	private _framesWritten = 0;
	private _finished = false;
	private _freed = false;

	constructor(out: ByteOutputStream, header: Readonly<Header>, storageType: StorageType) {
		if (header.format !== 'wav') {
			throw new BackendUnavailableError(`No encoder available for ${header.format}`);
		}
		this._out = out;
		this._header = header;
		this._sampleFormat = wavSampleFormat(header.bitDepth, storageType);
		this._blockAlign = header.channelCount * (header.bitDepth / 8);
		this.writeAll(writeWavHeader(header, this._sampleFormat, header.frameCount), 'WAV header');
	}

	get framesWritten(): number {
		return this._framesWritten;
	}

	async writePcmFrames(buffer: Float32Array, frames: number): Promise<number> {
		if (this._freed || this._finished) {
			throw new AudioStreamError('transfer', 'WAV encoder is no longer accepting frames');
		}
		const channels = this._header.channelCount;
		const space = this._header.frameCount - this._framesWritten;
		const toWrite = Math.max(0, Math.min(frames, space, Math.floor(buffer.length / channels)));
		if (toWrite === 0) {
			return 0;
		}
		const bytes = packWavSamples(buffer, toWrite * channels, this._header.bitDepth, this._sampleFormat);
		const written = Math.floor(this._out.writeBytes(bytes) / this._blockAlign);
		this._framesWritten += written;
		return written;
	}

	async finish(): Promise<void> {
		if (this._finished) {
			return;
		}
		if (this._freed) {
			throw new AudioStreamError('commit', 'WAV encoder already freed');
		}
		const dataSize = this._framesWritten * this._blockAlign;
		if (dataSize & 1) {
			this.writeAll(new Uint8Array(1), 'WAV pad byte');
		}
		if (this._framesWritten !== this._header.frameCount) {
			if (!this._out.seek(0, 'start')) {
				throw new AudioStreamError('commit', 'Cannot rewind output to rewrite the WAV header');
			}
			this.writeAll(writeWavHeader(this._header, this._sampleFormat, this._framesWritten), 'WAV header');
			this._out.seek(0, 'end');
		}
		this._finished = true;
		logger.debug(`Encoded ${this._framesWritten} frames as WAV (${WAV_HEADER_SIZE + dataSize} bytes)`);
	}

	free(): void {
		this._freed = true;
	}

	private writeAll(bytes: Uint8Array, what: string): void {
		const written = this._out.writeBytes(bytes);
		if (written !== bytes.length) {
			throw new AudioStreamError('commit', `Short ${what} write: ${written} of ${bytes.length} bytes`);
		}
	}
}
