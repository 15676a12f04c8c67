import type { Header, StorageType } from '../AudioFormat';
import type { AudioEncoder } from '../AudioEncoder';
import type { ByteOutputStream } from '../ByteStream';
import { AudioStreamError, BackendUnavailableError, InvalidHeaderError } from '../errors';
import logger from '../logger';
import { floatToInt } from '../SampleConversion';
import { SampleWords } from './SampleWords';
import {
	CHANNEL_MASK_MONO,
	CHANNEL_MASK_STEREO,
	FLOAT_NORM_EXP_FLOAT,
	FLOAT_NORM_EXP_NORMALIZED,
	getWavpackLibrary,
	type WavpackConfig,
	type WavpackOutputContext,
} from './WavpackLibrary';

function floatNormExp(storageType: StorageType): number {
	switch (storageType) {
		case 'float':
			return FLOAT_NORM_EXP_FLOAT;
		case 'normalized-float':
			return FLOAT_NORM_EXP_NORMALIZED;
		case 'int':
			return 0;
	}
}

export function makeWavpackConfig(header: Readonly<Header>, storageType: StorageType): WavpackConfig {
	return {
		bytesPerSample: header.bitDepth / 8,
		bitsPerSample: header.bitDepth,
		channelMask: header.channelCount === 1 ? CHANNEL_MASK_MONO : CHANNEL_MASK_STEREO,
		numChannels: header.channelCount,
		sampleRate: header.sampleRate,
		floatNormExp: floatNormExp(storageType),
	};
}

/**
 * Streams WavPack blocks to a byte sink as frames are packed.
 */
export class WavpackEncoder implements AudioEncoder {
	readonly backend = 'wavpack' as const;
	readonly format = 'wavpack' as const;

	private readonly _header: Readonly<Header>;
	private readonly _storageType: StorageType;
	private readonly _words = new SampleWords();
	private _context: WavpackOutputContext | null;
	private _blockError: string | null = null;
	private _finished = false;

	constructor(out: ByteOutputStream, header: Readonly<Header>, storageType: StorageType) {
		if (storageType !== 'int' && header.bitDepth !== 32) {
			throw new InvalidHeaderError(`${storageType} storage requires bitDepth 32, got: ${header.bitDepth}`);
		}
		const library = getWavpackLibrary();
		if (!library) {
			throw new BackendUnavailableError('No WavPack engine registered');
		}

		this._header = header;
		this._storageType = storageType;
		const context = library.openOutput((block) => {
			const written = out.writeBytes(block);
			if (written !== block.length) {
				this._blockError = `short block write: ${written} of ${block.length} bytes`;
				return false;
			}
			return true;
		});

		if (!context.setConfiguration(makeWavpackConfig(header, storageType), header.frameCount) || !context.packInit()) {
			const message = context.getErrorMessage();
			context.close();
			throw new BackendUnavailableError(`WavPack encoder setup failed: ${message}`);
		}
		this._context = context;
	}

	async writePcmFrames(buffer: Float32Array, frames: number): Promise<number> {
		const context = this.requireContext();
		const channels = this._header.channelCount;
		const toWrite = Math.max(0, Math.min(frames, Math.floor(buffer.length / channels)));
		if (toWrite === 0) {
			return 0;
		}

		const count = toWrite * channels;
		const { ints, floats } = this._words.reserve(count);
		if (this._storageType === 'int') {
			floatToInt(buffer, this._header.bitDepth, ints, count);
		} else {
			floats.set(buffer.subarray(0, count));
		}
		if (!context.packSamples(ints, toWrite)) {
			throw new AudioStreamError('transfer', `WavPack pack failed: ${this.failureMessage(context)}`);
		}
		return toWrite;
	}

	async finish(): Promise<void> {
		if (this._finished) {
			return;
		}
		const context = this.requireContext();
		if (!context.flushSamples()) {
			throw new AudioStreamError('commit', `WavPack flush failed: ${this.failureMessage(context)}`);
		}
		this._finished = true;
		logger.debug(`Encoded ${this._header.frameCount} frames as WavPack (${this._storageType})`);
	}

	free(): void {
		if (this._context) {
			this._context.close();
			this._context = null;
		}
	}

	private failureMessage(context: WavpackOutputContext): string {
		return this._blockError ?? context.getErrorMessage();
	}

	private requireContext(): WavpackOutputContext {
		if (!this._context) {
			throw new Error('WavPack encoder already freed');
		}
		return this._context;
	}
}
