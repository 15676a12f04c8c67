import { freezeHeader, getHeaderProblem, type Header } from '../AudioFormat';
import { opened, probeFailed, type AudioDecoder, type OpenResult } from '../AudioDecoder';
import type { ByteInputStream } from '../ByteStream';
import logger from '../logger';
import { intToFloat } from '../SampleConversion';
import { SampleWords } from './SampleWords';
import {
	getWavpackLibrary,
	MODE_FLOAT,
	OPEN_2CH_MAX,
	type WavpackInputContext,
	type WavpackStreamReader,
} from './WavpackLibrary';

/**
 * Bind the engine's reader callbacks to a byte stream. The stream stays owned
 * by the caller, so close() leaves it open.
 */
export function createStreamReader(stream: ByteInputStream): WavpackStreamReader {
	return {
		readBytes: (buffer) => stream.readBytes(buffer),
		getPos: () => stream.getPos(),
		setPosAbs: (position) => stream.seek(position, 'start'),
		setPosRel: (delta, origin) => stream.seek(delta, origin),
		pushBackByte: (byte) => stream.pushBackByte(byte),
		getLength: () => stream.getLength(),
		canSeek: () => stream.getLength() !== null,
		close: () => true,
	};
}

export class WavpackDecoder implements AudioDecoder {
	readonly backend = 'wavpack' as const;
	readonly format = 'wavpack' as const;
	readonly header: Readonly<Header>;
	readonly mode: number;

	private _context: WavpackInputContext | null;
	private readonly _words = new SampleWords();
	private _pos = 0;

	private constructor(context: WavpackInputContext, header: Readonly<Header>, mode: number) {
		this._context = context;
		this.header = header;
		this.mode = mode;
	}

	static async open(stream: ByteInputStream): Promise<OpenResult<WavpackDecoder>> {
		const library = getWavpackLibrary();
		if (!library) {
			return probeFailed('no WavPack engine registered');
		}

		const result = library.openInput(createStreamReader(stream), OPEN_2CH_MAX);
		if ('error' in result) {
			return probeFailed(`wavpack open failed: ${result.error}`);
		}
		const context = result.context;

		const header: Header = {
			format: 'wavpack',
			channelCount: context.getNumChannels(),
			frameCount: context.getNumSamples(),
			sampleRate: context.getSampleRate(),
			bitDepth: context.getBitsPerSample(),
		};
		const problem = header.frameCount < 0 ? 'stream does not record its length' : getHeaderProblem(header);
		if (problem) {
			context.close();
			return probeFailed(`wavpack header rejected: ${problem}`);
		}

		const mode = context.getMode();
		logger.debug(
			`Opened wavpack: ${header.channelCount}ch ${header.sampleRate}Hz ${header.bitDepth}-bit${mode & MODE_FLOAT ? ' float' : ''}, ${header.frameCount} frames`,
		);
		return opened(new WavpackDecoder(context, freezeHeader(header), mode));
	}

	get isFloat(): boolean {
		return (this.mode & MODE_FLOAT) !== 0;
	}

	async readPcmFrames(buffer: Float32Array, frames: number): Promise<number> {
		const context = this.requireContext();
		const channels = this.header.channelCount;
		const toRead = Math.max(0, Math.min(frames, Math.floor(buffer.length / channels)));
		if (toRead === 0) {
			return 0;
		}

		const { ints, floats } = this._words.reserve(toRead * channels);
		const framesRead = context.unpackSamples(ints, toRead);
		const count = framesRead * channels;
		if (this.isFloat) {
			buffer.set(floats.subarray(0, count));
		} else {
			intToFloat(ints, this.header.bitDepth, buffer, count);
		}
		this._pos += framesRead;
		return framesRead;
	}

	async seekToPcmFrame(frame: number): Promise<boolean> {
		const context = this.requireContext();
		if (!Number.isInteger(frame) || frame < 0 || frame > this.header.frameCount) {
			return false;
		}
		if (!context.seekSample(frame)) {
			return false;
		}
		this._pos = frame;
		return true;
	}

	get position(): number {
		return this._pos;
	}

	free(): void {
		if (this._context) {
			this._context.close();
			this._context = null;
		}
	}

	private requireContext(): WavpackInputContext {
		if (!this._context) {
			throw new Error('WavPack decoder already freed');
		}
		return this._context;
	}
}
