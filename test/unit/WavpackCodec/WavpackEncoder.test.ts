/**
 * Tests for the WavPack encoder over a stand-in engine
 */

import { beforeEach, describe, it, expect } from 'vitest';
import type { Header } from '../../../src/AudioFormat';
import { BackendUnavailableError, InvalidHeaderError } from '../../../src/errors';
import { MemoryByteOutputStream } from '../../../src/MemoryByteStream';
import { makeWavpackConfig, WavpackEncoder } from '../../../src/WavpackCodec/WavpackEncoder';
import { setWavpackLibrary } from '../../../src/WavpackCodec/WavpackLibrary';
import { FAKE_HEADER_SIZE, FakeWavpackLibrary } from '../../helpers/wavpack-fake';

const MONO_16: Header = { format: 'wavpack', channelCount: 1, frameCount: 4, sampleRate: 44100, bitDepth: 16 };
const STEREO_32: Header = { format: 'wavpack', channelCount: 2, frameCount: 2, sampleRate: 96000, bitDepth: 32 };

function readWords(bytes: Uint8Array): number[] {
	const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	const words: number[] = [];
	for (let offset = FAKE_HEADER_SIZE; offset < bytes.length; offset += 4) {
		words.push(view.getInt32(offset, true));
	}
	return words;
}

describe('makeWavpackConfig', () => {
	it('should configure integer mono', () => {
		expect(makeWavpackConfig(MONO_16, 'int')).toEqual({
			bytesPerSample: 2,
			bitsPerSample: 16,
			channelMask: 4,
			numChannels: 1,
			sampleRate: 44100,
			floatNormExp: 0,
		});
	});

	it('should set the float exponent by storage type', () => {
		expect(makeWavpackConfig(STEREO_32, 'float')).toMatchObject({ bytesPerSample: 4, channelMask: 3, floatNormExp: 128 });
		expect(makeWavpackConfig(STEREO_32, 'normalized-float')).toMatchObject({ floatNormExp: 127 });
	});
});

describe('WavpackEncoder', () => {
	let library: FakeWavpackLibrary;

	beforeEach(() => {
		library = new FakeWavpackLibrary();
		setWavpackLibrary(library);
	});

	it('should configure the engine with the total frame count', () => {
		new WavpackEncoder(new MemoryByteOutputStream(), MONO_16, 'int');

		expect(library.outputs[0].config).toEqual(makeWavpackConfig(MONO_16, 'int'));
		expect(library.outputs[0].totalFrames).toBe(4);
	});

	it('should pack integer storage as rounded, clamped words', async () => {
		const out = new MemoryByteOutputStream();
		const encoder = new WavpackEncoder(out, MONO_16, 'int');

		expect(await encoder.writePcmFrames(new Float32Array([1, -1, 0.5, 1.5]), 4)).toBe(4);
		await encoder.finish();

		expect(readWords(out.bytes())).toEqual([32767, -32767, 16384, 32767]);
		expect(library.outputs[0].flushed).toBe(true);
	});

	it('should pack float storage bit for bit', async () => {
		const out = new MemoryByteOutputStream();
		const encoder = new WavpackEncoder(out, STEREO_32, 'float');
		const samples = new Float32Array([0.25, -0.5, 2, -3]);

		await encoder.writePcmFrames(samples, 2);

		expect(readWords(out.bytes())).toEqual(Array.from(new Int32Array(samples.buffer)));
	});

	it('should require 32 bits for float storage', () => {
		expect(() => new WavpackEncoder(new MemoryByteOutputStream(), MONO_16, 'normalized-float')).toThrow(InvalidHeaderError);
	});

	it('should require a registered engine', () => {
		setWavpackLibrary(null);

		expect(() => new WavpackEncoder(new MemoryByteOutputStream(), MONO_16, 'int')).toThrow(BackendUnavailableError);
	});

	it('should surface engine configuration errors', () => {
		expect(() => new WavpackEncoder(new MemoryByteOutputStream(), { ...MONO_16, channelCount: 0 }, 'int')).toThrow(
			'WavPack encoder setup failed: invalid channel count',
		);
		expect(library.outputs[0].closed).toBe(true);
	});

	it('should close the engine context on free', () => {
		const encoder = new WavpackEncoder(new MemoryByteOutputStream(), MONO_16, 'int');

		encoder.free();

		expect(library.outputs[0].closed).toBe(true);
	});
});
