/**
 * Tests for the public read/write operations
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { Header } from '../../src/AudioFormat';
import { read, readFile, readHeader, transcode, write, writeFile } from '../../src/audiostream';
import { AudioStreamError, BackendUnavailableError, IncompleteTransferError, InvalidHeaderError, UnrecognizedFormatError } from '../../src/errors';
import { FileByteOutputStream } from '../../src/FileByteStream';
import { createItem, ItemFrameInputStream, ItemOutputStream } from '../../src/Item';
import { MemoryByteInputStream, MemoryByteOutputStream } from '../../src/MemoryByteStream';
import { getInstruments } from '../../src/telemetry/instruments';
import { setWavpackLibrary } from '../../src/WavpackCodec/WavpackLibrary';
import { makeSineItem, maxSampleError, ShortFrameSource } from '../helpers/test-data';
import { FakeWavpackLibrary } from '../helpers/wavpack-fake';

const INT16_STEP = 1 / 32767;

async function encodeToBytes(header: Header, source: ItemFrameInputStream, storage: 'int' | 'float' | 'normalized-float'): Promise<Uint8Array> {
	const out = new MemoryByteOutputStream();
	const result = await write(header, source, out, storage);
	expect(result).toBe('success');
	expect(out.committed).toBe(true);
	return out.bytes();
}

describe('audiostream', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'asio-stream-'));
		setWavpackLibrary(new FakeWavpackLibrary());
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	describe('write / read', () => {
		it('should round-trip 16-bit WAV within one quantization step', async () => {
			const item = makeSineItem();
			const bytes = await encodeToBytes(item.header, new ItemFrameInputStream(item), 'int');

			const decoded = createItem();
			const result = await read(new MemoryByteInputStream(bytes), new ItemOutputStream(decoded), { format: 'wav', strategy: 'only' });

			expect(result).toBe('success');
			expect(decoded.header).toEqual({ format: 'wav', channelCount: 2, frameCount: 100, sampleRate: 44100, bitDepth: 16 });
			expect(maxSampleError(item, decoded)).toBeLessThanOrEqual(INT16_STEP);
		});

		it('should round-trip 32-bit float WAV exactly', async () => {
			const item = makeSineItem({ bitDepth: 32, channelCount: 1 });
			const bytes = await encodeToBytes(item.header, new ItemFrameInputStream(item), 'float');

			const decoded = createItem();
			await read(new MemoryByteInputStream(bytes), new ItemOutputStream(decoded), { format: 'wav', strategy: 'only' });

			expect(decoded.frames).toEqual(item.frames);
		});

		it('should round-trip WavPack float storage exactly', async () => {
			const item = makeSineItem({ format: 'wavpack', bitDepth: 32 });
			const bytes = await encodeToBytes(item.header, new ItemFrameInputStream(item), 'normalized-float');

			const decoded = createItem();
			await read(new MemoryByteInputStream(bytes), new ItemOutputStream(decoded), { format: 'wavpack', strategy: 'only' });

			expect(decoded.header.format).toBe('wavpack');
			expect(decoded.frames).toEqual(item.frames);
		});

		it('should round-trip WavPack integer storage within one quantization step', async () => {
			const item = makeSineItem({ format: 'wavpack', channelCount: 1 });
			const bytes = await encodeToBytes(item.header, new ItemFrameInputStream(item), 'int');

			const decoded = createItem();
			await read(new MemoryByteInputStream(bytes), new ItemOutputStream(decoded), { format: 'wav', strategy: 'first' });

			expect(decoded.header.bitDepth).toBe(16);
			expect(maxSampleError(item, decoded)).toBeLessThanOrEqual(INT16_STEP);
		});

		it('should reject WAV bytes under a wavpack-only hint without touching the output', async () => {
			const item = makeSineItem();
			const bytes = await encodeToBytes(item.header, new ItemFrameInputStream(item), 'int');
			const decoded = createItem();

			const attempt = read(new MemoryByteInputStream(bytes), new ItemOutputStream(decoded), { format: 'wavpack', strategy: 'only' });

			await expect(attempt).rejects.toBeInstanceOf(UnrecognizedFormatError);
			expect(decoded.header.channelCount).toBe(0);
			expect(decoded.frames).toEqual([]);
		});

		it('should stop reading when aborted', async () => {
			const item = makeSineItem();
			const bytes = await encodeToBytes(item.header, new ItemFrameInputStream(item), 'int');
			const out = new ItemOutputStream(createItem());

			const result = await read(new MemoryByteInputStream(bytes), out, { format: 'wav', strategy: 'only' }, () => true);

			expect(result).toBe('abort');
			expect(out.position).toBe(0);
		});

		it('should validate the header before encoding', async () => {
			const out = new MemoryByteOutputStream();
			const header: Header = { format: 'wav', channelCount: 0, frameCount: 1, sampleRate: 8000, bitDepth: 16 };

			await expect(write(header, new ShortFrameSource(1, 0), out, 'int')).rejects.toBeInstanceOf(InvalidHeaderError);
			await expect(write({ ...header, channelCount: 1, bitDepth: 12 }, new ShortFrameSource(1, 0), out, 'int')).rejects.toThrow(
				'bitDepth must be one of [8, 16, 24, 32], got: 12',
			);
			expect(out.bytes()).toHaveLength(0);
		});

		it('should refuse to encode MP3', async () => {
			const header: Header = { format: 'mp3', channelCount: 1, frameCount: 1, sampleRate: 8000, bitDepth: 16 };

			await expect(write(header, new ShortFrameSource(1, 0), new MemoryByteOutputStream(), 'int')).rejects.toBeInstanceOf(
				BackendUnavailableError,
			);
		});

		it('should not commit after a short read', async () => {
			const out = new MemoryByteOutputStream();
			const header: Header = { format: 'wav', channelCount: 1, frameCount: 10, sampleRate: 8000, bitDepth: 16 };

			await expect(write(header, new ShortFrameSource(1, 1), out, 'int')).rejects.toBeInstanceOf(IncompleteTransferError);
			expect(out.committed).toBe(false);
			// Only the header written when the encoder was created
			expect(out.bytes()).toHaveLength(44);
		});
	});

	describe('readHeader', () => {
		it('should return the header of the first format that opens', async () => {
			const item = makeSineItem({ channelCount: 1, frameCount: 10, sampleRate: 16000 });
			const bytes = await encodeToBytes(item.header, new ItemFrameInputStream(item), 'int');

			const header = await readHeader(new MemoryByteInputStream(bytes), { format: 'flac', strategy: 'first' });

			expect(header).toEqual({ format: 'wav', channelCount: 1, frameCount: 10, sampleRate: 16000, bitDepth: 16 });
		});
	});

	describe('readFile / writeFile', () => {
		it('should round-trip a sine through a WAV file', async () => {
			const item = makeSineItem();
			const file = path.join(dir, 'sine.wav');

			expect(await writeFile(item, file, 'int')).toBe('success');
			const decoded = await readFile(file);

			expect(decoded).not.toBeNull();
			expect(decoded?.header).toEqual(item.header);
			expect(maxSampleError(item, decoded ?? createItem())).toBeLessThanOrEqual(INT16_STEP);
			expect(fs.readdirSync(dir)).toEqual(['sine.wav']);
		});

		it('should detect the format regardless of the extension', async () => {
			const item = makeSineItem();
			const file = path.join(dir, 'mislabelled.flac');

			await writeFile(item, file, 'int');
			const decoded = await readFile(file);

			expect(decoded?.header.format).toBe('wav');
		});

		it('should honour an explicit hint', async () => {
			const item = makeSineItem();
			const file = path.join(dir, 'sine.wav');
			await writeFile(item, file, 'int');

			await expect(readFile(file, { format: 'mp3', strategy: 'only' })).rejects.toBeInstanceOf(UnrecognizedFormatError);
		});

		it('should return null when the read is aborted', async () => {
			const item = makeSineItem();
			const file = path.join(dir, 'sine.wav');
			await writeFile(item, file, 'int');

			expect(await readFile(file, undefined, () => true)).toBeNull();
		});

		it('should leave no file behind when a write is aborted', async () => {
			const file = path.join(dir, 'aborted.wav');

			const result = await writeFile(makeSineItem(), file, 'int', () => true);

			expect(result).toBe('abort');
			expect(fs.readdirSync(dir)).toEqual([]);
		});

		it('should keep an existing destination when a write is aborted', async () => {
			const file = path.join(dir, 'existing.wav');
			fs.writeFileSync(file, 'previous contents');

			await writeFile(makeSineItem(), file, 'int', () => true);

			expect(fs.readFileSync(file, 'utf8')).toBe('previous contents');
			expect(fs.readdirSync(dir)).toEqual(['existing.wav']);
		});

		it('should remove the temporary file when a write fails', async () => {
			const file = path.join(dir, 'failed.wav');
			const header: Header = { format: 'wav', channelCount: 2, frameCount: 10, sampleRate: 8000, bitDepth: 16 };
			const out = new FileByteOutputStream(file);

			try {
				await expect(write(header, new ShortFrameSource(2, 1), out, 'int')).rejects.toBeInstanceOf(IncompleteTransferError);
			} finally {
				out.discard();
			}

			expect(fs.readdirSync(dir)).toEqual([]);
		});
	});

	describe('transcode', () => {
		it('should re-encode a WAV file as WavPack', async () => {
			const item = makeSineItem();
			const input = path.join(dir, 'in.wav');
			const output = path.join(dir, 'out.wv');
			await writeFile(item, input, 'int');

			expect(await transcode(input, output, { storageType: 'int' })).toBe('success');
			const decoded = await readFile(output);

			expect(decoded?.header).toEqual({ ...item.header, format: 'wavpack' });
			expect(maxSampleError(item, decoded ?? createItem())).toBeLessThanOrEqual(INT16_STEP);
		});

		it('should count one transcode operation', async () => {
			const input = path.join(dir, 'in.wav');
			await writeFile(makeSineItem(), input, 'int');
			const add = vi.spyOn(getInstruments().operationsTotal, 'add');

			await transcode(input, path.join(dir, 'out.wv'), { storageType: 'int' });

			expect(add).toHaveBeenCalledTimes(1);
			expect(add).toHaveBeenCalledWith(1, { operation: 'transcode', result: 'success' });
		});

		it('should require a known output format', async () => {
			const input = path.join(dir, 'in.wav');
			await writeFile(makeSineItem(), input, 'int');

			await expect(transcode(input, path.join(dir, 'out.ogg'), { storageType: 'int' })).rejects.toBeInstanceOf(AudioStreamError);
			expect(fs.readdirSync(dir)).toEqual(['in.wav']);
		});
	});
});
