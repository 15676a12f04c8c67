/**
 * Tests for AtomicFileWriter and the file byte streams
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { AtomicFileWriter, makeTmpFilePath } from '../../src/AtomicFileWriter';
import { BackendUnavailableError } from '../../src/errors';
import { FileByteInputStream, FileByteOutputStream } from '../../src/FileByteStream';

describe('AtomicFileWriter', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'asio-writer-'));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it('should derive the temporary path from the destination', () => {
		expect(makeTmpFilePath('/data/out.wav')).toBe('/data/out.wav.tmp');
	});

	it('should only create the destination on commit', () => {
		const dest = path.join(dir, 'out.bin');
		const writer = new AtomicFileWriter(dest);
		fs.writeSync(writer.fd, Buffer.from([1, 2, 3]));

		expect(fs.existsSync(dest)).toBe(false);
		expect(fs.existsSync(writer.tmpPath)).toBe(true);

		writer.commit();

		expect(writer.committed).toBe(true);
		expect(Array.from(fs.readFileSync(dest))).toEqual([1, 2, 3]);
		expect(fs.existsSync(writer.tmpPath)).toBe(false);
	});

	it('should ignore a second commit and a discard after commit', () => {
		const dest = path.join(dir, 'out.bin');
		const writer = new AtomicFileWriter(dest);

		writer.commit();
		writer.commit();
		writer.discard();

		expect(fs.existsSync(dest)).toBe(true);
	});

	it('should leave an existing destination untouched on discard', () => {
		const dest = path.join(dir, 'out.bin');
		fs.writeFileSync(dest, 'old');
		const writer = new AtomicFileWriter(dest);
		fs.writeSync(writer.fd, Buffer.from('new'));

		writer.discard();

		expect(fs.readFileSync(dest, 'utf8')).toBe('old');
		expect(fs.existsSync(writer.tmpPath)).toBe(false);
	});

	it('should throw BackendUnavailableError when the temporary file cannot be created', () => {
		expect(() => new AtomicFileWriter(path.join(dir, 'missing', 'out.bin'))).toThrow(BackendUnavailableError);
	});
});

describe('FileByteInputStream', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'asio-input-'));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it('should read, push back and report length', () => {
		const file = path.join(dir, 'in.bin');
		fs.writeFileSync(file, Buffer.from([10, 20, 30]));
		const stream = new FileByteInputStream(file);
		const buffer = new Uint8Array(2);

		expect(stream.getLength()).toBe(3);
		expect(stream.readBytes(buffer)).toBe(2);
		expect(Array.from(buffer)).toEqual([10, 20]);
		expect(stream.pushBackByte(20)).toBe(true);
		expect(stream.getPos()).toBe(1);
		expect(stream.readBytes(buffer)).toBe(2);
		expect(Array.from(buffer)).toEqual([20, 30]);
		expect(stream.close()).toBe(true);
	});

	it('should seek relative to the end', () => {
		const file = path.join(dir, 'in.bin');
		fs.writeFileSync(file, Buffer.from([10, 20, 30]));
		const stream = new FileByteInputStream(file);
		const buffer = new Uint8Array(1);

		expect(stream.seek(-1, 'end')).toBe(true);
		stream.readBytes(buffer);
		expect(buffer[0]).toBe(30);
		stream.close();
	});

	it('should throw BackendUnavailableError for a missing file', () => {
		expect(() => new FileByteInputStream(path.join(dir, 'nope.wav'))).toThrow(BackendUnavailableError);
	});
});

describe('FileByteOutputStream', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'asio-output-'));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it('should write positionally and publish on commit', () => {
		const dest = path.join(dir, 'out.bin');
		const stream = new FileByteOutputStream(dest);

		stream.writeBytes(new Uint8Array([1, 2, 3]));
		stream.seek(0, 'start');
		stream.writeBytes(new Uint8Array([9]));
		stream.commit();
		stream.discard();

		expect(Array.from(fs.readFileSync(dest))).toEqual([9, 2, 3]);
	});

	it('should leave nothing behind when discarded', () => {
		const dest = path.join(dir, 'out.bin');
		const stream = new FileByteOutputStream(dest);

		stream.writeBytes(new Uint8Array([1, 2, 3]));
		stream.discard();

		expect(fs.readdirSync(dir)).toEqual([]);
	});
});
