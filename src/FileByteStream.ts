import fs from 'node:fs';
import { AtomicFileWriter } from './AtomicFileWriter';
import { resolveSeek, type ByteInputStream, type ByteOutputStream, type SeekOrigin } from './ByteStream';
import { BackendUnavailableError, errorMessage } from './errors';

/**
 * Blocking byte input over a file descriptor. Reads are positional, so seeking
 * and pushing back a byte only move the tracked position.
 */
export class FileByteInputStream implements ByteInputStream {
	private _fd: number | null;
	private _pos = 0;

	constructor(filePath: string) {
		try {
			this._fd = fs.openSync(filePath, 'r');
		} catch (err) {
			throw new BackendUnavailableError(`Failed to open ${filePath}: ${errorMessage(err)}`, { cause: err });
		}
	}

	readBytes(buffer: Uint8Array): number {
		if (this._fd === null || buffer.length < 1) {
			return 0;
		}
		const n = fs.readSync(this._fd, buffer, 0, buffer.length, this._pos);
		this._pos += n;
		return n;
	}

	seek(offset: number, origin: SeekOrigin): boolean {
		const length = this.getLength();
		if (length === null) {
			return false;
		}
		const target = resolveSeek(offset, origin, this._pos, length);
		if (target === null) {
			return false;
		}
		this._pos = target;
		return true;
	}

	getPos(): number {
		return this._pos;
	}

	getLength(): number | null {
		if (this._fd === null) {
			return null;
		}
		return fs.fstatSync(this._fd).size;
	}

	pushBackByte(_byte: number): boolean {
		if (this._fd === null || this._pos === 0) {
			return false;
		}
		this._pos--;
		return true;
	}

	close(): boolean {
		if (this._fd !== null) {
			fs.closeSync(this._fd);
			this._fd = null;
		}
		return true;
	}
}

/**
 * Byte output to a file through an AtomicFileWriter. Nothing is visible at the
 * destination until commit(); discard() drops the temporary file.
 */
export class FileByteOutputStream implements ByteOutputStream {
	private readonly _writer: AtomicFileWriter;
	private _pos = 0;
	private _length = 0;

	constructor(filePath: string) {
		this._writer = new AtomicFileWriter(filePath);
	}

	writeBytes(buffer: Uint8Array): number {
		const written = fs.writeSync(this._writer.fd, buffer, 0, buffer.length, this._pos);
		this._pos += written;
		this._length = Math.max(this._length, this._pos);
		return written;
	}

	seek(offset: number, origin: SeekOrigin): boolean {
		const target = resolveSeek(offset, origin, this._pos, this._length);
		if (target === null) {
			return false;
		}
		this._pos = target;
		return true;
	}

	commit(): void {
		this._writer.commit();
	}

	discard(): void {
		this._writer.discard();
	}
}
