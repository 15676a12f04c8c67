import { resolveSeek, type ByteInputStream, type ByteOutputStream, type SeekOrigin } from './ByteStream';

/**
 * Byte input over a fixed in-memory range. The position is tracked internally.
 */
export class MemoryByteInputStream implements ByteInputStream {
	private _bytes: Uint8Array;
	private _pos = 0;

	constructor(bytes: Uint8Array) {
		this._bytes = bytes;
	}

	readBytes(buffer: Uint8Array): number {
		const remaining = Math.max(0, this._bytes.length - this._pos);
		const n = Math.min(buffer.length, remaining);
		buffer.set(this._bytes.subarray(this._pos, this._pos + n));
		this._pos += n;
		return n;
	}

	seek(offset: number, origin: SeekOrigin): boolean {
		const target = resolveSeek(offset, origin, this._pos, this._bytes.length);
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
		return this._bytes.length;
	}

	pushBackByte(_byte: number): boolean {
		if (this._pos === 0) {
			return false;
		}
		this._pos--;
		return true;
	}

	close(): boolean {
		return true;
	}
}

const INITIAL_CAPACITY = 4096;

/**
 * Growable in-memory byte sink. Writes past the end extend the buffer; a gap
 * left by seeking beyond the end reads back as zeros.
 */
export class MemoryByteOutputStream implements ByteOutputStream {
	private _buffer = new Uint8Array(INITIAL_CAPACITY);
	private _length = 0;
	private _pos = 0;
	private _committed = false;

	writeBytes(buffer: Uint8Array): number {
		const end = this._pos + buffer.length;
		this.ensureCapacity(end);
		this._buffer.set(buffer, this._pos);
		this._pos = end;
		this._length = Math.max(this._length, end);
		return buffer.length;
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
		this._committed = true;
	}

	get committed(): boolean {
		return this._committed;
	}

	/**
	 * Copy of everything written so far.
	 */
	bytes(): Uint8Array {
		return this._buffer.slice(0, this._length);
	}

	private ensureCapacity(size: number): void {
		if (size <= this._buffer.length) {
			return;
		}
		let capacity = this._buffer.length;
		while (capacity < size) {
			capacity *= 2;
		}
		const grown = new Uint8Array(capacity);
		grown.set(this._buffer.subarray(0, this._length));
		this._buffer = grown;
	}
}
