/**
 * Raw byte stream contracts shared by the memory and file backings.
 *
 * These are the only I/O surface the codec backends see: every native read,
 * seek or write callback is bound to one of these objects for the duration of
 * a single operation.
 */

export type SeekOrigin = 'start' | 'current' | 'end';

export interface ByteInputStream {
	/**
	 * Read up to buffer.length bytes into buffer.
	 * @returns Number of bytes actually read (0 at end of stream)
	 */
	readBytes(buffer: Uint8Array): number;

	/**
	 * Move the read position. 'current' and 'end' apply a signed delta to the
	 * position and to the total length respectively.
	 * @returns false if the resulting position is invalid; the position is then unchanged
	 */
	seek(offset: number, origin: SeekOrigin): boolean;

	getPos(): number;

	/**
	 * Total length in bytes, or null when it cannot be known without consuming the stream.
	 */
	getLength(): number | null;

	/**
	 * Un-read one byte. Needed by the lossless backend's header sniffing.
	 */
	pushBackByte(byte: number): boolean;

	close(): boolean;
}

export interface ByteOutputStream {
	/**
	 * @returns Number of bytes actually written
	 */
	writeBytes(buffer: Uint8Array): number;

	seek(offset: number, origin: SeekOrigin): boolean;

	/**
	 * Finalize the output. No-op once finalized.
	 */
	commit(): void;
}

/**
 * Resolve a seek request against a current position and total length.
 * @returns The new absolute position, or null if it would be negative
 */
export function resolveSeek(offset: number, origin: SeekOrigin, position: number, length: number): number | null {
	let target: number;
	switch (origin) {
		case 'start':
			target = offset;
			break;
		case 'current':
			target = position + offset;
			break;
		case 'end':
			target = length + offset;
			break;
		default:
			return null;
	}
	if (!Number.isInteger(target) || target < 0) {
		return null;
	}
	return target;
}

/**
 * Read up to `length` bytes, looping over short reads.
 * @returns The bytes read; shorter than `length` only at end of stream
 */
export function readFully(stream: ByteInputStream, length: number): Uint8Array {
	const bytes = new Uint8Array(length);
	let filled = 0;
	while (filled < length) {
		const n = stream.readBytes(bytes.subarray(filled));
		if (n <= 0) {
			break;
		}
		filled += n;
	}
	return filled === length ? bytes : bytes.subarray(0, filled);
}
