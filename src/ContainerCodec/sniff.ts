/**
 * Magic-byte checks run before a container stream is handed to its codec library.
 */

export const ID3_HEADER_SIZE = 10;

function matchesAscii(bytes: Uint8Array, offset: number, text: string): boolean {
	if (bytes.length < offset + text.length) {
		return false;
	}
	for (let i = 0; i < text.length; i++) {
		if (bytes[offset + i] !== text.charCodeAt(i)) {
			return false;
		}
	}
	return true;
}

/**
 * Offset of the first byte after a leading ID3v2 tag, or 0 when there is none.
 */
export function skipId3v2(bytes: Uint8Array): number {
	if (!matchesAscii(bytes, 0, 'ID3') || bytes.length < ID3_HEADER_SIZE) {
		return 0;
	}
	// Tag size is a 28-bit syncsafe integer
	const size = ((bytes[6] & 0x7f) << 21) | ((bytes[7] & 0x7f) << 14) | ((bytes[8] & 0x7f) << 7) | (bytes[9] & 0x7f);
	const hasFooter = (bytes[5] & 0x10) !== 0;
	return ID3_HEADER_SIZE + size + (hasFooter ? ID3_HEADER_SIZE : 0);
}

/**
 * Little-endian RIFF/WAVE. Big-endian RIFX is not supported.
 */
export function isWav(bytes: Uint8Array): boolean {
	return matchesAscii(bytes, 0, 'RIFF') && matchesAscii(bytes, 8, 'WAVE');
}

/**
 * Offset of the 'fLaC' marker, or -1 when the stream is not FLAC.
 */
export function findFlacMarker(bytes: Uint8Array): number {
	const offset = skipId3v2(bytes);
	return matchesAscii(bytes, offset, 'fLaC') ? offset : -1;
}

/**
 * True when the stream starts (after any ID3v2 tag) with a plausible MPEG audio frame header.
 */
export function isMpegAudio(bytes: Uint8Array): boolean {
	const offset = skipId3v2(bytes);
	if (bytes.length < offset + 4) {
		return false;
	}
	const b1 = bytes[offset + 1];
	const b2 = bytes[offset + 2];
	const sync = bytes[offset] === 0xff && (b1 & 0xe0) === 0xe0;
	const version = (b1 >> 3) & 0x03;
	const layer = (b1 >> 1) & 0x03;
	const bitrateIndex = b2 >> 4;
	const sampleRateIndex = (b2 >> 2) & 0x03;
	return sync && version !== 0x01 && layer !== 0x00 && bitrateIndex !== 0x0f && sampleRateIndex !== 0x03;
}
