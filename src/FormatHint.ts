import path from 'node:path';
import { FORMATS, type Format, type FormatHint } from './AudioFormat';

interface FormatInfo {
	format: Format;
	extension: string;
}

const FORMAT_INFO: readonly FormatInfo[] = [
	{ format: 'flac', extension: '.FLAC' },
	{ format: 'mp3', extension: '.MP3' },
	{ format: 'wav', extension: '.WAV' },
	{ format: 'wavpack', extension: '.WV' },
];

/**
 * Ordered candidate list for a hint: the hinted format alone for 'only',
 * otherwise the hinted format followed by every other format in canonical order.
 */
export function getFormatsToTry(hint: FormatHint): Format[] {
	if (hint.strategy === 'only') {
		return [hint.format];
	}
	return [hint.format, ...FORMATS.filter((format) => format !== hint.format)];
}

/** Tries every format, WAV first */
export const TRY_ALL_FORMATS: Readonly<FormatHint> = Object.freeze({ format: 'wav', strategy: 'first' });

function toSearchExtension(extension: string): string {
	const upper = extension.toUpperCase();
	return upper.startsWith('.') ? upper : `.${upper}`;
}

function findFormatInfo(extension: string): FormatInfo | undefined {
	if (!extension) {
		return undefined;
	}
	const search = toSearchExtension(extension);
	return FORMAT_INFO.find((info) => info.extension === search);
}

export function getKnownFileExtensions(): string[] {
	return FORMAT_INFO.map((info) => info.extension);
}

/**
 * Derive a format hint from a file path's extension.
 * @param filePath - Path whose extension selects the format
 * @param tryAll - Fall back to every other format after the hinted one
 * @returns The hint, or null when the extension is not in the format table
 */
export function makeFormatHint(filePath: string, tryAll: boolean = false): FormatHint | null {
	const info = findFormatInfo(path.extname(filePath));
	if (!info) {
		return null;
	}
	return { format: info.format, strategy: tryAll ? 'first' : 'only' };
}
