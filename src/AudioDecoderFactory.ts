import type { Format, FormatHint } from './AudioFormat';
import type { OpenResult } from './AudioDecoder';
import type { ByteInputStream } from './ByteStream';
import { ContainerDecoder } from './ContainerCodec/ContainerDecoder';
import { UnrecognizedFormatError } from './errors';
import { getFormatsToTry } from './FormatHint';
import logger from './logger';
import { getInstruments } from './telemetry/instruments';
import { WavpackDecoder } from './WavpackCodec/WavpackDecoder';

export type AnyAudioDecoder = ContainerDecoder | WavpackDecoder;

/**
 * Open a decoder for one candidate format.
 * Container formats go to the wasm codecs, wavpack to the registered engine.
 */
export async function tryCreateDecoder(stream: ByteInputStream, format: Format): Promise<OpenResult<AnyAudioDecoder>> {
	switch (format) {
		case 'wav':
		case 'mp3':
		case 'flac':
			return ContainerDecoder.open(stream, format);
		case 'wavpack':
			return WavpackDecoder.open(stream);
	}
}

export function recordProbeFailure(format: Format, reason: string): void {
	logger.debug(`Format probe ${format} failed: ${reason}`);
	getInstruments().formatProbeFailuresTotal.add(1, { format });
}

/**
 * Open a decoder for the first candidate of the hint that accepts the stream.
 * The stream is rewound to its start after every rejected candidate.
 * Throws UnrecognizedFormatError when no candidate opens.
 */
export async function createDecoder(stream: ByteInputStream, hint: FormatHint): Promise<AnyAudioDecoder> {
	const formats = getFormatsToTry(hint);
	for (const format of formats) {
		const result = await tryCreateDecoder(stream, format);
		if (result.ok) {
			return result.value;
		}
		recordProbeFailure(format, result.reason);
		stream.seek(0, 'start');
	}
	throw new UnrecognizedFormatError(formats);
}
