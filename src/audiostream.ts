import {
	neverAbort,
	validateHeader,
	type Format,
	type FormatHint,
	type Header,
	type OperationResult,
	type ShouldAbort,
	type StorageType,
} from './AudioFormat';
import type { AudioDecoder } from './AudioDecoder';
import { createDecoder, recordProbeFailure, tryCreateDecoder } from './AudioDecoderFactory';
import { createEncoder } from './AudioEncoderFactory';
import type { ByteInputStream, ByteOutputStream } from './ByteStream';
import { AudioStreamError, UnrecognizedFormatError } from './errors';
import { FileByteInputStream, FileByteOutputStream } from './FileByteStream';
import { getFormatsToTry, makeFormatHint, TRY_ALL_FORMATS } from './FormatHint';
import type { FrameOutputStream, FrameSource } from './FrameStream';
import { createItem, ItemFrameInputStream, ItemOutputStream, type Item } from './Item';
import logger from './logger';
import { getInstruments } from './telemetry/instruments';
import { pumpFrames } from './TransferPump';

type OperationName = 'read' | 'write' | 'transcode';

function recordOperation(operation: OperationName, result: OperationResult | 'error'): void {
	getInstruments().operationsTotal.add(1, { operation, result });
}

/**
 * Track the outcome of an operation in the operations counter, errors included.
 */
async function measured(operation: OperationName, run: () => Promise<OperationResult>): Promise<OperationResult> {
	try {
		const result = await run();
		recordOperation(operation, result);
		return result;
	} catch (err) {
		recordOperation(operation, 'error');
		throw err;
	}
}

function decoderSource(decoder: AudioDecoder): FrameSource {
	return { readFrames: (buffer, frames) => decoder.readPcmFrames(buffer, frames) };
}

/**
 * Decode a byte stream into a frame output stream.
 *
 * Candidate formats from the hint are tried in order; after each candidate
 * that fails to open, both the input and the output are rewound to their
 * start. Errors once a candidate has opened propagate.
 * Throws UnrecognizedFormatError when no candidate opens.
 */
export async function read(
	input: ByteInputStream,
	output: FrameOutputStream,
	hint: FormatHint,
	shouldAbort: ShouldAbort = neverAbort,
): Promise<OperationResult> {
	return measured('read', async () => {
		const formats = getFormatsToTry(hint);
		for (const format of formats) {
			const result = await tryCreateDecoder(input, format);
			if (!result.ok) {
				recordProbeFailure(format, result.reason);
				input.seek(0, 'start');
				output.seek(0);
				continue;
			}

			const decoder = result.value;
			try {
				output.writeHeader(decoder.header);
				return await pumpFrames({
					frameCount: decoder.header.frameCount,
					channelCount: decoder.header.channelCount,
					source: decoderSource(decoder),
					sink: {
						writeFrames: (buffer, frames) => output.writeFrames(buffer, frames),
						finish: () => output.commit(),
					},
					shouldAbort,
				});
			} finally {
				decoder.free();
			}
		}
		throw new UnrecognizedFormatError(formats);
	});
}

/**
 * Header of the first candidate format that opens the stream.
 * Throws UnrecognizedFormatError when no candidate opens.
 */
export async function readHeader(input: ByteInputStream, hint: FormatHint): Promise<Readonly<Header>> {
	const decoder = await createDecoder(input, hint);
	try {
		return decoder.header;
	} finally {
		decoder.free();
	}
}

async function encodeFrames(
	header: Header,
	source: FrameSource,
	output: ByteOutputStream,
	storageType: StorageType,
	shouldAbort: ShouldAbort,
): Promise<OperationResult> {
	const validated = validateHeader(header);
	const encoder = createEncoder(output, validated, storageType);
	try {
		return await pumpFrames({
			frameCount: validated.frameCount,
			channelCount: validated.channelCount,
			source,
			sink: {
				writeFrames: (buffer, frames) => encoder.writePcmFrames(buffer, frames),
				finish: async () => {
					await encoder.finish();
					output.commit();
				},
			},
			shouldAbort,
		});
	} finally {
		encoder.free();
	}
}

/**
 * Encode header.frameCount frames from source into output as header.format.
 *
 * The output is committed only after every frame was written and the encoder
 * finished; an aborted or failed write leaves it uncommitted.
 * Throws InvalidHeaderError for a header that breaks the channel/bit-depth rules.
 */
export async function write(
	header: Header,
	source: FrameSource,
	output: ByteOutputStream,
	storageType: StorageType,
	shouldAbort: ShouldAbort = neverAbort,
): Promise<OperationResult> {
	return measured('write', () => encodeFrames(header, source, output, storageType, shouldAbort));
}

/**
 * Read a whole file into memory.
 * Without a hint the extension picks the first format to try, then every other format is tried.
 * @returns The decoded item, or null if the read was aborted
 */
export async function readFile(filePath: string, hint?: FormatHint, shouldAbort: ShouldAbort = neverAbort): Promise<Item | null> {
	const formatHint = hint ?? makeFormatHint(filePath, true) ?? TRY_ALL_FORMATS;
	const input = new FileByteInputStream(filePath);
	try {
		const item = createItem();
		const result = await read(input, new ItemOutputStream(item), formatHint, shouldAbort);
		return result === 'success' ? item : null;
	} finally {
		input.close();
	}
}

/**
 * Write an in-memory item to a file as item.header.format.
 * The destination only appears once the whole file has been written.
 */
export async function writeFile(
	item: Item,
	filePath: string,
	storageType: StorageType,
	shouldAbort: ShouldAbort = neverAbort,
): Promise<OperationResult> {
	const output = new FileByteOutputStream(filePath);
	try {
		return await write(item.header, new ItemFrameInputStream(item), output, storageType, shouldAbort);
	} finally {
		output.discard();
	}
}

export interface TranscodeOptions {
	storageType: StorageType;
	/** Input hint; derived from the input extension when omitted */
	hint?: FormatHint;
	/** Output format; derived from the output extension when omitted */
	format?: Format;
	/** Output bit depth; the input's when omitted */
	bitDepth?: number;
	shouldAbort?: ShouldAbort;
}

/**
 * Re-encode one file into another, streaming chunk by chunk.
 */
export async function transcode(inputPath: string, outputPath: string, options: TranscodeOptions): Promise<OperationResult> {
	const format = options.format ?? makeFormatHint(outputPath)?.format;
	if (!format) {
		throw new AudioStreamError('open', `Cannot infer an output format from ${outputPath}`);
	}
	const hint = options.hint ?? makeFormatHint(inputPath, true) ?? TRY_ALL_FORMATS;

	return measured('transcode', async () => {
		const input = new FileByteInputStream(inputPath);
		try {
			const decoder = await createDecoder(input, hint);
			try {
				const header: Header = {
					...decoder.header,
					format,
					bitDepth: options.bitDepth ?? decoder.header.bitDepth,
				};
				logger.info(`Transcoding ${inputPath} (${decoder.format}) to ${outputPath} (${format})`);
				const output = new FileByteOutputStream(outputPath);
				try {
					return await encodeFrames(header, decoderSource(decoder), output, options.storageType, options.shouldAbort ?? neverAbort);
				} finally {
					output.discard();
				}
			} finally {
				decoder.free();
			}
		} finally {
			input.close();
		}
	});
}
