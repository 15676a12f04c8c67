export {
	FORMATS,
	VALID_BIT_DEPTHS,
	neverAbort,
	isFormat,
	getHeaderProblem,
	validateHeader,
	type Format,
	type FormatHint,
	type FormatStrategy,
	type Header,
	type OperationResult,
	type ShouldAbort,
	type StorageType,
} from './AudioFormat';
export { read, readHeader, write, readFile, writeFile, transcode, type TranscodeOptions } from './audiostream';
export { AudioStreamer, open, openBytes } from './AudioStreamer';
export type { AudioDecoder, BackendKind, OpenResult } from './AudioDecoder';
export type { AudioEncoder } from './AudioEncoder';
export { createDecoder, tryCreateDecoder, type AnyAudioDecoder } from './AudioDecoderFactory';
export { createEncoder, type AnyAudioEncoder } from './AudioEncoderFactory';
export { getFormatsToTry, getKnownFileExtensions, makeFormatHint, TRY_ALL_FORMATS } from './FormatHint';
export type { ByteInputStream, ByteOutputStream, SeekOrigin } from './ByteStream';
export { MemoryByteInputStream, MemoryByteOutputStream } from './MemoryByteStream';
export { FileByteInputStream, FileByteOutputStream } from './FileByteStream';
export { AtomicFileWriter } from './AtomicFileWriter';
export type { FrameOutputStream, FrameSink, FrameSource } from './FrameStream';
export { createItem, allocateItem, ItemFrameInputStream, ItemOutputStream, type Item } from './Item';
export { pumpFrames, type PumpOptions, type PumpSink } from './TransferPump';
export { interleave, deinterleave, intScale, floatToInt, intToFloat, type PlanarBuffer } from './SampleConversion';
export {
	setWavpackLibrary,
	getWavpackLibrary,
	MODE_FLOAT,
	type WavpackBlockOutput,
	type WavpackConfig,
	type WavpackInputContext,
	type WavpackLibrary,
	type WavpackOpenResult,
	type WavpackOutputContext,
	type WavpackStreamReader,
} from './WavpackCodec/WavpackLibrary';
export {
	AudioStreamError,
	BackendUnavailableError,
	IncompleteTransferError,
	InvalidHeaderError,
	UnrecognizedFormatError,
	type AudioStage,
} from './errors';
