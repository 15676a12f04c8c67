import type { OperationResult, ShouldAbort } from './AudioFormat';
import { config } from './config';
import { IncompleteTransferError } from './errors';
import type { Awaitable, FrameSink, FrameSource } from './FrameStream';
import logger from './logger';
import { getInstruments } from './telemetry/instruments';

export interface PumpSink extends FrameSink {
	/**
	 * Called once after the last chunk when the transfer was not aborted.
	 */
	finish?(): Awaitable<void>;
}

export interface PumpOptions {
	frameCount: number;
	channelCount: number;
	source: FrameSource;
	sink: PumpSink;
	shouldAbort: ShouldAbort;
	/** Defaults to config.chunkFrames */
	chunkFrames?: number;
}

/**
 * Move exactly frameCount frames from source to sink in bounded chunks.
 *
 * Abort is polled before each chunk; an aborted transfer returns 'abort'
 * without finishing the sink. Every chunk must be read and written in full,
 * otherwise IncompleteTransferError is thrown and nothing further is requested.
 */
export async function pumpFrames(options: PumpOptions): Promise<OperationResult> {
	const { frameCount, channelCount, source, sink, shouldAbort } = options;
	const chunkFrames = options.chunkFrames ?? config.chunkFrames;
	if (!Number.isInteger(chunkFrames) || chunkFrames <= 0) {
		throw new RangeError(`chunkFrames must be a positive integer, got: ${chunkFrames}`);
	}
	const buffer = new Float32Array(Math.min(frameCount, chunkFrames) * channelCount);
	let remaining = frameCount;

	while (remaining > 0) {
		if (shouldAbort()) {
			logger.debug(`Transfer aborted with ${remaining} of ${frameCount} frames remaining`);
			return 'abort';
		}
		const frames = Math.min(remaining, chunkFrames);
		const framesRead = await source.readFrames(buffer, frames);
		if (framesRead !== frames) {
			throw new IncompleteTransferError('read', frames, framesRead);
		}
		const framesWritten = await sink.writeFrames(buffer, frames);
		if (framesWritten !== frames) {
			throw new IncompleteTransferError('write', frames, framesWritten);
		}
		remaining -= frames;
		getInstruments().framesTransferredTotal.add(frames);
		if (config.debug) {
			logger.debug(`Transferred ${frames} frames, ${remaining} remaining`);
		}
	}

	await sink.finish?.();
	return 'success';
}
