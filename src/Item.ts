import type { Header } from './AudioFormat';
import type { FrameOutputStream, FrameSource } from './FrameStream';
import { AudioStreamError } from './errors';
import { createPlanarBuffer, deinterleave, interleave, type PlanarBuffer } from './SampleConversion';

/**
 * Decoded audio held in memory: `frames` has header.channelCount channels,
 * each header.frameCount long.
 */
export interface Item {
	header: Readonly<Header>;
	frames: PlanarBuffer;
}

const EMPTY_HEADER: Readonly<Header> = Object.freeze({
	format: 'wav',
	channelCount: 0,
	frameCount: 0,
	sampleRate: 0,
	bitDepth: 0,
});

/**
 * An empty item, to be populated by an ItemOutputStream.
 */
export function createItem(): Item {
	return { header: EMPTY_HEADER, frames: [] };
}

/**
 * An item with zeroed frames sized from the header.
 */
export function allocateItem(header: Readonly<Header>): Item {
	return { header, frames: createPlanarBuffer(header.channelCount, header.frameCount) };
}

/**
 * Reads an item's planar frames as interleaved chunks, front to back.
 */
export class ItemFrameInputStream implements FrameSource {
	private readonly _item: Item;
	private _pos = 0;

	constructor(item: Item) {
		this._item = item;
	}

	get position(): number {
		return this._pos;
	}

	readFrames(buffer: Float32Array, frames: number): number {
		const channels = this._item.frames.length;
		if (channels === 0) {
			return 0;
		}
		const available = this._item.frames[0].length - this._pos;
		const capacity = Math.floor(buffer.length / channels);
		const toRead = Math.max(0, Math.min(frames, available, capacity));
		interleave(this._item.frames, buffer, this._pos, toRead);
		this._pos += toRead;
		return toRead;
	}
}

/**
 * Frame sink that fills an item. The header allocates the planar buffer;
 * frames are deinterleaved into it at an advancing position.
 */
export class ItemOutputStream implements FrameOutputStream {
	private readonly _item: Item;
	private _pos = 0;
	private _headerWritten = false;

	constructor(item: Item) {
		this._item = item;
	}

	get item(): Item {
		return this._item;
	}

	get position(): number {
		return this._pos;
	}

	writeHeader(header: Readonly<Header>): void {
		if (this._headerWritten && this._pos > 0) {
			throw new AudioStreamError('header', 'Header already written; seek(0) before writing a new one');
		}
		this._item.header = header;
		this._item.frames = createPlanarBuffer(header.channelCount, header.frameCount);
		this._headerWritten = true;
	}

	writeFrames(buffer: Float32Array, frames: number): number {
		if (!this._headerWritten) {
			throw new AudioStreamError('transfer', 'Header not written yet');
		}
		const channels = this._item.header.channelCount;
		const space = this._item.header.frameCount - this._pos;
		const toWrite = Math.max(0, Math.min(frames, space, Math.floor(buffer.length / channels)));
		deinterleave(buffer, this._item.frames, this._pos, toWrite);
		this._pos += toWrite;
		return toWrite;
	}

	seek(frame: number): boolean {
		if (!Number.isInteger(frame) || frame < 0 || frame > this._item.header.frameCount) {
			return false;
		}
		this._pos = frame;
		return true;
	}

	commit(): void {
		// Frames are already in place
	}
}
