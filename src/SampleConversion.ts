/**
 * Sample layout and numeric representation conversions.
 *
 * Planar buffers hold one Float32Array per channel. Interleaved buffers hold
 * frames back to back: sample (frame, channel) lives at frame * channels + channel.
 * Both codec backends consume and produce interleaved frames.
 */

export type PlanarBuffer = Float32Array[];

/**
 * Full-scale integer magnitude for a bit depth: 2^(bitDepth-1) - 1.
 * Computed with exponentiation so 32-bit depths do not overflow a shift.
 */
export function intScale(bitDepth: number): number {
	return 2 ** (bitDepth - 1) - 1;
}

/**
 * Interleave frames [offset, offset + frames) of a planar buffer.
 * @param planar - One array per channel
 * @param out - Destination; allocated when omitted
 * @returns The interleaved buffer
 */
export function interleave(planar: PlanarBuffer, out?: Float32Array, offset: number = 0, frames?: number): Float32Array {
	const channels = planar.length;
	const frameCount = frames ?? (channels > 0 ? planar[0].length - offset : 0);
	const result = out ?? new Float32Array(frameCount * channels);
	for (let ch = 0; ch < channels; ch++) {
		const channel = planar[ch];
		for (let i = 0; i < frameCount; i++) {
			result[i * channels + ch] = channel[offset + i];
		}
	}
	return result;
}

/**
 * Deinterleave `frames` frames into a planar buffer starting at frame `offset`.
 */
export function deinterleave(interleaved: Float32Array, planar: PlanarBuffer, offset: number = 0, frames?: number): PlanarBuffer {
	const channels = planar.length;
	const frameCount = frames ?? (channels > 0 ? Math.floor(interleaved.length / channels) : 0);
	for (let ch = 0; ch < channels; ch++) {
		const channel = planar[ch];
		for (let i = 0; i < frameCount; i++) {
			channel[offset + i] = interleaved[i * channels + ch];
		}
	}
	return planar;
}

/**
 * Allocate a zeroed planar buffer.
 */
export function createPlanarBuffer(channels: number, frames: number): PlanarBuffer {
	return Array.from({ length: channels }, () => new Float32Array(frames));
}

/**
 * Round to the nearest integer, halves away from zero.
 */
export function roundHalfAway(value: number): number {
	return Math.sign(value) * Math.round(Math.abs(value));
}

/**
 * Scale float samples to fixed-point: round(sample * intScale(bitDepth)),
 * clamped to the representable range.
 */
export function floatToInt(samples: Float32Array, bitDepth: number, out?: Int32Array, count?: number): Int32Array {
	const n = count ?? samples.length;
	const scale = intScale(bitDepth);
	const result = out ?? new Int32Array(n);
	for (let i = 0; i < n; i++) {
		const value = roundHalfAway(samples[i] * scale);
		result[i] = value > scale ? scale : value < -scale - 1 ? -scale - 1 : value;
	}
	return result;
}

/**
 * Scale fixed-point samples to float: value / intScale(bitDepth).
 */
export function intToFloat(samples: ArrayLike<number>, bitDepth: number, out?: Float32Array, count?: number): Float32Array {
	const n = count ?? samples.length;
	const divisor = intScale(bitDepth);
	const result = out ?? new Float32Array(n);
	for (let i = 0; i < n; i++) {
		result[i] = samples[i] / divisor;
	}
	return result;
}
