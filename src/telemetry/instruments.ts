/**
 * OpenTelemetry metric instruments for audio-stream-io.
 *
 * All metrics are prefixed with 'asio_'.
 */

import type { Counter } from '@opentelemetry/api';
import { getMeter } from '../telemetry';

// Lazy initialization - instruments created on first access
let _instruments: Instruments | null = null;

interface Instruments {
	operationsTotal: Counter;
	framesTransferredTotal: Counter;
	formatProbeFailuresTotal: Counter;
	atomicCommitsTotal: Counter;
	atomicDiscardsTotal: Counter;
}

function createInstruments(): Instruments {
	const meter = getMeter();

	return {
		operationsTotal: meter.createCounter('asio_operations_total', {
			description: 'Completed read/write operations by operation and result',
			unit: '{operations}',
		}),

		framesTransferredTotal: meter.createCounter('asio_frames_transferred_total', {
			description: 'Total frames moved by the transfer pump',
			unit: '{frames}',
		}),

		formatProbeFailuresTotal: meter.createCounter('asio_format_probe_failures_total', {
			description: 'Candidate formats that failed to open during format resolution',
			unit: '{probes}',
		}),

		atomicCommitsTotal: meter.createCounter('asio_atomic_commits_total', {
			description: 'Temporary files promoted to their destination',
			unit: '{files}',
		}),

		atomicDiscardsTotal: meter.createCounter('asio_atomic_discards_total', {
			description: 'Temporary files discarded without commit',
			unit: '{files}',
		}),
	};
}

/**
 * Get metric instruments (lazy initialization).
 */
export function getInstruments(): Instruments {
	if (!_instruments) {
		_instruments = createInstruments();
	}
	return _instruments;
}

export type { Instruments };
