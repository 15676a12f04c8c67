/**
 * OpenTelemetry meter access.
 *
 * This package only depends on the API: instruments are no-ops until the host
 * application registers a MeterProvider (e.g. through @opentelemetry/sdk-metrics).
 */

import { metrics, type Meter } from '@opentelemetry/api';

const METER_NAME = 'audio-stream-io';

let meter: Meter | null = null;

/**
 * Get the meter used by this package's instruments.
 */
export function getMeter(): Meter {
	if (!meter) {
		meter = metrics.getMeter(METER_NAME);
	}
	return meter;
}
