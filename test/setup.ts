/**
 * Global test setup file
 * Runs before all tests
 */

import { afterEach, beforeEach, vi } from 'vitest';
import logger from '../src/logger';
import { setWavpackLibrary } from '../src/WavpackCodec/WavpackLibrary';

// Reset all mocks between tests
afterEach(() => {
	vi.clearAllMocks();
	vi.restoreAllMocks();
	vi.unstubAllEnvs();
	setWavpackLibrary(null);
});

// Suppress log output during tests unless DEBUG is set
if (!process.env.DEBUG) {
	logger.silent = true;
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		vi.spyOn(console, 'error').mockImplementation(() => {});
		vi.spyOn(console, 'warn').mockImplementation(() => {});
	});
}
