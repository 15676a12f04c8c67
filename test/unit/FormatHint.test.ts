/**
 * Tests for format candidate ordering and extension lookup
 */

import { describe, it, expect } from 'vitest';
import { getFormatsToTry, getKnownFileExtensions, makeFormatHint, TRY_ALL_FORMATS } from '../../src/FormatHint';

describe('getFormatsToTry', () => {
	it('should return only the hinted format for the only strategy', () => {
		expect(getFormatsToTry({ format: 'mp3', strategy: 'only' })).toEqual(['mp3']);
	});

	it('should put the hinted format first and keep canonical order for the rest', () => {
		expect(getFormatsToTry({ format: 'flac', strategy: 'first' })).toEqual(['flac', 'wav', 'mp3', 'wavpack']);
		expect(getFormatsToTry({ format: 'wavpack', strategy: 'first' })).toEqual(['wavpack', 'wav', 'mp3', 'flac']);
		expect(getFormatsToTry({ format: 'mp3', strategy: 'first' })).toEqual(['mp3', 'wav', 'flac', 'wavpack']);
	});

	it('should try every format once when trying all', () => {
		expect(getFormatsToTry(TRY_ALL_FORMATS)).toEqual(['wav', 'mp3', 'flac', 'wavpack']);
	});
});

describe('makeFormatHint', () => {
	it('should list the known extensions', () => {
		expect(getKnownFileExtensions()).toEqual(['.FLAC', '.MP3', '.WAV', '.WV']);
	});

	it('should map an extension to an only hint', () => {
		expect(makeFormatHint('/music/song.wv')).toEqual({ format: 'wavpack', strategy: 'only' });
	});

	it('should match extensions case-insensitively', () => {
		expect(makeFormatHint('takes/B.Flac', true)).toEqual({ format: 'flac', strategy: 'first' });
		expect(makeFormatHint('loop.mp3')).toEqual({ format: 'mp3', strategy: 'only' });
	});

	it('should return null for unknown or missing extensions', () => {
		expect(makeFormatHint('voice.ogg')).toBeNull();
		expect(makeFormatHint('README')).toBeNull();
	});
});
