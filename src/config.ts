import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

/** Frames moved per transfer-pump iteration when nothing else is configured */
export const DEFAULT_CHUNK_FRAMES = 1 << 14;

function parseIntOrDefault(value: string | undefined, defaultValue: number): number {
	if (!value) return defaultValue;
	const parsed = parseInt(value, 10);
	return isNaN(parsed) ? defaultValue : parsed;
}

function parsePositiveIntOrDefault(value: string | undefined, defaultValue: number): number {
	const parsed = parseIntOrDefault(value, defaultValue);
	return parsed > 0 ? parsed : defaultValue;
}

export const config = {
	logLevel: process.env.LOG_LEVEL || 'info',
	// Log every chunk moved by the transfer pump
	debug: process.env.DEBUG === 'true',
	chunkFrames: parsePositiveIntOrDefault(process.env.AUDIO_CHUNK_FRAMES, DEFAULT_CHUNK_FRAMES),
} as const;
