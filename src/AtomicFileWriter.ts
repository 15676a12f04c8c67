import fs from 'node:fs';
import logger from './logger';
import { BackendUnavailableError, AudioStreamError, errorMessage } from './errors';
import { getInstruments } from './telemetry/instruments';

export const TMP_FILE_SUFFIX = '.tmp';

export function makeTmpFilePath(destination: string): string {
	return `${destination}${TMP_FILE_SUFFIX}`;
}

/**
 * Write-to-temp-then-rename file output.
 *
 * The destination path is never observed partially written: bytes go to
 * `<destination>.tmp` and only commit() renames it into place. Owners must call
 * discard() on every exit path (typically in a finally block); it removes the
 * temporary file unless the writer was committed.
 */
export class AtomicFileWriter {
	private readonly _path: string;
	private readonly _tmpPath: string;
	private _fd: number | null;
	private _committed = false;
	private _discarded = false;

	constructor(destination: string) {
		this._path = destination;
		this._tmpPath = makeTmpFilePath(destination);
		try {
			this._fd = fs.openSync(this._tmpPath, 'w');
		} catch (err) {
			throw new BackendUnavailableError(`Failed to create temporary file ${this._tmpPath}: ${errorMessage(err)}`, { cause: err });
		}
	}

	get tmpPath(): string {
		return this._tmpPath;
	}

	get committed(): boolean {
		return this._committed;
	}

	/**
	 * Descriptor of the open temporary file.
	 */
	get fd(): number {
		if (this._fd === null) {
			throw new AudioStreamError('commit', `Temporary file for ${this._path} is already closed`);
		}
		return this._fd;
	}

	commit(): void {
		if (this._committed) {
			return;
		}
		const fd = this.fd;
		try {
			fs.fsyncSync(fd);
			fs.closeSync(fd);
			this._fd = null;
			fs.renameSync(this._tmpPath, this._path);
		} catch (err) {
			throw new AudioStreamError('commit', `Failed to commit ${this._path}: ${errorMessage(err)}`, { cause: err });
		}
		this._committed = true;
		getInstruments().atomicCommitsTotal.add(1);
		logger.debug(`Committed ${this._path}`);
	}

	/**
	 * Close and delete the temporary file if the writer was not committed.
	 * Cleanup errors are logged, never thrown.
	 */
	discard(): void {
		if (this._committed || this._discarded) {
			return;
		}
		this._discarded = true;
		try {
			if (this._fd !== null) {
				fs.closeSync(this._fd);
				this._fd = null;
			}
			fs.rmSync(this._tmpPath, { force: true });
			getInstruments().atomicDiscardsTotal.add(1);
			logger.debug(`Discarded uncommitted ${this._tmpPath}`);
		} catch (err) {
			logger.warn(`Failed to remove temporary file ${this._tmpPath}: ${errorMessage(err)}`);
		}
	}
}
