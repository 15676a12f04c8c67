/**
 * One buffer of 32-bit sample words seen both as integers and as floats.
 * The engine only moves Int32Array data; float-mode samples are the same bits.
 */
export class SampleWords {
	private _ints = new Int32Array(0);
	private _floats = new Float32Array(0);

	/**
	 * Views of at least `count` words. Contents are not preserved across growth.
	 */
	reserve(count: number): { ints: Int32Array; floats: Float32Array } {
		if (this._ints.length < count) {
			this._ints = new Int32Array(count);
			this._floats = new Float32Array(this._ints.buffer);
		}
		return { ints: this._ints, floats: this._floats };
	}
}
