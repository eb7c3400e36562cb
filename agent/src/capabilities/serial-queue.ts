/**
 * Runs tasks one at a time in submission order. Capabilities that drive a
 * single hardware device route their provider calls through one of these so
 * the shared transport loop never waits on a device.
 */
export class SerialQueue {
	private tail: Promise<unknown> = Promise.resolve();
	private _pending = 0;

	get pending(): number {
		return this._pending;
	}

	run<T>(task: () => Promise<T>): Promise<T> {
		this._pending++;
		const result = this.tail.then(() => task());
		this.tail = result.then(
			() => {
				this._pending--;
			},
			() => {
				this._pending--;
			},
		);
		return result;
	}
}
