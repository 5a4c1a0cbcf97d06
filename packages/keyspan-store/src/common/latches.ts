/**
 * FIFO mutex for serializing async work on one resource.
 */
export class Latch {
	// Settles when the last queued holder has finished.
	private tail: Promise<void> = Promise.resolve();

	/**
	 * Runs `fn` once every earlier holder has settled. A failing holder
	 * rejects its own result and releases the latch for the next one.
	 */
	run<T>(fn: () => Promise<T>): Promise<T> {
		const result = this.tail.then(fn);
		this.tail = result.then(() => undefined, () => undefined);
		return result;
	}
}
