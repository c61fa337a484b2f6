/**
 * Runs tasks one at a time, in the order they were submitted.
 * A failing task does not block the ones queued after it.
 */
export class SerialLock {
	private tail: Promise<void> = Promise.resolve();

	run<T>(task: () => Promise<T>): Promise<T> {
		const result = this.tail.then(task);
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}
}
