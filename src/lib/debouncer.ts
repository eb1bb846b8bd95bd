export class Debouncer {
	readonly #settlingTimeMs: number;
	#timeoutHandle: NodeJS.Timeout | undefined = undefined;
	#nextCallback: (() => void) | undefined = undefined;

	constructor(settlingTimeMs: number) {
		this.#settlingTimeMs = settlingTimeMs;
	}

	get isPending() {
		return this.#timeoutHandle !== undefined;
	}

	#run() {
		const callback = this.#nextCallback;

		clearTimeout(this.#timeoutHandle);
		this.#nextCallback = undefined;
		this.#timeoutHandle = undefined;

		callback?.();
	}

	trigger(callback: () => void) {
		this.#nextCallback = callback;

		clearTimeout(this.#timeoutHandle);
		this.#timeoutHandle = setTimeout(
			() => {
				this.#run();
			},
			this.#settlingTimeMs
		);
	}

	// Runs the pending callback now instead of at the end of the window.
	flush() {
		if (this.#timeoutHandle) {
			this.#run();
		}
	}

	cancel() {
		clearTimeout(this.#timeoutHandle);
		this.#timeoutHandle = undefined;
		this.#nextCallback = undefined;
	}
}
