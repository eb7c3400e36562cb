import { errorMessage } from "./errors.js";
import { type NodeLogger, nullLogger } from "./logger.js";

/** Subscriber list for one change event; add() returns the unsubscribe */
export class HandlerSet<T> {
	private handlers: Array<(value: T) => void> = [];

	constructor(
		private readonly name: string,
		private readonly logger: NodeLogger = nullLogger,
	) {}

	get size(): number {
		return this.handlers.length;
	}

	add(handler: (value: T) => void): () => void {
		this.handlers.push(handler);
		return () => {
			this.handlers = this.handlers.filter((h) => h !== handler);
		};
	}

	emit(value: T): void {
		for (const handler of [...this.handlers]) {
			try {
				handler(value);
			} catch (err) {
				this.logger.error(`${this.name} handler threw`, { error: errorMessage(err) });
			}
		}
	}
}
