import { LaxmlError } from "./error.js";
import type { Reader } from "./reader.js";
import type { ParserHandlers, Span } from "./types.js";

/**
 * Push-style front end: drains a {@link Reader} and hands every event to the
 * matching handler.
 */
export class Parser<T extends Span> {
	public error: LaxmlError | null = null;
	public handlers: Partial<ParserHandlers<T>>;

	private isEnded = false;
	private readonly reader: Reader<T>;

	constructor(reader: Reader<T>, handlers: Partial<ParserHandlers<T>> = {}) {
		this.reader = reader;
		this.handlers = handlers;
	}

	/**
	 * Reads until the end of the source or the first malformed tag. A
	 * malformed tag goes to `onError` and stops the run; without an `onError`
	 * handler the error is thrown instead.
	 */
	public run(): void {
		if (this.error) {
			throw this.error;
		}

		if (this.isEnded) return;

		try {
			this.dispatch();
		} catch (error) {
			if (!(error instanceof LaxmlError)) throw error;

			this.error = error;

			if (!this.handlers.onError) throw error;
			this.handlers.onError(error);
			return;
		}

		this.isEnded = true;
		this.handlers.onEnd?.();
	}

	private dispatch(): void {
		const { handlers } = this;

		for (const event of this.reader) {
			switch (event.type) {
				case "openTag":
					handlers.onOpenTag?.(event.tag);
					break;
				case "closeTag":
					handlers.onCloseTag?.(event.tag);
					break;
				case "emptyTag":
					handlers.onEmptyTag?.(event.tag);
					break;
				case "text":
					handlers.onText?.(event.text);
					break;
			}
		}
	}
}
