import { BYTE_ORDER_MARK, CHAR, State } from "./constants.js";
import { BYTE_SPANS, type SpanOps, TEXT_SPANS } from "./span.js";
import { Text, tokenizeTag } from "./tag.js";
import type { Event, ReaderOptions, Span } from "./types.js";
import { trimBounds } from "./utils.js";

/**
 * Pull tokenizer producing one {@link Event} per {@link Reader.read} call.
 *
 * Nothing is copied: names, contents and text are spans of the source. The
 * reader never validates nesting, entities or anything beyond the shape of
 * each tag.
 *
 * @example
 * ```ts
 * for (const event of Reader.fromString("<Test>hello, world!</Test>")) {
 * 	console.log(event.type);
 * }
 * ```
 */
export class Reader<T extends Span> implements Iterable<Event<T>> {
	public options: ReaderOptions;

	private readonly ops: SpanOps<T>;
	private readonly source: T;
	private position = 0;
	private state = State.SEARCHING;

	constructor(source: T, ops: SpanOps<T>, options: Partial<ReaderOptions> = {}) {
		this.source = source;
		this.ops = ops;

		this.options = {
			trim: true,
			...options,
		};
	}

	public static fromBytes(
		xml: Uint8Array,
		options: Partial<ReaderOptions> = {},
	): Reader<Uint8Array> {
		return new Reader(xml, BYTE_SPANS, options);
	}

	public static fromString(
		xml: string,
		options: Partial<ReaderOptions> = {},
	): Reader<string> {
		return new Reader(xml, TEXT_SPANS, options);
	}

	/** Like {@link Reader.fromString}, dropping any leading byte order marks. */
	public static fromStringBom(
		xml: string,
		options: Partial<ReaderOptions> = {},
	): Reader<string> {
		let start = 0;
		while (xml.startsWith(BYTE_ORDER_MARK, start)) start++;
		return Reader.fromString(start === 0 ? xml : xml.slice(start), options);
	}

	/** Absolute offset of the cursor in the source. */
	public get offset(): number {
		return this.position;
	}

	public get trim(): boolean {
		return this.options.trim;
	}

	/** Takes effect from the next text run on, even mid-document. */
	public trimWhitespace(trim: boolean): this {
		this.options.trim = trim;
		return this;
	}

	/**
	 * Produces the next event, or `{ type: "end" }` once the source is used up.
	 *
	 * @throws {LaxmlError} when the tag at the cursor is malformed. The cursor
	 * stays on that tag, so reading again throws the same error.
	 */
	public read(): Event<T> {
		while (true) {
			switch (this.state) {
				case State.SEARCHING: {
					const text = this.search();
					if (text) return { type: "text", text };
					break;
				}

				case State.LOCATED_TAG: {
					const { kind, tag } = tokenizeTag(this.ops, this.source, this.position);
					this.position = tag.end;
					this.state = State.SEARCHING;
					return { type: kind, tag };
				}

				case State.END:
					return { type: "end" };
			}
		}
	}

	*[Symbol.iterator](): Iterator<Event<T>> {
		while (true) {
			const event = this.read();
			if (event.type === "end") return;
			yield event;
		}
	}

	// Moves to the next tag (or the end) and returns the text skipped on the
	// way, unless trimming left nothing of it.
	private search(): Text<T> | null {
		const { ops, source } = this;
		const start = this.position;

		let end = ops.indexOf(source, CHAR.LESS_THAN, start);
		if (end === -1) {
			end = ops.length(source);
			this.position = end;
			this.state = State.END;
		} else {
			this.position = end + 1;
			this.state = State.LOCATED_TAG;
		}

		let textStart = start;
		let textEnd = end;

		if (this.options.trim) {
			const run = ops.slice(source, start, end);
			const [left, right] = trimBounds(ops, run);
			textStart = start + left;
			textEnd = start + right;
		}

		if (textStart === textEnd) return null;

		return new Text(ops.slice(source, textStart, textEnd), textStart, textEnd);
	}
}
