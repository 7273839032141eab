import { CHAR } from "./constants.js";
import { LaxmlError } from "./error.js";
import { type SpanOps, toText } from "./span.js";
import type { Span } from "./types.js";
import { skipWhitespace, trim } from "./utils.js";

export class Attribute<T extends Span> {
	public readonly key: T;
	/** Raw bytes between the quotes, never unescaped. */
	public readonly value: T;
	/** Offset of the first byte of the key. */
	public readonly start: number;

	constructor(key: T, value: T, start: number) {
		this.key = key;
		this.value = value;
		this.start = start;
	}
}

/**
 * Forward-only cursor over the `key="value"` pairs of a tag's content.
 *
 * Whitespace between pairs is optional and quotes may be `"` or `'`, whichever
 * comes first after the `=`. A failed step leaves the cursor where it was, so
 * calling {@link AttributeCursor.read} again fails the same way.
 */
export class AttributeCursor<T extends Span> implements Iterable<Attribute<T>> {
	private readonly baseOffset: number;
	private readonly content: T;
	private readonly ops: SpanOps<T>;
	private position = 0;

	/**
	 * @param baseOffset added to every reported offset, so cursors made by
	 * `Tag.attributes()` report positions in the whole source.
	 */
	constructor(ops: SpanOps<T>, content: T, baseOffset = 0) {
		this.ops = ops;
		this.content = content;
		this.baseOffset = baseOffset;
	}

	/** Position within the content. */
	public get offset(): number {
		return this.position;
	}

	/**
	 * @returns the next attribute, or null once only whitespace remains
	 * @throws {LaxmlError} `InvalidAttribute` for a missing `=`, an empty key or
	 * an unquoted value, `UnexpectedEof` for a value whose quote never closes
	 */
	public read(): Attribute<T> | null {
		const { content, ops } = this;
		const length = ops.length(content);

		const start = skipWhitespace(ops, content, this.position);
		if (start === length) {
			this.position = length;
			return null;
		}

		const anchor = this.baseOffset + start;

		const separator = ops.indexOf(content, CHAR.EQUALS, start);
		if (separator === -1) {
			throw new LaxmlError(
				"InvalidAttribute",
				anchor,
				"Attribute has no '=' separator",
			);
		}

		// a="1" and a = "1" name the same key
		const key = trim(ops, ops.slice(content, start, separator));
		if (ops.length(key) === 0) {
			throw new LaxmlError("InvalidAttribute", anchor, "Empty attribute key");
		}

		const open = ops.indexOfEither(
			content,
			CHAR.DOUBLE_QUOTE,
			CHAR.SINGLE_QUOTE,
			separator + 1,
		);
		if (open === -1) {
			throw new LaxmlError(
				"InvalidAttribute",
				anchor,
				"Attribute value is not quoted",
			);
		}

		const close = ops.indexOf(content, ops.codeAt(content, open), open + 1);
		if (close === -1) {
			throw new LaxmlError(
				"UnexpectedEof",
				anchor,
				"Unterminated attribute value",
			);
		}

		this.position = close + 1;

		return new Attribute(key, ops.slice(content, open + 1, close), anchor);
	}

	/** Drains the cursor into decoded key/value pairs. Later keys win. */
	public toRecord(): Record<string, string> {
		const record: Record<string, string> = {};

		for (const attribute of this) {
			record[toText(attribute.key)] = toText(attribute.value);
		}

		return record;
	}

	*[Symbol.iterator](): Iterator<Attribute<T>> {
		let attribute = this.read();
		while (attribute !== null) {
			yield attribute;
			attribute = this.read();
		}
	}
}
