import type { Span } from "./types.js";

const decoder = new TextDecoder();

/**
 * Primitive operations the reader needs over one kind of span. The scanning
 * code is written once against this table and never touches the span type
 * directly.
 */
export interface SpanOps<T extends Span> {
	length(span: T): number;
	codeAt(span: T, index: number): number;
	/** Index of `code` at or after `from`, or -1. */
	indexOf(span: T, code: number, from: number): number;
	/** Index of whichever of `first` and `second` occurs first at or after `from`, or -1. */
	indexOfEither(span: T, first: number, second: number, from: number): number;
	slice(span: T, start: number, end?: number): T;
}

export const BYTE_SPANS: SpanOps<Uint8Array> = {
	length: (span) => span.length,
	codeAt: (span, index) => span[index],
	indexOf: (span, code, from) => span.indexOf(code, from),
	indexOfEither(span, first, second, from) {
		for (let i = from; i < span.length; i++) {
			const code = span[i];
			if (code === first || code === second) return i;
		}
		return -1;
	},
	slice: (span, start, end) => span.subarray(start, end),
};

// Delimiters are all ASCII and no UTF-16 code unit of a non-ASCII character
// falls below 0x80, so slicing at delimiters never splits a character.
export const TEXT_SPANS: SpanOps<string> = {
	length: (span) => span.length,
	codeAt: (span, index) => span.charCodeAt(index),
	indexOf: (span, code, from) => span.indexOf(String.fromCharCode(code), from),
	indexOfEither(span, first, second, from) {
		for (let i = from; i < span.length; i++) {
			const code = span.charCodeAt(i);
			if (code === first || code === second) return i;
		}
		return -1;
	},
	slice: (span, start, end) => span.slice(start, end),
};

/** Decodes a byte span as UTF-8; text spans are returned as they are. */
export function toText(span: Span): string {
	if (typeof span === "string") return span;
	return decoder.decode(span);
}
