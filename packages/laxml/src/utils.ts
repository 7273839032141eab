import { CHAR, NAME_START } from "./constants.js";
import type { SpanOps } from "./span.js";
import type { Position, Span } from "./types.js";

export function isWhitespace(code: number): boolean {
	return code <= CHAR.SPACE;
}

export function isNameStart(code: number): boolean {
	// Text spans carry UTF-16 code units; everything past Latin-1 is non-ASCII.
	if (code > 0xff) return true;
	return NAME_START[code] === 1;
}

/** Checks the first code of a tag name only. */
export function isValidTagName<T extends Span>(ops: SpanOps<T>, name: T): boolean {
	if (ops.length(name) === 0) return false;
	return isNameStart(ops.codeAt(name, 0));
}

export function indexOfWhitespace<T extends Span>(
	ops: SpanOps<T>,
	span: T,
	from: number,
	to: number = ops.length(span),
): number {
	for (let i = from; i < to; i++) {
		if (isWhitespace(ops.codeAt(span, i))) return i;
	}
	return -1;
}

export function skipWhitespace<T extends Span>(
	ops: SpanOps<T>,
	span: T,
	from: number,
): number {
	const length = ops.length(span);
	let i = from;
	while (i < length && isWhitespace(ops.codeAt(span, i))) i++;
	return i;
}

/**
 * Bounds of `span` without leading and trailing whitespace, as
 * `[start, end)`. Both are 0 when nothing but whitespace remains.
 */
export function trimBounds<T extends Span>(
	ops: SpanOps<T>,
	span: T,
): [number, number] {
	const start = skipWhitespace(ops, span, 0);
	let end = ops.length(span);

	if (start === end) return [0, 0];

	while (isWhitespace(ops.codeAt(span, end - 1))) end--;
	return [start, end];
}

export function trim<T extends Span>(ops: SpanOps<T>, span: T): T {
	const [start, end] = trimBounds(ops, span);
	return ops.slice(span, start, end);
}

/** 0-based line and column of `offset`, counting line feeds only. */
export function locate<T extends Span>(
	ops: SpanOps<T>,
	source: T,
	offset: number,
): Position {
	const limit = Math.min(offset, ops.length(source));
	let line = 0;
	let lineStart = 0;

	for (let i = 0; i < limit; i++) {
		if (ops.codeAt(source, i) === CHAR.LINE_FEED) {
			line++;
			lineStart = i + 1;
		}
	}

	return { column: limit - lineStart, line };
}
