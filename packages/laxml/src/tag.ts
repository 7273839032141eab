import { AttributeCursor } from "./attributes.js";
import { CHAR } from "./constants.js";
import { LaxmlError } from "./error.js";
import type { SpanOps } from "./span.js";
import type { Span, TagKind } from "./types.js";
import { indexOfWhitespace, isValidTagName } from "./utils.js";

export class Tag<T extends Span> {
	/** Never includes the `/` of `</Close>`. */
	public readonly name: T;
	/**
	 * Everything between the name and the end of the tag, unparsed. Never
	 * includes the `/` of `<Empty />`.
	 */
	public readonly content: T;
	public readonly contentStart: number;
	/** Offset of the `<`. */
	public readonly start: number;
	/** Offset one past the `>`. */
	public readonly end: number;

	private readonly ops: SpanOps<T>;

	constructor(
		ops: SpanOps<T>,
		name: T,
		content: T,
		start: number,
		end: number,
		contentStart: number,
	) {
		this.ops = ops;
		this.name = name;
		this.content = content;
		this.start = start;
		this.end = end;
		this.contentStart = contentStart;
	}

	public attributes(): AttributeCursor<T> {
		return new AttributeCursor(this.ops, this.content, this.contentStart);
	}
}

export class Text<T extends Span> {
	public readonly content: T;
	public readonly start: number;
	public readonly end: number;

	constructor(content: T, start: number, end: number) {
		this.content = content;
		this.start = start;
		this.end = end;
	}
}

export interface TagToken<T extends Span> {
	kind: TagKind;
	tag: Tag<T>;
}

/**
 * Recognizes the tag whose `<` sits just before `position`.
 *
 * The name ends at the first whitespace byte; whatever follows that byte up to
 * the `>` is the content. A trailing `/` makes the tag empty and a leading one
 * makes it a closing tag. Both rules apply independently, so `</Name/>` is
 * accepted as a closing tag.
 *
 * @throws {LaxmlError} at the offset of the `<`
 */
export function tokenizeTag<T extends Span>(
	ops: SpanOps<T>,
	source: T,
	position: number,
): TagToken<T> {
	const tagStart = position - 1;

	if (position >= ops.length(source)) {
		throw new LaxmlError("UnexpectedEof", tagStart, "Unexpected end in tag");
	}

	const first = ops.codeAt(source, position);

	// TODO: tokenize <!-- -->, <![CDATA[ ]]> and <!DOCTYPE> instead of rejecting them
	if (first === CHAR.BANG) {
		throw new LaxmlError(
			"InvalidName",
			tagStart,
			"Declarations are not supported",
		);
	}

	if (first === CHAR.QUESTION_MARK) {
		throw new LaxmlError(
			"InvalidName",
			tagStart,
			"Processing instructions are not supported",
		);
	}

	const terminator = ops.indexOf(source, CHAR.GREATER_THAN, position);
	if (terminator === -1) {
		throw new LaxmlError("UnexpectedEof", tagStart, "Unexpected end in tag");
	}

	const isClosing = first === CHAR.SLASH;
	const isEmpty =
		terminator > position &&
		ops.codeAt(source, terminator - 1) === CHAR.SLASH;

	// <[Name] [a="1"]/>, <[Name] []/>, <[Name/][]>
	let headStart = position;
	let headEnd = terminator;
	let tailStart = terminator;
	let tailEnd = terminator;

	const space = indexOfWhitespace(ops, source, position, terminator);
	if (space !== -1) {
		headEnd = space;
		tailStart = space + 1;
	}

	if (isEmpty) {
		if (tailStart === tailEnd) {
			headEnd--;
		} else {
			tailEnd--;
		}
	}

	if (isClosing) {
		if (headStart === headEnd) {
			throw new LaxmlError("InvalidName", tagStart, "Empty tag name");
		}
		headStart++;
	}

	const name = ops.slice(source, headStart, headEnd);
	if (!isValidTagName(ops, name)) {
		throw new LaxmlError("InvalidName", tagStart, "Invalid tag name");
	}

	let kind: TagKind = "openTag";
	if (isClosing) {
		kind = "closeTag";
	} else if (isEmpty) {
		kind = "emptyTag";
	}

	const content = ops.slice(source, tailStart, tailEnd);

	return {
		kind,
		tag: new Tag(ops, name, content, tagStart, terminator + 1, tailStart),
	};
}
