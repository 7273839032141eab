export { CHAR, EVENTS, NAME_START, State } from "./constants.js";

import { Attribute, AttributeCursor } from "./attributes.js";
import { LaxmlError } from "./error.js";
import { Parser } from "./parser.js";
import { Reader } from "./reader.js";
import { BYTE_SPANS, TEXT_SPANS, toText } from "./span.js";
import { Tag, Text } from "./tag.js";
import { locate } from "./utils.js";

export {
	Attribute,
	AttributeCursor,
	BYTE_SPANS,
	LaxmlError,
	Parser,
	Reader,
	Tag,
	TEXT_SPANS,
	Text,
	locate,
	toText,
};

export type { SpanOps } from "./span.js";
export type {
	ErrorKind,
	Event,
	ParserHandlers,
	Position,
	ReaderOptions,
	Span,
	TagKind,
} from "./types.js";

const laxml = {
	AttributeCursor,
	Parser,
	Reader,
} as const;

export default laxml;
