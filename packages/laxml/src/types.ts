import type { LaxmlError } from "./error.js";
import type { Tag, Text } from "./tag.js";

/** A non-owning view into the source: a byte subarray or a substring. */
export type Span = Uint8Array | string;

export type ErrorKind = "InvalidName" | "InvalidAttribute" | "UnexpectedEof";

export type TagKind = "openTag" | "closeTag" | "emptyTag";

export type Event<T extends Span> =
	| { type: TagKind; tag: Tag<T> }
	| { type: "text"; text: Text<T> }
	| { type: "end" };

export interface Position {
	column: number;
	line: number;
}

export interface ReaderOptions {
	/** Trim whitespace (bytes up to 0x20) off both ends of text events. */
	trim: boolean;
}

export interface ParserHandlers<T extends Span> {
	onCloseTag?(tag: Tag<T>): void;
	onEmptyTag?(tag: Tag<T>): void;
	onEnd?(): void;
	onError?(error: LaxmlError): void;
	onOpenTag?(tag: Tag<T>): void;
	onText?(text: Text<T>): void;
}
