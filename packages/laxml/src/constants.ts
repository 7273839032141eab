export const CHAR = {
	BANG: 0x21, // !
	DOUBLE_QUOTE: 0x22, // "
	EQUALS: 0x3d, // =
	GREATER_THAN: 0x3e, // >
	LESS_THAN: 0x3c, // <
	LINE_FEED: 0x0a,
	QUESTION_MARK: 0x3f, // ?
	SINGLE_QUOTE: 0x27, // '
	SLASH: 0x2f, // /
	SPACE: 0x20,
} as const;

export const BYTE_ORDER_MARK = "\uFEFF";

export const EVENTS = [
	"closeTag",
	"emptyTag",
	"end",
	"openTag",
	"text",
] as const;

export enum State {
	SEARCHING, // looking for text or the next <
	LOCATED_TAG, // one past <
	END,
}

/**
 * Name-start lookup indexed by byte: 1 when the byte may begin a tag name.
 * Rejects control characters and space, `!`-`9`, `:`-`@`, `[`-`` ` `` and `{`-DEL.
 */
export const NAME_START: Uint8Array = createNameStartTable();

function createNameStartTable(): Uint8Array {
	const table = new Uint8Array(256);

	for (let i = 0; i < 256; i++) {
		const isExcluded =
			i <= CHAR.SPACE ||
			(i >= 0x21 && i <= 0x39) ||
			(i >= 0x3a && i <= 0x40) ||
			(i >= 0x5b && i <= 0x60) ||
			(i >= 0x7b && i <= 0x7f);
		table[i] = isExcluded ? 0 : 1;
	}

	return table;
}
