import {
	LaxmlError,
	Reader,
	type ReaderOptions,
	type Span,
	toText,
} from "../src/main.js";

export function collect<T extends Span>(reader: Reader<T>): string[][] {
	const events: string[][] = [];

	for (const event of reader) {
		switch (event.type) {
			case "openTag":
			case "closeTag":
			case "emptyTag":
				events.push([event.type, toText(event.tag.name), toText(event.tag.content)]);
				break;
			case "text":
				events.push(["text", toText(event.text.content)]);
				break;
		}
	}

	return events;
}

export function parse(xml: string, options: Partial<ReaderOptions> = {}): string[][] {
	return collect(Reader.fromString(xml, options));
}

export function catchError(fn: () => unknown): LaxmlError {
	try {
		fn();
	} catch (error) {
		if (error instanceof LaxmlError) return error;
		throw error;
	}
	throw new Error("Expected a LaxmlError");
}
