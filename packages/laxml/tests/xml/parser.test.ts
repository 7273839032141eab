import { describe, expect, test } from "vitest";
import {
	type LaxmlError,
	Parser,
	type ParserHandlers,
	Reader,
} from "../../src/main.js";
import { catchError } from "../helpers.js";

function record(events: unknown[][]): ParserHandlers<string> {
	return {
		onCloseTag(tag) {
			events.push(["closeTag", tag.name]);
		},
		onEmptyTag(tag) {
			events.push(["emptyTag", tag.name, tag.attributes().toRecord()]);
		},
		onEnd() {
			events.push(["end"]);
		},
		onOpenTag(tag) {
			events.push(["openTag", tag.name]);
		},
		onText(text) {
			events.push(["text", text.content]);
		},
	};
}

describe("parser", () => {
	test("should dispatch every event to its handler", () => {
		const events: unknown[][] = [];
		const parser = new Parser(
			Reader.fromString(`<root><item id='1'/>text</root>`),
			record(events),
		);
		parser.run();

		expect(events).toEqual([
			["openTag", "root"],
			["emptyTag", "item", { id: "1" }],
			["text", "text"],
			["closeTag", "root"],
			["end"],
		]);
		expect(parser.error).toBeNull();
	});

	test("should not end twice", () => {
		const events: unknown[][] = [];
		const parser = new Parser(Reader.fromString("<a/>"), record(events));
		parser.run();
		parser.run();

		expect(events.filter(([name]) => name === "end")).toHaveLength(1);
	});

	test("should route errors to onError and stop", () => {
		const events: unknown[][] = [];
		const errors: LaxmlError[] = [];
		const parser = new Parser(Reader.fromString("<root><1/><a/>"), {
			...record(events),
			onError(error) {
				errors.push(error);
			},
		});
		parser.run();

		expect(events).toEqual([["openTag", "root"]]);
		expect(errors).toHaveLength(1);
		expect(errors[0].kind).toBe("InvalidName");
		expect(errors[0].offset).toBe(6);
		expect(parser.error).toBe(errors[0]);
	});

	test("should throw without an onError handler", () => {
		const parser = new Parser(Reader.fromString("<root"));
		const error = catchError(() => parser.run());

		expect(error.kind).toBe("UnexpectedEof");
		expect(catchError(() => parser.run())).toBe(error);
	});

	test("should report attribute errors raised by handlers", () => {
		const errors: LaxmlError[] = [];
		const parser = new Parser(Reader.fromString("<a b>"), {
			onOpenTag(tag) {
				tag.attributes().toRecord();
			},
			onError(error) {
				errors.push(error);
			},
		});
		parser.run();

		expect(errors.map((error) => [error.kind, error.offset])).toEqual([
			["InvalidAttribute", 3],
		]);
	});
});
