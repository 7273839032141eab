import { describe, expect, test } from "vitest";
import { Reader, toText } from "../../src/main.js";
import { catchError, collect, parse } from "../helpers.js";

const encoder = new TextEncoder();

describe("reader", () => {
	test("should start at offset 0", () => {
		expect(Reader.fromString("<a/>").offset).toBe(0);
		expect(Reader.fromBytes(new Uint8Array(0)).offset).toBe(0);
	});

	test("should produce events in document order", () => {
		expect(parse(`<root><item id="1"/>text<b>bold</b></root>`)).toEqual([
			["openTag", "root", ""],
			["emptyTag", "item", `id="1"`],
			["text", "text"],
			["openTag", "b", ""],
			["text", "bold"],
			["closeTag", "b", ""],
			["closeTag", "root", ""],
		]);
	});

	test("should keep returning the end event", () => {
		const reader = Reader.fromString("<a/>");
		expect(reader.read().type).toBe("emptyTag");
		expect(reader.read()).toEqual({ type: "end" });
		expect(reader.read()).toEqual({ type: "end" });
		expect(reader.offset).toBe(4);
	});

	test("should advance the offset past each tag", () => {
		const reader = Reader.fromString("  hi  <a>");

		const text = reader.read();
		expect(reader.offset).toBe(7);
		if (text.type !== "text") throw new Error(`unexpected ${text.type}`);
		expect(text.text.start).toBe(2);
		expect(text.text.end).toBe(4);

		reader.read();
		expect(reader.offset).toBe(9);
	});

	test("should not advance past a malformed tag", () => {
		const reader = Reader.fromString("<a><0b>");
		reader.read();
		expect(reader.offset).toBe(3);

		const first = catchError(() => reader.read());
		const second = catchError(() => reader.read());
		expect(first.kind).toBe("InvalidName");
		expect(first.offset).toBe(3);
		expect(second.offset).toBe(3);
		expect(reader.offset).toBe(4);
	});

	test("should produce the same events from bytes and text", () => {
		const xml = `<Name a='1'>héllo <b/></Name>`;
		expect(collect(Reader.fromBytes(encoder.encode(xml)))).toEqual(parse(xml));
	});

	test("should return subarrays of the source bytes", () => {
		const bytes = encoder.encode("<Name>");
		const event = Reader.fromBytes(bytes).read();
		if (event.type !== "openTag") throw new Error(`unexpected ${event.type}`);

		expect(event.tag.name.buffer).toBe(bytes.buffer);
		expect(event.tag.name.byteOffset).toBe(1);
		expect(event.tag.name.length).toBe(4);
	});

	test("should count offsets in bytes for byte sources", () => {
		const bytes = encoder.encode("<p>héllo</p>");
		const reader = Reader.fromBytes(bytes);
		reader.read();

		const text = reader.read();
		if (text.type !== "text") throw new Error(`unexpected ${text.type}`);
		expect(toText(text.text.content)).toBe("héllo");
		expect(text.text.start).toBe(3);
		expect(text.text.end).toBe(9);
	});

	test("should rebuild the source from untrimmed events", () => {
		const xml = `<a x="1">hi <b/> there</a>\n<c>\t</c>`;
		const bytes = encoder.encode(xml);
		let rebuilt = "";
		let position = 0;

		for (const event of Reader.fromBytes(bytes, { trim: false })) {
			if (event.type === "end") break;
			const span = event.type === "text" ? event.text : event.tag;
			expect(span.start).toBe(position);
			rebuilt += toText(bytes.subarray(span.start, span.end));
			position = span.end;
		}

		expect(rebuilt).toBe(xml);
		expect(position).toBe(bytes.length);
	});

	describe("byte order mark", () => {
		test("fromStringBom strips leading marks", () => {
			expect(parse("\uFEFF<a/>").at(0)).toEqual(["text", "\uFEFF"]);
			expect(collect(Reader.fromStringBom("\uFEFF\uFEFF<a/>"))).toEqual([
				["emptyTag", "a", ""],
			]);
		});

		test("offsets count from the stripped text", () => {
			const event = Reader.fromStringBom("\uFEFF<a/>").read();
			if (event.type !== "emptyTag") throw new Error(`unexpected ${event.type}`);
			expect(event.tag.start).toBe(0);
		});
	});
});
