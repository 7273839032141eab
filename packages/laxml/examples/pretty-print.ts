import fs from "node:fs";
import path from "node:path";
import { LaxmlError, locate, Reader, toText, TEXT_SPANS } from "../src/main.js";

if (!process.argv[2]) {
	throw new Error(
		"Please provide an xml file to prettify\n" +
			"Usage: tsx pretty-print.ts <file.xml>",
	);
}

const tabstop = 2;
const xmlfile = path.join(process.cwd(), process.argv[2]);
const xml = fs.readFileSync(xmlfile, "utf8").replace(/^\uFEFF+/, "");

let level = 0;

function print(chunk: string): void {
	process.stdout.write(chunk);
}

function indent(): void {
	print("\n");
	print(" ".repeat(level * tabstop));
}

try {
	for (const event of Reader.fromString(xml)) {
		switch (event.type) {
			case "openTag":
			case "emptyTag": {
				indent();
				print(`<${event.tag.name}`);
				for (const attribute of event.tag.attributes()) {
					print(` ${attribute.key}="${attribute.value.replaceAll('"', "&quot;")}"`);
				}
				print(event.type === "emptyTag" ? "/>" : ">");
				if (event.type === "openTag") level++;
				break;
			}

			case "closeTag":
				level--;
				indent();
				print(`</${event.tag.name}>`);
				break;

			case "text":
				indent();
				print(toText(event.text.content));
				break;
		}
	}
	print("\n");
} catch (error) {
	if (!(error instanceof LaxmlError)) throw error;

	const { line, column } = locate(TEXT_SPANS, xml, error.offset);
	console.error(`${error.message} at line ${line + 1}, column ${column + 1}`);
	process.exitCode = 1;
}
