import { bench, group, run } from "mitata";
import IsaacsSAX from "sax";
import laxml, { Reader } from "../src/main.js";

const isaacsOptions = {
	strict: false,
	trim: true,
} as const;

function generateDocument(items: number): string {
	let xml = "<Catalog>\n";
	for (let i = 0; i < items; i++) {
		xml += `\t<Item id="${i}" kind='sample'>\n`;
		xml += `\t\t<Title>Item number ${i}</Title>\n`;
		xml += `\t\t<Flag enabled="${i % 2 === 0}"/>\n`;
		xml += "\t</Item>\n";
	}
	return `${xml}</Catalog>\n`;
}

const text = generateDocument(20_000);
const bytes = new TextEncoder().encode(text);

let attributes = 0;

group("XML Parser Comparison (text)", () => {
	bench("laxml (string)", () => {
		for (const event of laxml.Reader.fromString(text)) {
			if (event.type === "openTag" || event.type === "emptyTag") {
				attributes += event.tag.attributes().toRecord().id ? 1 : 0;
			}
		}
	});

	bench("laxml (bytes)", () => {
		for (const event of Reader.fromBytes(bytes)) {
			if (event.type === "openTag" || event.type === "emptyTag") {
				attributes += event.tag.attributes().toRecord().id ? 1 : 0;
			}
		}
	});

	bench("Isaacs SAX", () => {
		const parser = IsaacsSAX.parser(isaacsOptions.strict, isaacsOptions);
		parser.write(text);
		parser.close();
	});
});

await run();

console.log(`attributes read: ${attributes}`);
