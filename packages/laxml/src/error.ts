import type { ErrorKind } from "./types.js";

export class LaxmlError extends Error {
	public readonly kind: ErrorKind;
	public readonly offset: number;

	constructor(kind: ErrorKind, offset: number, message: string) {
		super(message);

		this.name = "LaxmlError";

		this.kind = kind;
		this.offset = offset;
	}

	override toString(): string {
		return `${this.name}: ${this.message} (offset ${this.offset})`;
	}
}
