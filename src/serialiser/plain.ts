import { literal } from "../text/text.ts";
import type { LiteralText, Text } from "../text/types.ts";
import type { TextSerialiser } from "./types.ts";

/**
 * Flatten to plain text: literal content, then each child's plain text.
 * Translatable and keybind nodes (and everything under them) give "".
 */
export const toPlainText = (text: Text): string =>
	text.type === "literal"
		? text.content + text.children.map(toPlainText).join("")
		: "";

export const fromPlainText = (input: string): LiteralText => literal(input);

export const plainTextSerialiser: TextSerialiser = {
	serialise: toPlainText,
	deserialise: fromPlainText,
};
