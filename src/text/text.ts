/**
 * Text module — shortcuts, queries and structural equality for text nodes.
 */

import type { ClickEvent, HoverEvent } from "../event/event.ts";
import { Decoration, styleValueEquals } from "../format/values.ts";
import {
	createKeybindBuilder,
	createLiteralBuilder,
	createTranslatableBuilder,
} from "./builder.ts";
import type {
	KeybindText,
	LiteralText,
	Text,
	TextStyle,
	TranslatableText,
} from "./types.ts";

// ─── Shortcuts ──────────────────────────────────────────────────────────────

/** Unstyled literal text. */
export const literal = (content: string): LiteralText =>
	createLiteralBuilder(content).build();

/** Unstyled translatable text. */
export const translatable = (key: string, ...args: Text[]): TranslatableText =>
	createTranslatableBuilder(key, ...args).build();

/** Unstyled keybind text. */
export const keybind = (name: string): KeybindText =>
	createKeybindBuilder(name).build();

// ─── Queries ────────────────────────────────────────────────────────────────

/** Explicit decoration state, or `undefined` when inherited. */
export const decorationState = (
	text: TextStyle,
	decoration: Decoration,
): boolean | undefined => {
	for (const [key, active] of text.decorations) {
		if (key.name === decoration.name) return active;
	}
	return undefined;
};

/** True only when the decoration is explicitly switched on. */
export const hasDecoration = (text: TextStyle, decoration: Decoration) =>
	decorationState(text, decoration) === true;

export const isBold = (text: TextStyle) => hasDecoration(text, Decoration.BOLD);
export const isItalic = (text: TextStyle) =>
	hasDecoration(text, Decoration.ITALIC);
export const isUnderlined = (text: TextStyle) =>
	hasDecoration(text, Decoration.UNDERLINED);
export const isStrikethrough = (text: TextStyle) =>
	hasDecoration(text, Decoration.STRIKETHROUGH);
export const isObfuscated = (text: TextStyle) =>
	hasDecoration(text, Decoration.OBFUSCATED);

export const hasChildren = (text: TextStyle): boolean =>
	text.children.length > 0;

export const hasArguments = (text: TranslatableText): boolean =>
	text.args.length > 0;

/** Whether `child` is structurally equal to one of the direct children. */
export const containsChild = (text: TextStyle, child: Text): boolean =>
	text.children.some((candidate) => textEquals(candidate, child));

// ─── Equality ───────────────────────────────────────────────────────────────

const listEquals = (a: readonly Text[], b: readonly Text[]): boolean =>
	a.length === b.length && a.every((item, i) => textEquals(item, b[i]));

const decorationsEqual = (
	a: ReadonlyMap<Decoration, boolean>,
	b: ReadonlyMap<Decoration, boolean>,
): boolean => {
	if (a.size !== b.size) return false;
	const byName = new Map<string, boolean>();
	for (const [key, active] of b) byName.set(key.name, active);
	for (const [key, active] of a) {
		if (byName.get(key.name) !== active) return false;
	}
	return true;
};

const eventEquals = <E extends ClickEvent | HoverEvent>(
	a: E | undefined,
	b: E | undefined,
): boolean => {
	if (a === undefined || b === undefined) return a === b;
	return a.action.name === b.action.name && textEquals(a.value, b.value);
};

export const clickEventEquals = (
	a: ClickEvent | undefined,
	b: ClickEvent | undefined,
): boolean => eventEquals(a, b);

export const hoverEventEquals = (
	a: HoverEvent | undefined,
	b: HoverEvent | undefined,
): boolean => eventEquals(a, b);

const styleEquals = (a: TextStyle, b: TextStyle): boolean =>
	styleValueEquals(a.colour, b.colour) &&
	a.insertion === b.insertion &&
	decorationsEqual(a.decorations, b.decorations) &&
	clickEventEquals(a.clickEvent, b.clickEvent) &&
	hoverEventEquals(a.hoverEvent, b.hoverEvent) &&
	listEquals(a.children, b.children);

/** Structural equality: kind, content, style and children (in order). */
export const textEquals = (a: Text, b: Text): boolean => {
	if (a === b) return true;
	if (!styleEquals(a, b)) return false;

	switch (a.type) {
		case "literal":
			return b.type === "literal" && a.content === b.content;
		case "translatable":
			return (
				b.type === "translatable" &&
				a.key === b.key &&
				listEquals(a.args, b.args)
			);
		case "keybind":
			return b.type === "keybind" && a.keybind === b.keybind;
	}
};
