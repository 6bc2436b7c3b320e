import type { ClickEvent, HoverEvent } from "../event/event.ts";
import type { Colour, Decoration } from "../format/values.ts";

// ─── Nodes ──────────────────────────────────────────────────────────────────

/** Style and metadata shared by every kind of text node. */
export type TextStyle = {
	/** Explicit on/off flags. A missing key means "inherit". */
	readonly decorations: ReadonlyMap<Decoration, boolean>;
	/** `Colour.NONE` means "inherit". */
	readonly colour: Colour;
	/** Inserted into the chat box on shift-click. */
	readonly insertion?: string;
	readonly clickEvent?: ClickEvent;
	readonly hoverEvent?: HoverEvent;
	/** Rendered in order after this node's own content. */
	readonly children: readonly Text[];
};

export type LiteralText = TextStyle & {
	readonly type: "literal";
	readonly content: string;
};

export type TranslatableText = TextStyle & {
	readonly type: "translatable";
	readonly key: string;
	readonly args: readonly Text[];
};

export type KeybindText = TextStyle & {
	readonly type: "keybind";
	readonly keybind: string;
};

/** An immutable node of a chat text tree. */
export type Text = LiteralText | TranslatableText | KeybindText;

export type TextType = Text["type"];

// ─── Builders ───────────────────────────────────────────────────────────────

/** `true`/`false` set the flag explicitly; `null` removes it. */
export type DecorationState = boolean | null;

/**
 * Operations every builder shares; each returns the builder itself.
 * Applying `Decoration.RESET` clears all decorations and the colour.
 */
export type StyleBuilder<Self> = {
	applyDecoration: (decoration: Decoration, state?: DecorationState) => Self;
	unapplyDecoration: (decoration: Decoration) => Self;
	applyColour: (colour: Colour) => Self;
	insertion: (insertion: string) => Self;
	click: (event: ClickEvent) => Self;
	hover: (event: HoverEvent) => Self;
	append: (...children: Text[]) => Self;
};

// Each builder spells out its chained style methods: an alias cannot pass
// itself as a type argument to StyleBuilder.

export type LiteralBuilder = {
	applyDecoration: (
		decoration: Decoration,
		state?: DecorationState,
	) => LiteralBuilder;
	unapplyDecoration: (decoration: Decoration) => LiteralBuilder;
	applyColour: (colour: Colour) => LiteralBuilder;
	insertion: (insertion: string) => LiteralBuilder;
	click: (event: ClickEvent) => LiteralBuilder;
	hover: (event: HoverEvent) => LiteralBuilder;
	append: (...children: Text[]) => LiteralBuilder;
	content: (content: string) => LiteralBuilder;
	build: () => LiteralText;
};

export type TranslatableBuilder = {
	applyDecoration: (
		decoration: Decoration,
		state?: DecorationState,
	) => TranslatableBuilder;
	unapplyDecoration: (decoration: Decoration) => TranslatableBuilder;
	applyColour: (colour: Colour) => TranslatableBuilder;
	insertion: (insertion: string) => TranslatableBuilder;
	click: (event: ClickEvent) => TranslatableBuilder;
	hover: (event: HoverEvent) => TranslatableBuilder;
	append: (...children: Text[]) => TranslatableBuilder;
	key: (key: string) => TranslatableBuilder;
	argument: (...args: Text[]) => TranslatableBuilder;
	build: () => TranslatableText;
};

export type KeybindBuilder = {
	applyDecoration: (
		decoration: Decoration,
		state?: DecorationState,
	) => KeybindBuilder;
	unapplyDecoration: (decoration: Decoration) => KeybindBuilder;
	applyColour: (colour: Colour) => KeybindBuilder;
	insertion: (insertion: string) => KeybindBuilder;
	click: (event: ClickEvent) => KeybindBuilder;
	hover: (event: HoverEvent) => KeybindBuilder;
	append: (...children: Text[]) => KeybindBuilder;
	keybind: (keybind: string) => KeybindBuilder;
	build: () => KeybindText;
};

export type TextBuilder = LiteralBuilder | TranslatableBuilder | KeybindBuilder;
