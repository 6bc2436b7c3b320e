/**
 * Text builders — accumulate fields, then `build()` an immutable node.
 * A builder can be built more than once; every node gets its own copies.
 */

import type { ClickEvent, HoverEvent } from "../event/event.ts";
import { Colour, Decoration } from "../format/values.ts";
import type {
	KeybindBuilder,
	KeybindText,
	LiteralBuilder,
	LiteralText,
	StyleBuilder,
	Text,
	TextBuilder,
	TextStyle,
	TranslatableBuilder,
	TranslatableText,
} from "./types.ts";

type StyleState = {
	readonly decorations: Map<Decoration, boolean>;
	colour: Colour;
	insertion?: string;
	clickEvent?: ClickEvent;
	hoverEvent?: HoverEvent;
	readonly children: Text[];
};

const emptyStyle = (): StyleState => ({
	decorations: new Map(),
	colour: Colour.NONE,
	children: [],
});

const copyStyle = (text: TextStyle): StyleState => ({
	decorations: new Map(text.decorations),
	colour: text.colour,
	insertion: text.insertion,
	clickEvent: text.clickEvent,
	hoverEvent: text.hoverEvent,
	children: [...text.children],
});

/**
 * A frozen view over a private copy of the entries. It carries no mutators,
 * and `Map.prototype` methods reject it, so a built node's flags cannot change.
 */
const readonlyMap = <K, V>(source: ReadonlyMap<K, V>): ReadonlyMap<K, V> => {
	const map = new Map(source);
	const view: ReadonlyMap<K, V> = Object.freeze({
		get size() {
			return map.size;
		},
		get: (key: K) => map.get(key),
		has: (key: K) => map.has(key),
		forEach: (
			callback: (value: V, key: K, owner: ReadonlyMap<K, V>) => void,
			thisArg?: unknown,
		) => {
			for (const [key, value] of map) callback.call(thisArg, value, key, view);
		},
		entries: () => map.entries(),
		keys: () => map.keys(),
		values: () => map.values(),
		[Symbol.iterator]: () => map[Symbol.iterator](),
	});
	return view;
};

/** Snapshot the builder state. Absent optional fields are left out. */
const freezeStyle = (state: StyleState): TextStyle => ({
	decorations: readonlyMap(state.decorations),
	colour: state.colour,
	...(state.insertion !== undefined ? { insertion: state.insertion } : {}),
	...(state.clickEvent !== undefined ? { clickEvent: state.clickEvent } : {}),
	...(state.hoverEvent !== undefined ? { hoverEvent: state.hoverEvent } : {}),
	children: Object.freeze([...state.children]),
});

const styleMethods = <Self>(
	state: StyleState,
	self: () => Self,
): StyleBuilder<Self> => {
	const methods: StyleBuilder<Self> = {
		applyDecoration: (decoration, active = true) => {
			// Interned key, so hand-made values with the same name collapse
			const key = Decoration.of(decoration.name);
			if (key === Decoration.RESET) {
				state.decorations.clear();
				state.colour = Colour.NONE;
			} else if (active === null) {
				state.decorations.delete(key);
			} else {
				state.decorations.set(key, active);
			}
			return self();
		},
		unapplyDecoration: (decoration) =>
			methods.applyDecoration(decoration, false),
		applyColour: (colour) => {
			state.colour = Colour.of(colour.name);
			return self();
		},
		insertion: (insertion) => {
			state.insertion = insertion;
			return self();
		},
		click: (event) => {
			state.clickEvent = event;
			return self();
		},
		hover: (event) => {
			state.hoverEvent = event;
			return self();
		},
		append: (...children) => {
			state.children.push(...children);
			return self();
		},
	};
	return methods;
};

// ─── Literal ────────────────────────────────────────────────────────────────

const literalBuilder = (
	initial: string,
	state: StyleState,
): LiteralBuilder => {
	let content = initial;

	const builder: LiteralBuilder = {
		...styleMethods(state, () => builder),
		content: (value) => {
			content = value;
			return builder;
		},
		build: () => {
			const text: LiteralText = {
				type: "literal",
				content,
				...freezeStyle(state),
			};
			return Object.freeze(text);
		},
	};
	return builder;
};

/** Create a builder for literal text. */
export const createLiteralBuilder = (content = ""): LiteralBuilder =>
	literalBuilder(content, emptyStyle());

// ─── Translatable ───────────────────────────────────────────────────────────

const translatableBuilder = (
	initialKey: string,
	initialArgs: readonly Text[],
	state: StyleState,
): TranslatableBuilder => {
	let key = initialKey;
	const args = [...initialArgs];

	const builder: TranslatableBuilder = {
		...styleMethods(state, () => builder),
		key: (value) => {
			key = value;
			return builder;
		},
		argument: (...values) => {
			args.push(...values);
			return builder;
		},
		build: () => {
			const text: TranslatableText = {
				type: "translatable",
				key,
				args: Object.freeze([...args]),
				...freezeStyle(state),
			};
			return Object.freeze(text);
		},
	};
	return builder;
};

/** Create a builder for translatable text, optionally with its arguments. */
export const createTranslatableBuilder = (
	key = "",
	...args: Text[]
): TranslatableBuilder => translatableBuilder(key, args, emptyStyle());

// ─── Keybind ────────────────────────────────────────────────────────────────

const keybindBuilder = (
	initial: string,
	state: StyleState,
): KeybindBuilder => {
	let keybind = initial;

	const builder: KeybindBuilder = {
		...styleMethods(state, () => builder),
		keybind: (value) => {
			keybind = value;
			return builder;
		},
		build: () => {
			const text: KeybindText = {
				type: "keybind",
				keybind,
				...freezeStyle(state),
			};
			return Object.freeze(text);
		},
	};
	return builder;
};

/** Create a builder for keybind text, e.g. `key.jump`. */
export const createKeybindBuilder = (keybind = ""): KeybindBuilder =>
	keybindBuilder(keybind, emptyStyle());

// ─── From an existing node ──────────────────────────────────────────────────

export const toLiteralBuilder = (text: LiteralText): LiteralBuilder =>
	literalBuilder(text.content, copyStyle(text));

export const toTranslatableBuilder = (
	text: TranslatableText,
): TranslatableBuilder =>
	translatableBuilder(text.key, text.args, copyStyle(text));

export const toKeybindBuilder = (text: KeybindText): KeybindBuilder =>
	keybindBuilder(text.keybind, copyStyle(text));

/** Builder of the node's own kind, pre-filled with all of its fields. */
export const toBuilder = (text: Text): TextBuilder => {
	switch (text.type) {
		case "literal":
			return toLiteralBuilder(text);
		case "translatable":
			return toTranslatableBuilder(text);
		case "keybind":
			return toKeybindBuilder(text);
	}
};
