/**
 * Style values — open, name-identified colours and decorations.
 *
 * Values are interned: `Colour.of("red") === Colour.of("red")`, so they work
 * as Map keys and compare with `===`. Building a value never registers it;
 * see `src/registry/` for the lookup tables used when decoding.
 */

/** A style value identified solely by its name. */
export type StyleValue<K extends string> = {
	readonly kind: K;
	readonly name: string;
};

/** Create an interning constructor for one kind of style value. */
export const createInterner = <K extends string>(kind: K) => {
	const pool = new Map<string, StyleValue<K>>();
	return (name: string): StyleValue<K> => {
		const existing = pool.get(name);
		if (existing) return existing;
		const value: StyleValue<K> = Object.freeze({ kind, name });
		pool.set(name, value);
		return value;
	};
};

/** Compare two style values by identifier. */
export const styleValueEquals = <K extends string>(
	a: StyleValue<K>,
	b: StyleValue<K>,
): boolean => a.kind === b.kind && a.name === b.name;

// ─── Colour ─────────────────────────────────────────────────────────────────

export type Colour = StyleValue<"colour">;

const colour = createInterner("colour");

export const Colour = {
	of: colour,
	/** Inherit the parent's colour. Never written to the wire. */
	NONE: colour("none"),
	BLACK: colour("black"),
	DARK_BLUE: colour("dark_blue"),
	DARK_GREEN: colour("dark_green"),
	DARK_AQUA: colour("dark_aqua"),
	DARK_RED: colour("dark_red"),
	DARK_PURPLE: colour("dark_purple"),
	GOLD: colour("gold"),
	GRAY: colour("gray"),
	DARK_GRAY: colour("dark_gray"),
	BLUE: colour("blue"),
	GREEN: colour("green"),
	AQUA: colour("aqua"),
	RED: colour("red"),
	LIGHT_PURPLE: colour("light_purple"),
	YELLOW: colour("yellow"),
	WHITE: colour("white"),
} as const;

// ─── Decoration ─────────────────────────────────────────────────────────────

export type Decoration = StyleValue<"decoration">;

const decoration = createInterner("decoration");

export const Decoration = {
	of: decoration,
	/** Clears decorations and colour when applied; never stored on a node. */
	RESET: decoration("reset"),
	OBFUSCATED: decoration("obfuscated"),
	BOLD: decoration("bold"),
	STRIKETHROUGH: decoration("strikethrough"),
	UNDERLINED: decoration("underlined"),
	ITALIC: decoration("italic"),
} as const;
