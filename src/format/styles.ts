/** Legacy formatting codes, as written after the `§` prefix. */

import { Colour, Decoration } from "./values.ts";

export const LEGACY_PREFIX = "§";

export const LEGACY_RESET_CODE = "r";

export const LEGACY_COLOUR_CODES: ReadonlyMap<string, Colour> = new Map([
	["0", Colour.BLACK],
	["1", Colour.DARK_BLUE],
	["2", Colour.DARK_GREEN],
	["3", Colour.DARK_AQUA],
	["4", Colour.DARK_RED],
	["5", Colour.DARK_PURPLE],
	["6", Colour.GOLD],
	["7", Colour.GRAY],
	["8", Colour.DARK_GRAY],
	["9", Colour.BLUE],
	["a", Colour.GREEN],
	["b", Colour.AQUA],
	["c", Colour.RED],
	["d", Colour.LIGHT_PURPLE],
	["e", Colour.YELLOW],
	["f", Colour.WHITE],
]);

// Order matters: codes are emitted in this order.
export const LEGACY_DECORATION_CODES: ReadonlyMap<string, Decoration> =
	new Map([
		["k", Decoration.OBFUSCATED],
		["l", Decoration.BOLD],
		["m", Decoration.STRIKETHROUGH],
		["n", Decoration.UNDERLINED],
		["o", Decoration.ITALIC],
	]);

/** Colour name → legacy code. */
export const COLOUR_NAME_TO_CODE: ReadonlyMap<string, string> = new Map(
	[...LEGACY_COLOUR_CODES].map(([code, colour]): [string, string] => [
		colour.name,
		code,
	]),
);
