export {
	COLOUR_NAME_TO_CODE,
	LEGACY_COLOUR_CODES,
	LEGACY_DECORATION_CODES,
	LEGACY_PREFIX,
	LEGACY_RESET_CODE,
} from "./styles.ts";
export {
	Colour,
	createInterner,
	Decoration,
	styleValueEquals,
} from "./values.ts";
export type { StyleValue } from "./values.ts";
