export {
	CLICK_ACTIONS,
	COLOURS,
	DECORATIONS,
	defaultRegistries,
	HOVER_ACTIONS,
} from "./defaults.ts";
export type { StyleRegistries } from "./defaults.ts";
export { createStyleRegistry } from "./registry.ts";
export type { Identified, StyleRegistry } from "./types.ts";
