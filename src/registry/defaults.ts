/**
 * Process-wide registries of the well-known style values.
 * Embedding applications extend them at startup via `register`.
 */

import { ClickAction, HoverAction } from "../event/event.ts";
import { Colour, Decoration } from "../format/values.ts";
import { createStyleRegistry } from "./registry.ts";
import type { StyleRegistry } from "./types.ts";

export type StyleRegistries = {
	readonly colours: StyleRegistry<Colour>;
	readonly decorations: StyleRegistry<Decoration>;
	readonly clickActions: StyleRegistry<ClickAction>;
	readonly hoverActions: StyleRegistry<HoverAction>;
};

export const COLOURS = createStyleRegistry<Colour>("colour", [
	Colour.NONE,
	Colour.BLACK,
	Colour.DARK_BLUE,
	Colour.DARK_GREEN,
	Colour.DARK_AQUA,
	Colour.DARK_RED,
	Colour.DARK_PURPLE,
	Colour.GOLD,
	Colour.GRAY,
	Colour.DARK_GRAY,
	Colour.BLUE,
	Colour.GREEN,
	Colour.AQUA,
	Colour.RED,
	Colour.LIGHT_PURPLE,
	Colour.YELLOW,
	Colour.WHITE,
]);

export const DECORATIONS = createStyleRegistry<Decoration>("decoration", [
	Decoration.RESET,
	Decoration.OBFUSCATED,
	Decoration.BOLD,
	Decoration.STRIKETHROUGH,
	Decoration.UNDERLINED,
	Decoration.ITALIC,
]);

export const CLICK_ACTIONS = createStyleRegistry<ClickAction>("click action", [
	ClickAction.OPEN_URL,
	ClickAction.OPEN_FILE,
	ClickAction.RUN_COMMAND,
	ClickAction.SUGGEST_COMMAND,
	ClickAction.CHANGE_PAGE,
	ClickAction.COPY_TO_CLIPBOARD,
]);

export const HOVER_ACTIONS = createStyleRegistry<HoverAction>("hover action", [
	HoverAction.SHOW_TEXT,
	HoverAction.SHOW_ITEM,
	HoverAction.SHOW_ENTITY,
	HoverAction.SHOW_ACHIEVEMENT,
]);

export const defaultRegistries: StyleRegistries = {
	colours: COLOURS,
	decorations: DECORATIONS,
	clickActions: CLICK_ACTIONS,
	hoverActions: HOVER_ACTIONS,
};
