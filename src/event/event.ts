/**
 * Click and hover events — an action paired with a text payload.
 */

import type { StyleValue } from "../format/values.ts";
import { createInterner } from "../format/values.ts";
import type { Text } from "../text/types.ts";

// ─── Actions ────────────────────────────────────────────────────────────────

export type ClickAction = StyleValue<"click_action">;

const clickAction = createInterner("click_action");

export const ClickAction = {
	of: clickAction,
	OPEN_URL: clickAction("open_url"),
	OPEN_FILE: clickAction("open_file"),
	RUN_COMMAND: clickAction("run_command"),
	SUGGEST_COMMAND: clickAction("suggest_command"),
	CHANGE_PAGE: clickAction("change_page"),
	COPY_TO_CLIPBOARD: clickAction("copy_to_clipboard"),
} as const;

export type HoverAction = StyleValue<"hover_action">;

const hoverAction = createInterner("hover_action");

export const HoverAction = {
	of: hoverAction,
	SHOW_TEXT: hoverAction("show_text"),
	SHOW_ITEM: hoverAction("show_item"),
	SHOW_ENTITY: hoverAction("show_entity"),
	SHOW_ACHIEVEMENT: hoverAction("show_achievement"),
} as const;

// ─── Events ─────────────────────────────────────────────────────────────────

/** Client-side behaviour when the text is clicked. */
export type ClickEvent = {
	readonly action: ClickAction;
	readonly value: Text;
};

/** Client-side behaviour when the text is hovered. */
export type HoverEvent = {
	readonly action: HoverAction;
	readonly value: Text;
};

export const createClickEvent = (
	action: ClickAction,
	value: Text,
): ClickEvent => Object.freeze({ action, value });

export const createHoverEvent = (
	action: HoverAction,
	value: Text,
): HoverEvent => Object.freeze({ action, value });
