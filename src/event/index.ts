export {
	ClickAction,
	createClickEvent,
	createHoverEvent,
	HoverAction,
} from "./event.ts";
export type { ClickEvent, HoverEvent } from "./event.ts";
