export {
	createKeybindBuilder,
	createLiteralBuilder,
	createTranslatableBuilder,
	toBuilder,
	toKeybindBuilder,
	toLiteralBuilder,
	toTranslatableBuilder,
} from "./builder.ts";
export {
	clickEventEquals,
	containsChild,
	decorationState,
	hasArguments,
	hasChildren,
	hasDecoration,
	hoverEventEquals,
	isBold,
	isItalic,
	isObfuscated,
	isStrikethrough,
	isUnderlined,
	keybind,
	literal,
	textEquals,
	translatable,
} from "./text.ts";
export type {
	DecorationState,
	KeybindBuilder,
	KeybindText,
	LiteralBuilder,
	LiteralText,
	StyleBuilder,
	Text,
	TextBuilder,
	TextStyle,
	TextType,
	TranslatableBuilder,
	TranslatableText,
} from "./types.ts";
