/**
 * Legacy formatting codes — the single-string `§c§lHello` encoding.
 *
 * Only literal nodes carry text here, as with plain text. A colour code
 * also clears formats, so decorations are written after the colour.
 */

import {
	COLOUR_NAME_TO_CODE,
	LEGACY_COLOUR_CODES,
	LEGACY_DECORATION_CODES,
	LEGACY_PREFIX,
	LEGACY_RESET_CODE,
} from "../format/styles.ts";
import { Colour } from "../format/values.ts";
import type { Decoration } from "../format/values.ts";
import { createLiteralBuilder } from "../text/builder.ts";
import type { LiteralText, Text } from "../text/types.ts";
import type { LegacyOptions, TextSerialiser } from "./types.ts";

// ─── Serialise ──────────────────────────────────────────────────────────────

/** Style a node ends up with after inheriting from its parent. */
type EffectiveStyle = {
	readonly colour: Colour;
	readonly decorations: ReadonlyMap<string, boolean>;
};

/** The codes a style is written as. */
type CodeStyle = {
	readonly colour: string | undefined;
	readonly formats: string;
};

const UNSTYLED: EffectiveStyle = { colour: Colour.NONE, decorations: new Map() };

const PLAIN_CODES: CodeStyle = { colour: undefined, formats: "" };

const inherit = (parent: EffectiveStyle, node: Text): EffectiveStyle => {
	const decorations = new Map(parent.decorations);
	for (const [decoration, active] of node.decorations) {
		decorations.set(decoration.name, active);
	}
	return {
		colour: node.colour.name === Colour.NONE.name ? parent.colour : node.colour,
		decorations,
	};
};

const toCodes = (style: EffectiveStyle): CodeStyle => {
	let formats = "";
	for (const [code, decoration] of LEGACY_DECORATION_CODES) {
		if (style.decorations.get(decoration.name) === true) formats += code;
	}
	return { colour: COLOUR_NAME_TO_CODE.get(style.colour.name), formats };
};

const sameCodes = (a: CodeStyle, b: CodeStyle): boolean =>
	a.colour === b.colour && a.formats === b.formats;

/** Flatten to a legacy string, e.g. `§c§lHello`. */
export const toLegacyText = (
	text: Text,
	options: LegacyOptions = {},
): string => {
	const prefix = options.prefix ?? LEGACY_PREFIX;
	let out = "";
	let last = PLAIN_CODES;

	const visit = (node: Text, parent: EffectiveStyle): void => {
		if (node.type !== "literal") return;
		const style = inherit(parent, node);

		if (node.content !== "") {
			const codes = toCodes(style);
			if (!sameCodes(codes, last)) {
				if (codes.colour !== undefined) {
					out += prefix + codes.colour;
				} else if (!sameCodes(last, PLAIN_CODES)) {
					out += prefix + LEGACY_RESET_CODE;
				}
				for (const code of codes.formats) out += prefix + code;
				last = codes;
			}
			out += node.content;
		}

		for (const child of node.children) visit(child, style);
	};

	visit(text, UNSTYLED);
	return out;
};

// ─── Deserialise ────────────────────────────────────────────────────────────

/**
 * Parse a legacy string. Text before the first code is the root's content;
 * every later run of text becomes a child carrying the style in effect.
 * Unknown codes are kept as text.
 */
export const fromLegacyText = (
	input: string,
	options: LegacyOptions = {},
): LiteralText => {
	const prefix = options.prefix ?? LEGACY_PREFIX;
	const root = createLiteralBuilder();

	let colour = Colour.NONE;
	let formats: Decoration[] = [];
	let segment = "";
	let styled = false;

	const flush = () => {
		if (!styled) {
			root.content(segment);
		} else if (segment !== "") {
			const child = createLiteralBuilder(segment).applyColour(colour);
			for (const decoration of formats) child.applyDecoration(decoration);
			root.append(child.build());
		}
		segment = "";
	};

	let i = 0;
	while (i < input.length) {
		const code =
			prefix !== "" && input.startsWith(prefix, i)
				? input.charAt(i + prefix.length).toLowerCase()
				: "";
		const newColour = LEGACY_COLOUR_CODES.get(code);
		const format = LEGACY_DECORATION_CODES.get(code);

		if (
			newColour === undefined &&
			format === undefined &&
			code !== LEGACY_RESET_CODE
		) {
			segment += input.charAt(i);
			i++;
			continue;
		}

		flush();
		styled = true;
		if (newColour !== undefined) {
			colour = newColour;
			formats = [];
		} else if (format !== undefined) {
			if (!formats.includes(format)) formats.push(format);
		} else {
			colour = Colour.NONE;
			formats = [];
		}
		i += prefix.length + 1;
	}

	flush();
	return root.build();
};

/** Legacy serialiser bound to one prefix character. */
export const createLegacySerialiser = (
	options: LegacyOptions = {},
): TextSerialiser => ({
	serialise: (text) => toLegacyText(text, options),
	deserialise: (input) => fromLegacyText(input, options),
});
