/**
 * JSON codec — the chat component wire format.
 *
 * Writing is total. Reading validates every field it uses and throws
 * `TextParseError`; unknown fields are ignored.
 */

import { createClickEvent, createHoverEvent } from "../event/event.ts";
import type { ClickEvent, HoverEvent } from "../event/event.ts";
import { Colour, Decoration } from "../format/values.ts";
import { defaultRegistries } from "../registry/defaults.ts";
import type { StyleRegistries } from "../registry/defaults.ts";
import type { Identified, StyleRegistry } from "../registry/types.ts";
import {
	createKeybindBuilder,
	createLiteralBuilder,
	createTranslatableBuilder,
} from "../text/builder.ts";
import type { Text, TextBuilder } from "../text/types.ts";
import { TextParseError } from "./errors.ts";
import type {
	JsonCodecOptions,
	JsonObject,
	TextSerialiser,
} from "./types.ts";

// ─── Serialise ──────────────────────────────────────────────────────────────

const eventToJson = (
	event: ClickEvent | HoverEvent,
	encode: (text: Text) => JsonObject,
): JsonObject => ({
	action: event.action.name,
	value: encode(event.value),
});

/** Convert a text tree to its JSON object form. */
export const textToJson = (
	text: Text,
	options: JsonCodecOptions = {},
): JsonObject => {
	const asString = options.decorationFormat === "string";

	const encode = (node: Text): JsonObject => {
		const json: JsonObject = {};

		switch (node.type) {
			case "literal":
				json.text = node.content;
				break;
			case "translatable":
				json.translate = node.key;
				if (node.args.length > 0) json.with = node.args.map(encode);
				break;
			case "keybind":
				json.keybind = node.keybind;
				break;
		}

		for (const [decoration, active] of node.decorations) {
			// Defined rather than assigned: `__proto__` must stay an own key
			Object.defineProperty(json, decoration.name, {
				value: asString ? String(active) : active,
				enumerable: true,
				writable: true,
				configurable: true,
			});
		}
		if (node.colour.name !== Colour.NONE.name) {
			json.color = node.colour.name;
		}
		if (node.insertion !== undefined) json.insertion = node.insertion;
		if (node.clickEvent !== undefined) {
			json.clickEvent = eventToJson(node.clickEvent, encode);
		}
		if (node.hoverEvent !== undefined) {
			json.hoverEvent = eventToJson(node.hoverEvent, encode);
		}
		if (node.children.length > 0) json.extra = node.children.map(encode);

		return json;
	};

	return encode(text);
};

/** Serialise a text tree to JSON text. */
export const serialiseJson = (
	text: Text,
	options: JsonCodecOptions = {},
): string => JSON.stringify(textToJson(text, options));

// ─── Deserialise ────────────────────────────────────────────────────────────

const isJsonObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const kindOf = (value: unknown): string => {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
};

/** Own property only, so keys like "constructor" are never picked up. */
const field = (obj: Record<string, unknown>, name: string): unknown =>
	Object.hasOwn(obj, name) ? obj[name] : undefined;

const malformed = (path: string, message: string) =>
	new TextParseError(`${path}: ${message}`, "malformed");

const expectString = (value: unknown, path: string): string => {
	if (typeof value !== "string") {
		throw malformed(path, `expected string, got ${kindOf(value)}`);
	}
	return value;
};

/** Content fields also take numbers, as servers send e.g. `{"text":5}`. */
const expectContent = (value: unknown, path: string): string =>
	typeof value === "number" ? String(value) : expectString(value, path);

const expectFlag = (value: unknown, path: string): boolean => {
	if (typeof value === "boolean") return value;
	if (value === "true") return true;
	if (value === "false") return false;
	throw malformed(path, `expected boolean, got ${kindOf(value)}`);
};

const expectArray = (value: unknown, path: string): readonly unknown[] => {
	if (!Array.isArray(value)) {
		throw malformed(path, `expected array, got ${kindOf(value)}`);
	}
	return value;
};

const resolve = <T extends Identified>(
	registry: StyleRegistry<T>,
	value: unknown,
	path: string,
): T => {
	const name = expectString(value, path);
	const found = registry.get(name);
	if (!found) {
		throw new TextParseError(
			`${path}: unknown ${registry.label} "${name}"`,
			"unknown_identifier",
		);
	}
	return found;
};

/**
 * Convert a parsed JSON value to a text tree.
 *
 * @throws TextParseError when the value is not a valid text component
 */
export const textFromJson = (
	value: unknown,
	options: JsonCodecOptions = {},
): Text => {
	// Per entry, so an explicit `undefined` falls back to the default
	const registries: StyleRegistries = {
		colours: options.registries?.colours ?? defaultRegistries.colours,
		decorations:
			options.registries?.decorations ?? defaultRegistries.decorations,
		clickActions:
			options.registries?.clickActions ?? defaultRegistries.clickActions,
		hoverActions:
			options.registries?.hoverActions ?? defaultRegistries.hoverActions,
	};
	const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;

	const decodeEvent = <A extends Identified>(
		raw: unknown,
		registry: StyleRegistry<A>,
		path: string,
		depth: number,
	): { action: A; value: Text } => {
		if (!isJsonObject(raw)) {
			throw malformed(path, `expected object, got ${kindOf(raw)}`);
		}
		const action = field(raw, "action");
		const payload = field(raw, "value");
		if (action === undefined) throw malformed(path, 'missing "action"');
		if (payload === undefined) throw malformed(path, 'missing "value"');
		return {
			action: resolve(registry, action, `${path}.action`),
			value: decode(payload, `${path}.value`, depth + 1),
		};
	};

	const contentBuilder = (
		json: Record<string, unknown>,
		path: string,
		depth: number,
	): TextBuilder => {
		const text = field(json, "text");
		if (text !== undefined) {
			return createLiteralBuilder(expectContent(text, `${path}.text`));
		}

		const translate = field(json, "translate");
		if (translate !== undefined) {
			const builder = createTranslatableBuilder(
				expectContent(translate, `${path}.translate`),
			);
			const args = field(json, "with");
			if (Array.isArray(args)) {
				args.forEach((arg: unknown, i) =>
					builder.argument(decode(arg, `${path}.with[${i}]`, depth + 1)),
				);
			}
			return builder;
		}

		const keybind = field(json, "keybind");
		if (keybind !== undefined) {
			return createKeybindBuilder(expectContent(keybind, `${path}.keybind`));
		}

		throw malformed(path, 'expected one of "text", "translate" or "keybind"');
	};

	const decode = (json: unknown, path: string, depth: number): Text => {
		if (depth > maxDepth) {
			throw malformed(path, `nesting exceeds maxDepth ${maxDepth}`);
		}
		if (!isJsonObject(json)) {
			throw malformed(path, `expected text object, got ${kindOf(json)}`);
		}

		const builder = contentBuilder(json, path, depth);

		for (const decoration of registries.decorations.values()) {
			// Not a storable state; applying it would wipe earlier fields
			if (decoration.name === Decoration.RESET.name) continue;
			const raw = field(json, decoration.name);
			if (raw === undefined) continue;
			builder.applyDecoration(
				decoration,
				expectFlag(raw, `${path}.${decoration.name}`),
			);
		}

		const color = field(json, "color");
		if (color !== undefined) {
			builder.applyColour(resolve(registries.colours, color, `${path}.color`));
		}

		const insertion = field(json, "insertion");
		if (insertion !== undefined) {
			builder.insertion(expectString(insertion, `${path}.insertion`));
		}

		const clickEvent = field(json, "clickEvent");
		if (clickEvent !== undefined) {
			const event = decodeEvent(
				clickEvent,
				registries.clickActions,
				`${path}.clickEvent`,
				depth,
			);
			builder.click(createClickEvent(event.action, event.value));
		}

		const hoverEvent = field(json, "hoverEvent");
		if (hoverEvent !== undefined) {
			const event = decodeEvent(
				hoverEvent,
				registries.hoverActions,
				`${path}.hoverEvent`,
				depth,
			);
			builder.hover(createHoverEvent(event.action, event.value));
		}

		const extra = field(json, "extra");
		if (extra !== undefined) {
			expectArray(extra, `${path}.extra`).forEach((child, i) =>
				builder.append(decode(child, `${path}.extra[${i}]`, depth + 1)),
			);
		}

		return builder.build();
	};

	return decode(value, "$", 0);
};

/**
 * Deserialise JSON text to a text tree.
 *
 * @throws TextParseError on invalid JSON or an invalid text component
 */
export const deserialiseJson = (
	input: string,
	options: JsonCodecOptions = {},
): Text => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(input);
	} catch (error) {
		throw new TextParseError("Failed to parse JSON text", "malformed", {
			cause: error,
		});
	}
	return textFromJson(parsed, options);
};

/** JSON serialiser bound to one set of options. */
export const createJsonSerialiser = (
	options: JsonCodecOptions = {},
): TextSerialiser => ({
	serialise: (text) => serialiseJson(text, options),
	deserialise: (input) => deserialiseJson(input, options),
});
