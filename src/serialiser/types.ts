import type { StyleRegistries } from "../registry/defaults.ts";
import type { Text } from "../text/types.ts";

/** Converts text trees to and from one string representation. */
export type TextSerialiser = {
	serialise: (text: Text) => string;
	deserialise: (input: string) => Text;
};

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** How decoration flags are written: `true` or `"true"`. */
export type DecorationFormat = "boolean" | "string";

export type JsonCodecOptions = {
	/** Default `"boolean"`. Reading accepts both forms regardless. */
	readonly decorationFormat?: DecorationFormat;
	/** Reject input nested deeper than this. Default: unbounded. */
	readonly maxDepth?: number;
	/** Registries used to resolve identifiers; defaults to the global ones. */
	readonly registries?: Partial<StyleRegistries>;
};

export type LegacyOptions = {
	/** Character introducing a code. Default `§`. */
	readonly prefix?: string;
};
