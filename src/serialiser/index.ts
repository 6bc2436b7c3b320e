export { TextParseError } from "./errors.ts";
export type { TextParseFailure } from "./errors.ts";
export {
	createJsonSerialiser,
	deserialiseJson,
	serialiseJson,
	textFromJson,
	textToJson,
} from "./json.ts";
export {
	createLegacySerialiser,
	fromLegacyText,
	toLegacyText,
} from "./legacy.ts";
export { fromPlainText, plainTextSerialiser, toPlainText } from "./plain.ts";
export type {
	DecorationFormat,
	JsonCodecOptions,
	JsonObject,
	JsonValue,
	LegacyOptions,
	TextSerialiser,
} from "./types.ts";
