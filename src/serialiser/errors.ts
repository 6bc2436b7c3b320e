/**
 * - `malformed`: not a text object, missing or mistyped field, too deep
 * - `unknown_identifier`: colour or action name with no registered value
 */
export type TextParseFailure = "malformed" | "unknown_identifier";

/** Thrown when input cannot be turned into a text tree. */
export class TextParseError extends Error {
	readonly reason: TextParseFailure;

	constructor(
		message: string,
		reason: TextParseFailure,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "TextParseError";
		this.reason = reason;
	}
}
