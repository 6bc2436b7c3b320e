/**
 * Convert JSON chat text from the command line.
 *
 *   tsx scripts/text.ts '{"text":"Hi","color":"red"}' --format legacy --prefix '&'
 */

import { parseArgs } from "node:util";
import {
	createJsonSerialiser,
	createLegacySerialiser,
	deserialiseJson,
	LEGACY_PREFIX,
	plainTextSerialiser,
	TextParseError,
} from "../src/index.ts";
import type { TextSerialiser } from "../src/index.ts";

const { values, positionals } = parseArgs({
	options: {
		format: { type: "string", short: "f" },
		prefix: { type: "string", short: "p" },
	},
	allowPositionals: true,
});

const serialisers: ReadonlyMap<string, TextSerialiser> = new Map([
	["plain", plainTextSerialiser],
	[
		"legacy",
		createLegacySerialiser({ prefix: values.prefix ?? LEGACY_PREFIX }),
	],
	["json", createJsonSerialiser()],
]);

const serialiser = serialisers.get(values.format ?? "plain");
const [input] = positionals;

if (!serialiser || input === undefined) {
	console.error(
		"Usage: text.ts <json> [--format plain|legacy|json] [--prefix <char>]",
	);
	process.exitCode = 1;
} else {
	try {
		console.log(serialiser.serialise(deserialiseJson(input)));
	} catch (err) {
		if (!(err instanceof TextParseError)) throw err;
		console.error("[text]", err.message);
		process.exitCode = 1;
	}
}
