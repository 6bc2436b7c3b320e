import { describe, expect, it } from "vitest";
import { Colour, Decoration } from "../src/format/index.ts";
import {
	createLegacySerialiser,
	fromLegacyText,
	toLegacyText,
	toPlainText,
} from "../src/serialiser/index.ts";
import {
	createLiteralBuilder,
	literal,
	textEquals,
	translatable,
} from "../src/text/index.ts";

const red = (content: string) =>
	createLiteralBuilder(content).applyColour(Colour.RED).build();

// ── Serialise ──

describe("toLegacyText", () => {
	it("writes unstyled text as-is", () => {
		expect(toLegacyText(literal("plain"))).toBe("plain");
	});

	it("writes colour then formats", () => {
		const text = createLiteralBuilder("a")
			.applyDecoration(Decoration.ITALIC)
			.applyDecoration(Decoration.BOLD)
			.applyColour(Colour.RED)
			.build();
		expect(toLegacyText(text)).toBe("§c§l§oa");
	});

	it("lets children inherit style", () => {
		const text = createLiteralBuilder("a")
			.applyDecoration(Decoration.BOLD)
			.applyColour(Colour.RED)
			.append(literal("b"))
			.build();
		expect(toLegacyText(text)).toBe("§c§lab");
	});

	it("styles a child of plain text", () => {
		const text = createLiteralBuilder("Hello ")
			.append(
				createLiteralBuilder("World")
					.applyColour(Colour.GOLD)
					.applyDecoration(Decoration.ITALIC)
					.build(),
			)
			.build();
		expect(toLegacyText(text)).toBe("Hello §6§oWorld");
	});

	it("resets when a sibling drops the colour", () => {
		const text = createLiteralBuilder("")
			.append(red("x"), literal("y"))
			.build();
		expect(toLegacyText(text)).toBe("§cx§ry");
	});

	it("resets when a child switches a format off", () => {
		const text = createLiteralBuilder("a")
			.applyDecoration(Decoration.BOLD)
			.append(
				createLiteralBuilder("b").unapplyDecoration(Decoration.BOLD).build(),
			)
			.build();
		expect(toLegacyText(text)).toBe("§la§rb");
	});

	it("skips colours without a code", () => {
		const text = createLiteralBuilder("x").applyColour(Colour.of("teal")).build();
		expect(toLegacyText(text)).toBe("x");
	});

	it("skips non-literal nodes", () => {
		const text = createLiteralBuilder("a")
			.append(translatable("k"), literal("b"))
			.build();
		expect(toLegacyText(text)).toBe("ab");
	});

	it("uses a custom prefix", () => {
		expect(toLegacyText(red("x"), { prefix: "&" })).toBe("&cx");
	});
});

// ── Deserialise ──

describe("fromLegacyText", () => {
	it("reads text without codes", () => {
		expect(textEquals(fromLegacyText("plain text"), literal("plain text"))).toBe(
			true,
		);
	});

	it("splits styled runs into children", () => {
		const text = fromLegacyText("§cHello §lWorld");
		expect(text.content).toBe("");
		expect(text.children).toHaveLength(2);
		expect(textEquals(text.children[0], red("Hello "))).toBe(true);
		expect(
			textEquals(
				text.children[1],
				createLiteralBuilder("World")
					.applyColour(Colour.RED)
					.applyDecoration(Decoration.BOLD)
					.build(),
			),
		).toBe(true);
		expect(toPlainText(text)).toBe("Hello World");
	});

	it("keeps leading text on the root", () => {
		const text = fromLegacyText("Hi §cthere");
		expect(text.content).toBe("Hi ");
		expect(textEquals(text.children[0], red("there"))).toBe(true);
	});

	it("clears formats on a colour code", () => {
		const text = fromLegacyText("§l§cX");
		expect(text.children).toHaveLength(1);
		expect(textEquals(text.children[0], red("X"))).toBe(true);
	});

	it("clears everything on reset", () => {
		const text = fromLegacyText("§c§lA§rB");
		expect(textEquals(text.children[1], literal("B"))).toBe(true);
	});

	it("accepts upper-case codes", () => {
		expect(textEquals(fromLegacyText("§CA").children[0], red("A"))).toBe(true);
	});

	it("keeps unknown codes and a trailing prefix as text", () => {
		expect(textEquals(fromLegacyText("§zHi"), literal("§zHi"))).toBe(true);
		expect(textEquals(fromLegacyText("abc§"), literal("abc§"))).toBe(true);
	});

	it("reads a custom prefix", () => {
		const text = fromLegacyText("&4Hello&cWorld", { prefix: "&" });
		expect(
			textEquals(
				text.children[0],
				createLiteralBuilder("Hello").applyColour(Colour.DARK_RED).build(),
			),
		).toBe(true);
		expect(textEquals(text.children[1], red("World"))).toBe(true);
	});
});

describe("createLegacySerialiser", () => {
	it("re-encodes parsed text", () => {
		const serialiser = createLegacySerialiser();
		expect(serialiser.serialise(serialiser.deserialise("§cHello §lWorld"))).toBe(
			"§cHello §c§lWorld",
		);
	});

	it("binds the prefix", () => {
		const serialiser = createLegacySerialiser({ prefix: "&" });
		expect(serialiser.serialise(serialiser.deserialise("&aok"))).toBe("&aok");
	});
});
