import { describe, expect, it } from "vitest";
import { getTextCodec } from "../../src/web/codec";
import { decodeHeader, encodeHeader } from "../../src/web/header";
import type { ArHeader } from "../../src/web/types";
import { decoder, encoder } from "../../src/web/utils";
import { thrown } from "./helpers";

const codec = getTextCodec("utf-8");

const header: ArHeader = {
	name: "alpha.o/",
	date: 1700000000,
	uid: 501,
	gid: 20,
	mode: 0o100644,
	size: 6,
};

function blankField(block: Uint8Array, offset: number, size: number) {
	block.fill(0x20, offset, offset + size);
	return block;
}

describe("header codec", () => {
	describe("encodeHeader", () => {
		it("writes left-justified, space padded fields", () => {
			const block = encodeHeader(header, codec);

			expect(block).toHaveLength(60);
			expect(decoder.decode(block)).toBe(
				"alpha.o/".padEnd(16) +
					"1700000000".padEnd(12) +
					"501".padEnd(6) +
					"20".padEnd(6) +
					"100644".padEnd(8) +
					"6".padEnd(10) +
					"`\n",
			);
		});

		it("writes the mode in octal", () => {
			const block = encodeHeader({ ...header, mode: 0o100755 }, codec);
			expect(decoder.decode(block.subarray(40, 48))).toBe("100755  ");
		});

		it("refuses names longer than the name field", () => {
			expect(
				thrown(() => encodeHeader({ ...header, name: "a_very_long_name.o" }, codec)),
			).toMatchObject({ code: "INVALID_HEADER_FIELD", member: "a_very_long_name.o" });
		});

		it("refuses sizes longer than the size field", () => {
			expect(() =>
				encodeHeader({ ...header, size: 10_000_000_000 }, codec),
			).toThrow(/Header field "size" of member "alpha.o\/" needs 11 bytes/);
		});
	});

	describe("decodeHeader", () => {
		it("reads back an encoded header", () => {
			expect(decodeHeader(encodeHeader(header, codec), codec)).toEqual(header);
		});

		it("rejects a bad terminator", () => {
			const block = encodeHeader(header, codec);
			block.set(encoder.encode("xx"), 58);

			expect(thrown(() => decodeHeader(block, codec, { offset: 8 }))).toMatchObject({
				code: "INVALID_ARCHIVE",
				offset: 8,
				actual: '"xx"',
			});
		});

		it("rejects a short block", () => {
			const block = encodeHeader(header, codec).subarray(0, 59);
			expect(thrown(() => decodeHeader(block, codec))).toMatchObject({
				code: "INVALID_ARCHIVE",
			});
		});

		it("rejects non-numeric fields", () => {
			const block = encodeHeader(header, codec);
			block.set(encoder.encode("abc"), 28);

			expect(() => decodeHeader(block, codec)).toThrow(
				'Header field "uid" is not a decimal number: "abc".',
			);
		});

		it("rejects a mode that is not octal", () => {
			const block = encodeHeader(header, codec);
			block.set(encoder.encode("100689"), 40);

			expect(thrown(() => decodeHeader(block, codec))).toMatchObject({
				code: "INVALID_HEADER_FIELD",
				actual: "100689",
			});
		});

		it("falls back to defaults for blank fields when lenient", () => {
			const block = encodeHeader({ ...header, name: "//", size: 54 }, codec);
			blankField(block, 16, 32);

			expect(decodeHeader(block, codec, { lenient: true })).toEqual({
				name: "//",
				date: 0,
				uid: 0,
				gid: 0,
				mode: 0o100644,
				size: 54,
			});
		});

		it("never falls back for the size", () => {
			const block = blankField(encodeHeader(header, codec), 48, 10);

			expect(() => decodeHeader(block, codec, { lenient: true })).toThrow(
				'Header field "size" is not a decimal number: "".',
			);
		});
	});
});
