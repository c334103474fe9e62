import type { ArchiveEncoding } from "./types";
import { decoder, encoder } from "./utils";

/**
 * Converts between logical names and the bytes stored in headers.
 */
export interface TextCodec {
	readonly encoding: ArchiveEncoding;
	encode(value: string): Uint8Array;
	decode(bytes: Uint8Array): string;
}

const utf8: TextCodec = {
	encoding: "utf-8",
	encode: (value) => encoder.encode(value),
	decode: (bytes) => decoder.decode(bytes),
};

// `TextDecoder("latin1")` is windows-1252, which is not byte-transparent.
const latin1: TextCodec = {
	encoding: "latin1",
	encode(value) {
		const bytes = new Uint8Array(value.length);
		for (let i = 0; i < value.length; i++) {
			const code = value.charCodeAt(i);
			if (code > 0xff) {
				throw new RangeError(
					`Character "${value[i]}" in "${value}" is not representable in latin1.`,
				);
			}
			bytes[i] = code;
		}
		return bytes;
	},
	decode(bytes) {
		let value = "";
		for (const byte of bytes) value += String.fromCharCode(byte);
		return value;
	},
};

const CODECS: Record<ArchiveEncoding, TextCodec> = {
	"utf-8": utf8,
	latin1,
};

export function isArchiveEncoding(value: unknown): value is ArchiveEncoding {
	return typeof value === "string" && Object.hasOwn(CODECS, value);
}

export function getTextCodec(encoding: ArchiveEncoding): TextCodec {
	return CODECS[encoding];
}
