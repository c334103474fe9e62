import type { TextCodec } from "./codec";
import {
	AR_HEADER,
	DEFAULT_FILE_MODE,
	HEADER_SIZE,
	HEADER_TERMINATOR,
} from "./constants";
import { ArchiveError } from "./errors";
import type { ArHeader } from "./types";
import { describeBytes, encoder } from "./utils";

// ASCII code for a space character.
const SPACE = 32;

const TERMINATOR_BYTES = encoder.encode(HEADER_TERMINATOR);

type NumericField = "date" | "uid" | "gid" | "mode" | "size";

export interface DecodeHeaderOptions {
	/**
	 * Fall back to defaults when date, uid, gid or mode do not parse. Some
	 * writers leave these fields blank in the GNU string table header.
	 */
	lenient?: boolean;
	/** Stream position of the header, for error reporting. */
	offset?: number;
}

/**
 * Writes a left-justified field into a space-filled block.
 */
function writeField(
	block: Uint8Array,
	field: keyof typeof AR_HEADER,
	bytes: Uint8Array,
	name: string,
): void {
	const { offset, size } = AR_HEADER[field];
	if (bytes.length > size) {
		throw new ArchiveError(
			"INVALID_HEADER_FIELD",
			`Header field "${field}" of member "${name}" needs ${bytes.length} bytes but only ${size} are available.`,
			{ member: name },
		);
	}
	block.set(bytes, offset);
}

/**
 * Encodes a member header into its 60-byte on-disk form.
 *
 * Numeric fields are decimal, except `mode` which is octal. Every field is
 * padded with spaces; nothing is truncated.
 */
export function encodeHeader(header: ArHeader, codec: TextCodec): Uint8Array {
	const block = new Uint8Array(HEADER_SIZE).fill(SPACE);

	writeField(block, "name", codec.encode(header.name), header.name);
	writeField(block, "date", encoder.encode(String(header.date)), header.name);
	writeField(block, "uid", encoder.encode(String(header.uid)), header.name);
	writeField(block, "gid", encoder.encode(String(header.gid)), header.name);
	writeField(
		block,
		"mode",
		encoder.encode(header.mode.toString(8)),
		header.name,
	);
	writeField(block, "size", encoder.encode(String(header.size)), header.name);
	block.set(TERMINATOR_BYTES, AR_HEADER.terminator.offset);

	return block;
}

function readField(
	block: Uint8Array,
	field: keyof typeof AR_HEADER,
	codec: TextCodec,
): string {
	const { offset, size } = AR_HEADER[field];
	return codec.decode(block.subarray(offset, offset + size)).trim();
}

function parseNumber(
	text: string,
	field: NumericField,
	offset: number | undefined,
): number {
	const radix = field === "mode" ? 8 : 10;
	const pattern = radix === 8 ? /^[0-7]+$/ : /^\d+$/;

	if (!pattern.test(text)) {
		throw new ArchiveError(
			"INVALID_HEADER_FIELD",
			`Header field "${field}" is not a ${radix === 8 ? "octal" : "decimal"} number: "${text}".`,
			{ offset, actual: text },
		);
	}

	return Number.parseInt(text, radix);
}

/**
 * Decodes a 60-byte member header.
 *
 * @throws {ArchiveError} `INVALID_ARCHIVE` if the terminator is wrong, or
 * `INVALID_HEADER_FIELD` if a numeric field does not parse.
 */
export function decodeHeader(
	block: Uint8Array,
	codec: TextCodec,
	options: DecodeHeaderOptions = {},
): ArHeader {
	const { lenient = false, offset } = options;
	const { offset: tailOffset, size: tailSize } = AR_HEADER.terminator;
	const tail = block.subarray(tailOffset, tailOffset + tailSize);

	if (
		block.length !== HEADER_SIZE ||
		tail[0] !== TERMINATOR_BYTES[0] ||
		tail[1] !== TERMINATOR_BYTES[1]
	) {
		throw new ArchiveError(
			"INVALID_ARCHIVE",
			`Invalid member header terminator: ${describeBytes(tail)} (expected ${describeBytes(TERMINATOR_BYTES)}).`,
			{
				offset,
				expected: HEADER_TERMINATOR,
				actual: describeBytes(tail),
			},
		);
	}

	const numeric = (field: NumericField, fallback: number): number => {
		const text = readField(block, field, codec);
		try {
			return parseNumber(text, field, offset);
		} catch (error) {
			if (lenient && field !== "size") return fallback;
			throw error;
		}
	};

	return {
		name: readField(block, "name", codec),
		date: numeric("date", 0),
		uid: numeric("uid", 0),
		gid: numeric("gid", 0),
		mode: numeric("mode", DEFAULT_FILE_MODE),
		size: numeric("size", 0),
	};
}

/**
 * Reads only the name field of a header block, padding removed.
 */
export function readHeaderName(block: Uint8Array, codec: TextCodec): string {
	return readField(block, "name", codec);
}
