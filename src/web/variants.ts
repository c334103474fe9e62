import type { TextCodec } from "./codec";
import {
	BSD_INLINE_NAME_PREFIX,
	BSD_SORTED_SUFFIX,
	BSD_SYMBOL_TABLE_NAME,
	GNU_NAME_TERMINATOR,
	GNU_STRING_TABLE_NAME,
	GNU_SYMBOL_TABLE_NAME,
	NAME_FIELD_SIZE,
} from "./constants";
import { ArchiveError } from "./errors";
import type { Logger } from "./logger";
import type { StringTable } from "./string-table";
import type {
	ArchiveFormat,
	ArchiveMember,
	ArHeader,
	MemberKind,
	SymbolTable,
} from "./types";
import { hasWhitespace, trimName } from "./utils";

/**
 * Outcome of asking a variant whether it owns a name. A rejection is not an
 * error: the caller moves on to the next candidate.
 */
export type Classification<T> =
	| { ok: true; value: T }
	| { ok: false; reason: string };

/** What a variant derives from a header it accepts. */
export type HeaderMatch =
	| { kind: "gnu-short"; filename: string }
	| { kind: "gnu-long"; nameOffset: number }
	| { kind: "gnu-symbol-table" }
	| { kind: "gnu-string-table" }
	| { kind: "bsd-short"; filename: string }
	| { kind: "bsd-long"; filename: string; nameLength: number }
	| {
			kind: "bsd-symbol-table";
			symbolName: string;
			sorted: boolean;
			inline: boolean;
			nameLength: number;
	  }
	| { kind: "deb-short"; filename: string };

/** What a variant derives from a new file's logical name. */
export type NewFileMatch =
	| { kind: "gnu-short" }
	| { kind: "gnu-long" }
	| { kind: "bsd-short" }
	| { kind: "bsd-long"; nameLength: number }
	| { kind: "deb-short" };

export interface HeaderContext {
	codec: TextCodec;
	/** Format fixed so far in the current load, if any. */
	format: ArchiveFormat | null;
	/** Reads `length` bytes directly following the header. */
	readInline(length: number): Promise<Uint8Array>;
}

/**
 * One on-disk member encoding.
 */
export interface MemberVariant {
	readonly kind: MemberKind;
	readonly family: ArchiveFormat;
	/** Whether this variant should represent a new file called `name`. */
	acceptFromNewFile(
		name: string,
		codec: TextCodec,
	): Classification<NewFileMatch>;
	/** Whether a decoded header name field has this variant's shape. */
	acceptFromHeader(
		rawName: string,
		context: HeaderContext,
	): Promise<Classification<HeaderMatch>>;
}

const accept = <T>(value: T): Classification<T> => ({ ok: true, value });
const reject = (reason: string): { ok: false; reason: string } => ({
	ok: false,
	reason,
});

const INLINE_NAME_PATTERN = /^#1\/(\d+)$/;
const GNU_LONG_NAME_PATTERN = /^\/(\d+)$/;

const byteLength = (name: string, codec: TextCodec) =>
	codec.encode(name).length;

// Names a bare BSD symbol table header carries. Anything else starting with
// `__.SYMDEF` is an ordinary member.
const BARE_SYMBOL_TABLE_NAMES: ReadonlySet<string> = new Set([
	BSD_SYMBOL_TABLE_NAME,
	`${BSD_SYMBOL_TABLE_NAME} ${BSD_SORTED_SUFFIX}`,
]);

/**
 * Whether a name can be stored verbatim in a BSD header and read back as a
 * short name.
 */
function isBsdShortName(name: string, codec: TextCodec): boolean {
	return (
		byteLength(name, codec) <= NAME_FIELD_SIZE &&
		!hasWhitespace(name) &&
		!name.includes(GNU_NAME_TERMINATOR) &&
		!BARE_SYMBOL_TABLE_NAMES.has(name)
	);
}

function isBsdShortHeader(rawName: string): boolean {
	return (
		!BARE_SYMBOL_TABLE_NAMES.has(rawName) &&
		!rawName.includes(GNU_NAME_TERMINATOR)
	);
}

async function readInlineName(
	rawName: string,
	context: HeaderContext,
): Promise<{ name: string; nameLength: number } | null> {
	const match = INLINE_NAME_PATTERN.exec(rawName);
	if (!match) return null;

	const nameLength = Number.parseInt(match[1], 10);
	const bytes = await context.readInline(nameLength);
	return { name: trimName(context.codec.decode(bytes)), nameLength };
}

const notFromFile = (kind: string) => (): Classification<NewFileMatch> =>
	reject(`A ${kind} is never created from a file.`);

export const gnuShortVariant: MemberVariant = {
	kind: "gnu-short",
	family: "gnu",
	acceptFromNewFile(name, codec) {
		if (byteLength(name, codec) < NAME_FIELD_SIZE && !hasWhitespace(name)) {
			return accept({ kind: "gnu-short" });
		}
		return reject("Name does not fit a GNU short header.");
	},
	async acceptFromHeader(rawName) {
		if (
			rawName.length > 1 &&
			rawName.endsWith(GNU_NAME_TERMINATOR) &&
			!rawName.startsWith(GNU_NAME_TERMINATOR) &&
			!hasWhitespace(rawName)
		) {
			return accept({
				kind: "gnu-short",
				filename: rawName.slice(0, -GNU_NAME_TERMINATOR.length),
			});
		}
		return reject("Not a GNU short name.");
	},
};

export const gnuLongVariant: MemberVariant = {
	kind: "gnu-long",
	family: "gnu",
	acceptFromNewFile(name, codec) {
		if (byteLength(name, codec) >= NAME_FIELD_SIZE || hasWhitespace(name)) {
			return accept({ kind: "gnu-long" });
		}
		return reject("Name fits a GNU short header.");
	},
	async acceptFromHeader(rawName) {
		const match = GNU_LONG_NAME_PATTERN.exec(rawName);
		if (!match) return reject("Not a GNU string table reference.");
		return accept({
			kind: "gnu-long",
			nameOffset: Number.parseInt(match[1], 10),
		});
	},
};

export const gnuSymbolTableVariant: MemberVariant = {
	kind: "gnu-symbol-table",
	family: "gnu",
	acceptFromNewFile: notFromFile("GNU symbol table"),
	async acceptFromHeader(rawName) {
		if (rawName === GNU_SYMBOL_TABLE_NAME) {
			return accept({ kind: "gnu-symbol-table" });
		}
		return reject("Not a GNU symbol table.");
	},
};

export const gnuStringTableVariant: MemberVariant = {
	kind: "gnu-string-table",
	family: "gnu",
	acceptFromNewFile: notFromFile("GNU string table"),
	async acceptFromHeader(rawName) {
		if (rawName === GNU_STRING_TABLE_NAME) {
			return accept({ kind: "gnu-string-table" });
		}
		return reject("Not a GNU string table.");
	},
};

export const bsdShortVariant: MemberVariant = {
	kind: "bsd-short",
	family: "bsd",
	acceptFromNewFile(name, codec) {
		if (isBsdShortName(name, codec)) return accept({ kind: "bsd-short" });
		return reject("Name does not fit a BSD short header.");
	},
	async acceptFromHeader(rawName) {
		if (isBsdShortHeader(rawName)) {
			return accept({ kind: "bsd-short", filename: rawName });
		}
		return reject("Not a BSD short name.");
	},
};

export const bsdLongVariant: MemberVariant = {
	kind: "bsd-long",
	family: "bsd",
	acceptFromNewFile(name, codec) {
		if (isBsdShortName(name, codec)) {
			return reject("Name fits a BSD short header.");
		}
		if (name.startsWith(BSD_SYMBOL_TABLE_NAME)) {
			return reject("Name is reserved for the BSD symbol table.");
		}
		return accept({ kind: "bsd-long", nameLength: byteLength(name, codec) });
	},
	async acceptFromHeader(rawName, context) {
		const inline = await readInlineName(rawName, context);
		if (!inline) return reject("Not a BSD inline name.");
		if (inline.name.startsWith(BSD_SYMBOL_TABLE_NAME)) {
			return reject("Inline name belongs to the BSD symbol table.");
		}
		return accept({
			kind: "bsd-long",
			filename: inline.name,
			nameLength: inline.nameLength,
		});
	},
};

export const bsdSymbolTableVariant: MemberVariant = {
	kind: "bsd-symbol-table",
	family: "bsd",
	acceptFromNewFile: notFromFile("BSD symbol table"),
	async acceptFromHeader(rawName, context) {
		if (BARE_SYMBOL_TABLE_NAMES.has(rawName)) {
			return accept({
				kind: "bsd-symbol-table",
				symbolName: rawName,
				sorted: rawName.endsWith(BSD_SORTED_SUFFIX),
				inline: false,
				nameLength: 0,
			});
		}

		const inline = await readInlineName(rawName, context);
		if (!inline || !inline.name.startsWith(BSD_SYMBOL_TABLE_NAME)) {
			return reject("Not a BSD symbol table.");
		}
		return accept({
			kind: "bsd-symbol-table",
			symbolName: inline.name,
			sorted: inline.name.endsWith(BSD_SORTED_SUFFIX),
			inline: true,
			nameLength: inline.nameLength,
		});
	},
};

/**
 * Debian members share the BSD short layout. `load` detects a package only
 * after reading every header, so it never reaches this header path; it serves
 * callers classifying headers with the format already fixed to `deb`.
 */
export const debShortVariant: MemberVariant = {
	kind: "deb-short",
	family: "deb",
	acceptFromNewFile(name, codec) {
		if (isBsdShortName(name, codec)) return accept({ kind: "deb-short" });
		return reject("Debian packages only hold short names.");
	},
	async acceptFromHeader(rawName, context) {
		if (context.format === "deb" && isBsdShortHeader(rawName)) {
			return accept({ kind: "deb-short", filename: rawName });
		}
		return reject("Not a Debian member.");
	},
};

/**
 * Header candidates per family, tables before long names before short names.
 * The `deb` list only applies once the format is known to be `deb`.
 */
export const HEADER_VARIANTS: Record<ArchiveFormat, readonly MemberVariant[]> =
	{
		gnu: [
			gnuSymbolTableVariant,
			gnuStringTableVariant,
			gnuLongVariant,
			gnuShortVariant,
		],
		bsd: [bsdSymbolTableVariant, bsdLongVariant, bsdShortVariant],
		deb: [bsdSymbolTableVariant, bsdLongVariant, debShortVariant],
	};

/**
 * Candidates for the first header of an archive whose format is unknown.
 * Debian packages share the BSD layout and are recognized after loading.
 */
export const FIRST_HEADER_VARIANTS: readonly MemberVariant[] = [
	...HEADER_VARIANTS.gnu,
	...HEADER_VARIANTS.bsd,
];

/** New-file candidates per family. */
export const NEW_FILE_VARIANTS: Record<ArchiveFormat, readonly MemberVariant[]> =
	{
		gnu: [gnuShortVariant, gnuLongVariant],
		bsd: [bsdShortVariant, bsdLongVariant],
		deb: [debShortVariant],
	};

/**
 * Tries every candidate against a header name and returns the single match.
 *
 * @throws {ArchiveError} `UNKNOWN_MEMBER` if nothing accepts, or
 * `AMBIGUOUS_MEMBER` if more than one candidate does.
 */
export async function classifyHeader(
	rawName: string,
	context: HeaderContext,
	candidates: readonly MemberVariant[],
	logger: Logger,
	offset: number,
): Promise<{ variant: MemberVariant; match: HeaderMatch }> {
	const accepted: { variant: MemberVariant; match: HeaderMatch }[] = [];

	for (const variant of candidates) {
		const result = await variant.acceptFromHeader(rawName, context);
		if (result.ok) {
			accepted.push({ variant, match: result.value });
		} else {
			logger.debug("Wrong member type", {
				kind: variant.kind,
				name: rawName,
				offset,
				reason: result.reason,
			});
		}
	}

	if (accepted.length > 1) {
		throw new ArchiveError(
			"AMBIGUOUS_MEMBER",
			`Header name "${rawName}" matches several member types: ${accepted.map((a) => a.variant.kind).join(", ")}.`,
			{ offset, member: rawName },
		);
	}

	const [first] = accepted;
	if (!first) {
		throw new ArchiveError(
			"UNKNOWN_MEMBER",
			`Unknown archive entry "${rawName}" at offset ${offset}.`,
			{ offset, member: rawName },
		);
	}

	return first;
}

/**
 * Picks the variant of `format` that represents a new file called `name`.
 *
 * @throws {ArchiveError} `UNSUPPORTED_MEMBER` if no variant of the family can
 * hold the name.
 */
export function selectNewFileVariant(
	name: string,
	format: ArchiveFormat,
	codec: TextCodec,
	logger: Logger,
): NewFileMatch {
	const accepted: NewFileMatch[] = [];

	for (const variant of NEW_FILE_VARIANTS[format]) {
		const result = variant.acceptFromNewFile(name, codec);
		if (result.ok) {
			accepted.push(result.value);
		} else {
			logger.debug("Wrong member type", {
				kind: variant.kind,
				name,
				reason: result.reason,
			});
		}
	}

	if (accepted.length > 1) {
		throw new ArchiveError(
			"AMBIGUOUS_MEMBER",
			`Name "${name}" matches several ${format.toUpperCase()} member types.`,
			{ member: name },
		);
	}

	const [match] = accepted;
	if (!match) {
		throw new ArchiveError(
			"UNSUPPORTED_MEMBER",
			`No ${format.toUpperCase()} member type can represent "${name}".`,
			{ member: name },
		);
	}

	return match;
}

/**
 * Derives the header of a regular member. GNU long names take their
 * `/offset` from the string table, so offsets must be final.
 */
export function memberHeader(
	member: ArchiveMember,
	strings: StringTable | null,
): ArHeader {
	const { date, uid, gid, mode, filesize } = member;

	switch (member.kind) {
		case "gnu-short":
			return {
				name: member.filename + GNU_NAME_TERMINATOR,
				date,
				uid,
				gid,
				mode,
				size: filesize,
			};

		case "gnu-long": {
			if (!strings?.has(member)) {
				throw new ArchiveError(
					"INVALID_ARCHIVE",
					`Long member "${member.filename}" is missing from the string table.`,
					{ member: member.filename },
				);
			}
			return {
				name: `${GNU_NAME_TERMINATOR}${strings.offsetOf(member)}`,
				date,
				uid,
				gid,
				mode,
				size: filesize,
			};
		}

		case "bsd-short":
			return { name: member.filename, date, uid, gid, mode, size: filesize };

		case "bsd-long":
			return {
				name: `${BSD_INLINE_NAME_PREFIX}${member.nameLength}`,
				date,
				uid,
				gid,
				mode,
				size: filesize + member.nameLength,
			};

		case "deb-short":
			return {
				name: member.filename,
				date,
				uid: 0,
				gid: 0,
				mode,
				size: filesize,
			};
	}
}

export function symbolTableHeader(table: SymbolTable): ArHeader {
	const { date, uid, gid, mode, filesize } = table;

	if (table.kind === "gnu-symbol-table") {
		return { name: GNU_SYMBOL_TABLE_NAME, date, uid, gid, mode, size: filesize };
	}

	return {
		name: table.inline
			? `${BSD_INLINE_NAME_PREFIX}${table.nameLength}`
			: table.symbolName,
		date,
		uid,
		gid,
		mode,
		size: filesize + table.nameLength,
	};
}

function padName(
	name: string,
	nameLength: number,
	codec: TextCodec,
): Uint8Array {
	const bytes = new Uint8Array(nameLength);
	bytes.set(codec.encode(name).subarray(0, nameLength));
	return bytes;
}

/**
 * Bytes written between a header and its payload, or `null` if the member
 * keeps its name in the header.
 */
export function inlineNameBytes(
	member: ArchiveMember | SymbolTable,
	codec: TextCodec,
): Uint8Array | null {
	if (member.kind === "bsd-long") {
		return padName(member.filename, member.nameLength, codec);
	}
	if (member.kind === "bsd-symbol-table" && member.inline) {
		return padName(member.symbolName, member.nameLength, codec);
	}
	return null;
}
