import type { ArchiveSource } from "./io";
import type { Logger } from "./logger";

/** Archive flavor. `deb` is the BSD layout restricted to short names. */
export type ArchiveFormat = "gnu" | "bsd" | "deb";

/** Encoding used to convert names to and from header bytes. */
export type ArchiveEncoding = "utf-8" | "latin1";

/**
 * Decoded fields of a 60-byte member header.
 */
export interface ArHeader {
	/** Raw name field with padding removed. */
	name: string;
	/** Modification time in seconds since the epoch. */
	date: number;
	uid: number;
	gid: number;
	/** Mode bits including the file type, e.g. `0o100644`. */
	mode: number;
	/** Byte count following the header, including any inline name. */
	size: number;
}

/**
 * Where a member's payload currently lives. A member has exactly one origin.
 */
export type MemberOrigin =
	/** Payload starts at `offset` in the stream bound to the archive. */
	| { type: "archive"; offset: number }
	/** Payload is an external file awaiting its first write. */
	| { type: "file"; path: string }
	/** Payload is held in memory awaiting its first write. */
	| { type: "content"; data: Uint8Array };

/** Unix metadata carried by every header. */
export interface MemberMetadata {
	date: number;
	uid: number;
	gid: number;
	mode: number;
}

interface MemberBase extends MemberMetadata {
	/** Logical, user-facing name. */
	readonly filename: string;
	/** Payload size in bytes, excluding any inline name. */
	readonly filesize: number;
	origin: MemberOrigin;
}

/** GNU member whose name fits the header as `name/`. */
export interface GnuShortMember extends MemberBase {
	readonly kind: "gnu-short";
}

/** GNU member whose name lives in the string table, referenced as `/offset`. */
export interface GnuLongMember extends MemberBase {
	readonly kind: "gnu-long";
}

/** BSD member whose name is stored verbatim in the header. */
export interface BsdShortMember extends MemberBase {
	readonly kind: "bsd-short";
}

/** BSD member whose name follows the header, referenced as `#1/length`. */
export interface BsdLongMember extends MemberBase {
	readonly kind: "bsd-long";
	/** Encoded name length, counted in the header size. */
	readonly nameLength: number;
}

/** Debian package member. Owner and group are always written as 0. */
export interface DebShortMember extends MemberBase {
	readonly kind: "deb-short";
}

/** A regular archive member. */
export type ArchiveMember =
	| GnuShortMember
	| GnuLongMember
	| BsdShortMember
	| BsdLongMember
	| DebShortMember;

interface SymbolTableBase extends MemberMetadata {
	readonly filesize: number;
	origin: MemberOrigin;
}

/** GNU symbol table, stored under the name `/`. Content is opaque. */
export interface GnuSymbolTable extends SymbolTableBase {
	readonly kind: "gnu-symbol-table";
}

/** BSD symbol table, stored bare as `__.SYMDEF` or inline as `#1/length`. */
export interface BsdSymbolTable extends SymbolTableBase {
	readonly kind: "bsd-symbol-table";
	/** `__.SYMDEF`, optionally followed by ` SORTED`. */
	readonly symbolName: string;
	readonly sorted: boolean;
	/** Whether the name follows the header instead of sitting in the name field. */
	readonly inline: boolean;
	/** Encoded inline name length, including any NUL padding read from disk. 0 when bare. */
	readonly nameLength: number;
}

export type SymbolTable = GnuSymbolTable | BsdSymbolTable;

/** Every variant kind, tables included. */
export type MemberKind = ArchiveMember["kind"] | SymbolTable["kind"] | "gnu-string-table";

/**
 * Description of a new member, as captured from a file or supplied in memory.
 */
export interface MemberInit extends MemberMetadata {
	/** Logical name of the member. */
	name: string;
	/** Payload size in bytes. */
	size: number;
	origin: MemberOrigin;
}

/**
 * Configuration for an {@link Archive} session.
 */
export interface ArchiveOptions {
	/** Format used when building. Loading detects the format. Defaults to `"gnu"`. */
	format?: ArchiveFormat;
	/** Name encoding. Defaults to `"utf-8"`. */
	encoding?: ArchiveEncoding;
	/** Structured logger for this session. Defaults to {@link noopLogger}. */
	logger?: Logger;
	/** Opens an external file payload. Supplied by the filesystem layer. */
	openFile?: (path: string) => Promise<ArchiveSource>;
	/** Bound on every payload copy. Defaults to 65535 bytes. */
	chunkSize?: number;
}
