import type { TextCodec } from "./codec";
import { DEFAULT_FILE_MODE, GNU_STRING_TABLE_DELIMITER } from "./constants";
import { ArchiveError } from "./errors";
import type { ArchiveSource } from "./io";
import type { ArchiveMember, ArHeader, MemberMetadata } from "./types";
import { concatBytes, encoder, trimName } from "./utils";

const DELIMITER = encoder.encode(GNU_STRING_TABLE_DELIMITER);

// Bytes fetched per read while scanning for a delimiter.
const SCAN_CHUNK_SIZE = 256;

interface Entry {
	name: string;
	bytes: Uint8Array;
}

function indexOfDelimiter(bytes: Uint8Array, from: number): number {
	for (let i = Math.max(0, from); i + 1 < bytes.length; i++) {
		if (bytes[i] === DELIMITER[0] && bytes[i + 1] === DELIMITER[1]) return i;
	}
	return -1;
}

/**
 * GNU string table: the names of long members, each followed by `/\n`, in
 * the order they were registered. A long member's header refers to its name
 * by byte offset into this table.
 *
 * Entries are keyed by member identity, so two members may share a name.
 * Offsets are only stable once no more names will be registered; `save`
 * calls {@link StringTable.finalize} before writing any header.
 */
export class StringTable implements MemberMetadata {
	date: number;
	uid: number;
	gid: number;
	mode: number;

	/** Position of the table content in the bound source, if it was loaded. */
	offset: number | null = null;

	private readonly entries = new Map<ArchiveMember, Entry>();
	private storedSize: number | null = null;
	private finalized = false;

	constructor(
		private readonly codec: TextCodec,
		metadata: Partial<MemberMetadata> = {},
	) {
		this.date = metadata.date ?? Math.floor(Date.now() / 1000);
		this.uid = metadata.uid ?? 0;
		this.gid = metadata.gid ?? 0;
		this.mode = metadata.mode ?? DEFAULT_FILE_MODE;
	}

	/**
	 * Creates a table for a `//` header read from an archive. Its content
	 * starts at `offset` in the source.
	 */
	static fromHeader(
		header: ArHeader,
		offset: number,
		codec: TextCodec,
	): StringTable {
		const table = new StringTable(codec, header);
		table.offset = offset;
		table.storedSize = header.size;
		return table;
	}

	/** Number of registered names. */
	get length(): number {
		return this.entries.size;
	}

	/**
	 * Content size in bytes. A loaded table reports the size from its header
	 * until it is modified or rewritten.
	 */
	get size(): number {
		return this.storedSize ?? this.computedSize();
	}

	get isFinalized(): boolean {
		return this.finalized;
	}

	private computedSize(): number {
		let size = 0;
		for (const entry of this.entries.values()) {
			size += entry.bytes.length + DELIMITER.length;
		}
		return size;
	}

	/**
	 * Registers the logical name of a long member. Re-registering a member
	 * replaces its name in place.
	 */
	register(member: ArchiveMember, name: string): void {
		if (this.finalized) {
			throw new ArchiveError(
				"INVALID_ARCHIVE",
				`Cannot register "${name}": the string table is finalized for writing.`,
				{ member: name },
			);
		}
		this.entries.set(member, { name, bytes: this.codec.encode(name) });
		this.storedSize = null;
	}

	/**
	 * Records a name resolved from the loaded table content. Unlike
	 * {@link StringTable.register}, the size from the table header is kept.
	 */
	attach(member: ArchiveMember, name: string): void {
		this.entries.set(member, { name, bytes: this.codec.encode(name) });
	}

	has(member: ArchiveMember): boolean {
		return this.entries.has(member);
	}

	get(member: ArchiveMember): string | undefined {
		return this.entries.get(member)?.name;
	}

	delete(member: ArchiveMember): boolean {
		const deleted = this.entries.delete(member);
		if (deleted) this.storedSize = null;
		return deleted;
	}

	/** Byte offset of the member's name within the table. */
	offsetOf(member: ArchiveMember): number {
		let offset = 0;
		for (const [key, entry] of this.entries) {
			if (key === member) return offset;
			offset += entry.bytes.length + DELIMITER.length;
		}
		throw new ArchiveError(
			"INVALID_ARCHIVE",
			`Member "${member.filename}" has no string table entry.`,
			{ member: member.filename },
		);
	}

	*[Symbol.iterator](): IterableIterator<[ArchiveMember, string]> {
		for (const [member, entry] of this.entries) {
			yield [member, entry.name];
		}
	}

	/** Freezes offsets. Registration fails until {@link StringTable.release}. */
	finalize(): void {
		this.finalized = true;
		this.storedSize = null;
	}

	release(): void {
		this.finalized = false;
	}

	/** The table content as written to an archive. */
	encode(): Uint8Array {
		const chunks: Uint8Array[] = [];
		for (const entry of this.entries.values()) {
			chunks.push(entry.bytes, DELIMITER);
		}
		return concatBytes(chunks);
	}

	/**
	 * Reads the name stored at `nameOffset` within the loaded table content.
	 *
	 * @throws {ArchiveError} `INVALID_ARCHIVE` if no `/\n` follows the offset
	 * within the table.
	 */
	async resolve(source: ArchiveSource, nameOffset: number): Promise<string> {
		if (this.offset === null) {
			throw new ArchiveError(
				"SOURCE_UNAVAILABLE",
				"The string table was not read from an archive.",
			);
		}

		const start = this.offset + nameOffset;
		const end = this.offset + this.size;
		const chunks: Uint8Array[] = [];
		let scanned: Uint8Array = new Uint8Array(0);
		let position = start;

		while (position < end) {
			const chunk = await source.read(
				position,
				Math.min(SCAN_CHUNK_SIZE, end - position),
			);
			if (chunk.length === 0) break;

			chunks.push(chunk);
			// Step back one byte so a delimiter split across chunks is found.
			const from = scanned.length - 1;
			scanned = concatBytes(chunks);
			const index = indexOfDelimiter(scanned, from);
			if (index !== -1) {
				return trimName(this.codec.decode(scanned.subarray(0, index)));
			}

			position += chunk.length;
		}

		throw new ArchiveError(
			"INVALID_ARCHIVE",
			`Unterminated string table entry at offset ${nameOffset}.`,
			{ offset: start, expected: GNU_STRING_TABLE_DELIMITER },
		);
	}
}
