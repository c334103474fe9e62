import type { TextCodec } from "./codec";
import { getTextCodec, isArchiveEncoding } from "./codec";
import {
	AR_MAGIC,
	AR_MAGIC_SIZE,
	BSD_SORTED_SUFFIX,
	BSD_SYMBOL_TABLE_NAME,
	DEBIAN_BINARY,
	DEBIAN_CONTROL_PREFIX,
	DEBIAN_DATA_PREFIX,
	DEFAULT_CHUNK_SIZE,
	DEFAULT_FILE_MODE,
	GNU_STRING_TABLE_NAME,
	HEADER_SIZE,
	PAD_BYTE,
} from "./constants";
import { ArchiveError } from "./errors";
import { decodeHeader, encodeHeader, readHeaderName } from "./header";
import type { ArchiveSink, ArchiveSource } from "./io";
import { BufferSource, isReadableSink } from "./io";
import type { Logger } from "./logger";
import { noopLogger } from "./logger";
import { StringTable } from "./string-table";
import {
	copyRange,
	createBytesStream,
	createOwnedRangeStream,
	createRangeStream,
	readExactly,
} from "./transfer";
import type {
	ArchiveEncoding,
	ArchiveFormat,
	ArchiveMember,
	ArchiveOptions,
	ArHeader,
	GnuShortMember,
	MemberInit,
	MemberMetadata,
	MemberOrigin,
	SymbolTable,
} from "./types";
import { describeBytes, encoder, streamToBuffer, trimName } from "./utils";
import type { HeaderContext, NewFileMatch } from "./variants";
import {
	classifyHeader,
	FIRST_HEADER_VARIANTS,
	HEADER_VARIANTS,
	inlineNameBytes,
	memberHeader,
	selectNewFileVariant,
	symbolTableHeader,
} from "./variants";

const MAGIC_BYTES = encoder.encode(AR_MAGIC);
const PAD = new Uint8Array([PAD_BYTE]);
const FORMATS: readonly ArchiveFormat[] = ["gnu", "bsd", "deb"];

function isArchiveFormat(value: unknown): value is ArchiveFormat {
	return FORMATS.some((format) => format === value);
}

/** Whether a member kind can be written into an archive of `format`. */
function fitsFormat(
	kind: ArchiveMember["kind"] | SymbolTable["kind"],
	format: ArchiveFormat,
): boolean {
	return kind.startsWith("gnu-") === (format === "gnu");
}

/**
 * Puts `debian-binary`, `control.tar*` and `data.tar*` first, followed by the
 * remaining members in their current order.
 */
function orderDebianMembers(members: readonly ArchiveMember[]): ArchiveMember[] {
	let binary: ArchiveMember | undefined;
	let control: ArchiveMember | undefined;
	let data: ArchiveMember | undefined;
	const extra: ArchiveMember[] = [];

	for (const member of members) {
		if (!binary && member.filename === DEBIAN_BINARY) {
			binary = member;
		} else if (!control && member.filename.startsWith(DEBIAN_CONTROL_PREFIX)) {
			control = member;
		} else if (!data && member.filename.startsWith(DEBIAN_DATA_PREFIX)) {
			data = member;
		} else {
			extra.push(member);
		}
	}

	if (!binary || !control || !data) {
		throw new ArchiveError(
			"INVALID_ARCHIVE",
			"Debian archives require debian-binary, control.tar(.*), and data.tar(.*).",
			{
				expected: "debian-binary, control.tar*, data.tar*",
				actual: members.map((m) => m.filename).join(", "),
			},
		);
	}

	return [binary, control, data, ...extra];
}

type MemberFields = Omit<GnuShortMember, "kind">;

function createMember(match: NewFileMatch, fields: MemberFields): ArchiveMember {
	switch (match.kind) {
		case "gnu-short":
			return { kind: "gnu-short", ...fields };
		case "gnu-long":
			return { kind: "gnu-long", ...fields };
		case "bsd-short":
			return { kind: "bsd-short", ...fields };
		case "bsd-long":
			return { kind: "bsd-long", ...fields, nameLength: match.nameLength };
		case "deb-short":
			return { kind: "deb-short", ...fields, uid: 0, gid: 0 };
	}
}

interface SavedLayout {
	members: ArchiveMember[];
	relocations: Map<ArchiveMember | SymbolTable, number>;
	strings: StringTable | null;
	stringsOffset: number | null;
}

export interface SymbolTableOptions extends Partial<MemberMetadata> {
	/** Mark a BSD symbol table as sorted (`__.SYMDEF SORTED`). */
	sorted?: boolean;
}

/**
 * One read/write session over a Unix `ar` archive.
 *
 * Loading fills the member list from a source; building adds members from
 * files or memory. Saving always rewrites the whole archive. Streams bound to
 * a session belong to it and are released by {@link Archive.close}, by the
 * next {@link Archive.load}, or on a failed load or save.
 *
 * @example
 * ```typescript
 * import { Archive, BufferSink, BufferSource } from 'ar-kit';
 *
 * const archive = new Archive({ format: 'bsd' });
 * archive.addContent('hello.txt', 'hello world\n');
 * archive.addContent('a_rather_long_file_name.txt', 'long\n');
 *
 * const sink = new BufferSink();
 * await archive.save(sink);
 *
 * const copy = new Archive();
 * await copy.load(new BufferSource(sink.toUint8Array()));
 * console.log(copy.format, copy.members.map((m) => m.filename));
 * ```
 */
export class Archive implements Iterable<ArchiveMember> {
	readonly encoding: ArchiveEncoding;

	private formatValue: ArchiveFormat | null;
	private memberList: ArchiveMember[] = [];
	private symbols: SymbolTable | null = null;
	private strings: StringTable | null = null;
	private input: ArchiveSource | null = null;
	private output: ArchiveSink | null = null;

	private readonly codec: TextCodec;
	private readonly logger: Logger;
	private readonly chunkSize: number;
	private readonly openFile?: (path: string) => Promise<ArchiveSource>;

	constructor(options: ArchiveOptions = {}) {
		const { format = "gnu", encoding = "utf-8" } = options;
		const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;

		if (!isArchiveFormat(format)) {
			throw new TypeError(`"${String(format)}" is not a valid archive format.`);
		}
		if (!isArchiveEncoding(encoding)) {
			throw new TypeError(`"${String(encoding)}" is not a supported encoding.`);
		}
		if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
			throw new TypeError(`Chunk size must be a positive integer, got ${chunkSize}.`);
		}

		this.formatValue = format;
		this.encoding = encoding;
		this.codec = getTextCodec(encoding);
		this.logger = options.logger ?? noopLogger;
		this.chunkSize = chunkSize;
		this.openFile = options.openFile;
	}

	/**
	 * The archive flavor.
	 *
	 * @throws {ArchiveError} `FORMAT_UNSET` before a load has classified a member.
	 */
	get format(): ArchiveFormat {
		if (this.formatValue === null) {
			throw new ArchiveError(
				"FORMAT_UNSET",
				"No archive format specified or detected.",
			);
		}
		return this.formatValue;
	}

	set format(value: ArchiveFormat) {
		if (!isArchiveFormat(value)) {
			throw new TypeError(`"${String(value)}" is not a valid archive format.`);
		}
		this.formatValue = value;
	}

	/** Regular members in archive order. */
	get members(): readonly ArchiveMember[] {
		return this.memberList;
	}

	get length(): number {
		return this.memberList.length;
	}

	get symbolTable(): SymbolTable | null {
		return this.symbols;
	}

	get stringTable(): StringTable | null {
		return this.strings;
	}

	[Symbol.iterator](): Iterator<ArchiveMember> {
		return this.memberList[Symbol.iterator]();
	}

	toString(): string {
		const format = this.formatValue?.toUpperCase() ?? "(none)";
		return `Archive(format=${format}, members=${this.memberList.length})`;
	}

	/**
	 * Reads an archive, replacing everything this session held before.
	 *
	 * The source stays bound so member payloads can be read later. Streams
	 * bound before are closed unless `source` is one of them. If loading
	 * fails, the source is closed before the error is rethrown.
	 *
	 * @throws {ArchiveError} `INVALID_ARCHIVE` for a bad magic, pad byte, or
	 * string table; `UNKNOWN_MEMBER` for a header no variant accepts.
	 */
	async load(source: ArchiveSource): Promise<void> {
		await this.release(source);
		this.reset();
		this.input = source;
		this.logger.debug("Loading archive");

		try {
			await this.readMagic(source);

			let position = AR_MAGIC_SIZE;
			while (true) {
				const end = await this.readMember(source, position);
				if (end === null) break;

				position = end;
				if (position % 2 === 1) {
					const padding = await source.read(position, 1);
					if (padding.length !== 1 || padding[0] !== PAD_BYTE) {
						throw new ArchiveError(
							"INVALID_ARCHIVE",
							`Invalid padding at offset ${position}: ${describeBytes(padding)} (expected "\\n").`,
							{ offset: position, expected: "\\n", actual: describeBytes(padding) },
						);
					}
					position += 1;
				}
			}

			this.detectDebian();
		} catch (error) {
			this.input = null;
			this.reset();
			await this.closeQuietly(source);
			throw error;
		}

		this.logger.debug("Loaded archive", {
			format: this.formatValue,
			members: this.memberList.length,
			symbolTable: this.symbols !== null,
			stringTable: this.strings !== null,
		});
	}

	/**
	 * Writes the whole archive to `sink`.
	 *
	 * The string table is finalized first. For Debian packages the members are
	 * reordered to `debian-binary`, `control.tar*`, `data.tar*`, then the rest.
	 * After a successful save every payload lives in `sink`, which becomes the
	 * bound input if it can be read. If saving fails, the sink is closed before
	 * the error is rethrown.
	 *
	 * @throws {ArchiveError} `INVALID_ARCHIVE` if a Debian package lacks one of
	 * its three required members.
	 */
	async save(sink: ArchiveSink): Promise<void> {
		let layout: SavedLayout;

		try {
			layout = await this.writeArchive(sink);
		} catch (error) {
			await this.closeQuietly(sink);
			throw error;
		}

		// Every payload now lives in the sink.
		for (const [member, offset] of layout.relocations) {
			member.origin = { type: "archive", offset };
		}
		if (layout.strings) layout.strings.offset = layout.stringsOffset;
		this.memberList = layout.members;

		const previous = [this.input, this.output];
		this.input = isReadableSink(sink) ? sink : null;
		this.output = sink;
		for (const stream of new Set(previous)) {
			if (stream && stream !== sink) await stream.close();
		}

		this.logger.debug("Saved archive", {
			format: this.formatValue,
			members: layout.members.length,
			size: sink.position,
		});
	}

	/**
	 * Adds a member using the first variant of the archive's format that can
	 * represent its name.
	 *
	 * @throws {ArchiveError} `UNSUPPORTED_MEMBER` if no variant can, which
	 * happens for names that need a long form in a Debian package.
	 */
	add(init: MemberInit): ArchiveMember {
		const format = this.format;
		const name = trimName(init.name);

		if (name.length === 0) {
			throw new ArchiveError("UNSUPPORTED_MEMBER", "Member names cannot be empty.", {
				member: init.name,
			});
		}

		const base: MemberFields = {
			filename: name,
			date: init.date,
			uid: init.uid,
			gid: init.gid,
			mode: init.mode,
			filesize: init.size,
			origin: init.origin,
		};

		const member = createMember(
			selectNewFileVariant(name, format, this.codec, this.logger),
			base,
		);
		if (member.kind === "gnu-long") {
			this.ensureStringTable().register(member, name);
		}

		this.memberList.push(member);
		this.logger.debug("Added member", {
			kind: member.kind,
			filename: member.filename,
			size: member.filesize,
			origin: member.origin.type,
		});

		return member;
	}

	/**
	 * Adds a member whose payload is held in memory.
	 *
	 * @example
	 * ```typescript
	 * archive.addContent('debian-binary', '2.0\n');
	 * ```
	 */
	addContent(
		name: string,
		content: string | Uint8Array,
		metadata: Partial<MemberMetadata> = {},
	): ArchiveMember {
		const data = typeof content === "string" ? this.codec.encode(content) : content;

		return this.add({
			name,
			date: metadata.date ?? Math.floor(Date.now() / 1000),
			uid: metadata.uid ?? 0,
			gid: metadata.gid ?? 0,
			mode: metadata.mode ?? DEFAULT_FILE_MODE,
			size: data.length,
			origin: { type: "content", data },
		});
	}

	/**
	 * Returns the first member called `filename`.
	 *
	 * @throws {ArchiveError} `MEMBER_NOT_FOUND` if there is none.
	 */
	get(filename: string): ArchiveMember {
		const member = this.memberList.find((m) => m.filename === filename);
		if (!member) {
			throw new ArchiveError(
				"MEMBER_NOT_FOUND",
				`No member named "${filename}".`,
				{ member: filename },
			);
		}
		return member;
	}

	has(filename: string): boolean {
		return this.memberList.some((m) => m.filename === filename);
	}

	/**
	 * Removes a member, or the first member called `filename`, along with its
	 * string table entry.
	 */
	remove(target: ArchiveMember | string): ArchiveMember {
		const member = typeof target === "string" ? this.get(target) : target;
		const index = this.memberList.indexOf(member);
		if (index === -1) {
			throw new ArchiveError(
				"MEMBER_NOT_FOUND",
				`Member "${member.filename}" is not part of this archive.`,
				{ member: member.filename },
			);
		}

		this.memberList.splice(index, 1);
		this.strings?.delete(member);
		this.logger.debug("Removed member", { filename: member.filename });

		return member;
	}

	/**
	 * Returns the string table, creating it on first use. Only GNU archives
	 * have one.
	 */
	ensureStringTable(): StringTable {
		if (this.format !== "gnu") {
			throw new ArchiveError(
				"UNSUPPORTED_MEMBER",
				`${this.format.toUpperCase()} archives have no string table.`,
			);
		}
		if (!this.strings) {
			this.strings = new StringTable(this.codec);
			this.logger.debug("Created string table");
		}
		return this.strings;
	}

	/**
	 * Sets the symbol table to an opaque blob, replacing any existing one.
	 */
	setSymbolTable(
		content: Uint8Array,
		options: SymbolTableOptions = {},
	): SymbolTable {
		const metadata = {
			date: options.date ?? Math.floor(Date.now() / 1000),
			uid: options.uid ?? 0,
			gid: options.gid ?? 0,
			mode: options.mode ?? DEFAULT_FILE_MODE,
			filesize: content.length,
			origin: { type: "content", data: content } satisfies MemberOrigin,
		};

		if (this.format === "gnu") {
			this.symbols = { kind: "gnu-symbol-table", ...metadata };
		} else {
			const sorted = options.sorted ?? false;
			const symbolName = sorted
				? `${BSD_SYMBOL_TABLE_NAME} ${BSD_SORTED_SUFFIX}`
				: BSD_SYMBOL_TABLE_NAME;

			this.symbols = {
				kind: "bsd-symbol-table",
				...metadata,
				symbolName,
				sorted,
				inline: sorted,
				nameLength: sorted ? this.codec.encode(symbolName).length : 0,
			};
		}

		return this.symbols;
	}

	removeSymbolTable(): void {
		this.symbols = null;
	}

	/**
	 * Streams a payload in bounded chunks, from wherever it currently lives.
	 */
	read(member: ArchiveMember | SymbolTable): ReadableStream<Uint8Array> {
		const { origin, filesize } = member;

		switch (origin.type) {
			case "archive":
				return createRangeStream(
					this.requireInput(),
					origin.offset,
					filesize,
					this.chunkSize,
				);
			case "file":
				return createOwnedRangeStream(
					() => this.openExternal(origin.path),
					0,
					filesize,
					this.chunkSize,
				);
			case "content":
				return createBytesStream(
					origin.data.subarray(0, filesize),
					this.chunkSize,
				);
		}
	}

	/** Reads a whole payload into memory. */
	async bytes(member: ArchiveMember | SymbolTable): Promise<Uint8Array> {
		return streamToBuffer(this.read(member));
	}

	/** Releases the streams bound to this session. */
	async close(): Promise<void> {
		await this.release(null);
	}

	/** Unbinds both streams and closes them, except `keep`. */
	private async release(keep: ArchiveSource | null): Promise<void> {
		const streams = new Set([this.input, this.output]);
		this.input = null;
		this.output = null;

		for (const stream of streams) {
			if (stream && stream !== keep) await stream.close();
		}
	}

	private reset(): void {
		this.formatValue = null;
		this.memberList = [];
		this.symbols = null;
		this.strings = null;
	}

	private async closeQuietly(stream: ArchiveSource | ArchiveSink): Promise<void> {
		try {
			await stream.close();
		} catch (error) {
			this.logger.warn("Failed to close stream", {
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}

	private requireInput(): ArchiveSource {
		if (!this.input) {
			throw new ArchiveError(
				"SOURCE_UNAVAILABLE",
				"No readable stream is bound to this archive.",
			);
		}
		return this.input;
	}

	private async openExternal(path: string): Promise<ArchiveSource> {
		if (!this.openFile) {
			throw new ArchiveError(
				"SOURCE_UNAVAILABLE",
				`Cannot open "${path}": this archive has no file opener.`,
				{ member: path },
			);
		}
		return this.openFile(path);
	}

	private async readMagic(source: ArchiveSource): Promise<void> {
		const magic = await source.read(0, AR_MAGIC_SIZE);
		const matches =
			magic.length === AR_MAGIC_SIZE &&
			magic.every((byte, i) => byte === MAGIC_BYTES[i]);

		if (!matches) {
			throw new ArchiveError(
				"INVALID_ARCHIVE",
				`Invalid magic: ${describeBytes(magic)} (${magic.length}) (expected ${describeBytes(MAGIC_BYTES)} (${AR_MAGIC_SIZE})).`,
				{
					offset: 0,
					expected: describeBytes(MAGIC_BYTES),
					actual: describeBytes(magic),
				},
			);
		}
	}

	/**
	 * Classifies and files the member whose header starts at `position`.
	 * Returns the offset just past its payload, or `null` at the end of the
	 * archive.
	 */
	private async readMember(
		source: ArchiveSource,
		position: number,
	): Promise<number | null> {
		const block = await source.read(position, HEADER_SIZE);
		if (block.length < HEADER_SIZE) return null;

		const rawName = readHeaderName(block, this.codec);
		const header = decodeHeader(block, this.codec, {
			lenient: rawName === GNU_STRING_TABLE_NAME,
			offset: position,
		});

		const headerEnd = position + HEADER_SIZE;
		const context: HeaderContext = {
			codec: this.codec,
			format: this.formatValue,
			readInline: (length) => readExactly(source, headerEnd, length),
		};
		const candidates =
			this.formatValue === null
				? FIRST_HEADER_VARIANTS
				: HEADER_VARIANTS[this.formatValue];

		const { variant, match } = await classifyHeader(
			rawName,
			context,
			candidates,
			this.logger,
			position,
		);
		this.formatValue ??= variant.family;

		const nameLength =
			match.kind === "bsd-long" || match.kind === "bsd-symbol-table"
				? match.nameLength
				: 0;
		const payloadOffset = headerEnd + nameLength;
		const filesize = header.size - nameLength;

		if (filesize < 0) {
			throw new ArchiveError(
				"INVALID_ARCHIVE",
				`Member "${rawName}" is smaller (${header.size}) than its inline name (${nameLength}).`,
				{ offset: position, member: rawName },
			);
		}

		const end = payloadOffset + filesize;
		if (filesize > 0) await readExactly(source, end - 1, 1);

		const metadata = {
			date: header.date,
			uid: header.uid,
			gid: header.gid,
			mode: header.mode,
			filesize,
			origin: { type: "archive", offset: payloadOffset } satisfies MemberOrigin,
		};

		switch (match.kind) {
			case "gnu-symbol-table":
				this.fileSymbolTable({ kind: "gnu-symbol-table", ...metadata }, position);
				break;

			case "bsd-symbol-table":
				this.fileSymbolTable(
					{
						kind: "bsd-symbol-table",
						...metadata,
						symbolName: match.symbolName,
						sorted: match.sorted,
						inline: match.inline,
						nameLength: match.nameLength,
					},
					position,
				);
				break;

			case "gnu-string-table":
				if (this.strings) {
					throw new ArchiveError(
						"INVALID_ARCHIVE",
						`Second string table at offset ${position}.`,
						{ offset: position },
					);
				}
				this.strings = StringTable.fromHeader(header, payloadOffset, this.codec);
				this.logger.debug("Read string table", {
					offset: position,
					size: header.size,
				});
				break;

			case "gnu-long": {
				if (!this.strings) {
					throw new ArchiveError(
						"INVALID_ARCHIVE",
						`Long name reference "${rawName}" at offset ${position} precedes the string table.`,
						{ offset: position, member: rawName },
					);
				}
				const filename = await this.strings.resolve(source, match.nameOffset);
				const member: ArchiveMember = { kind: "gnu-long", filename, ...metadata };
				this.strings.attach(member, filename);
				this.fileMember(member, position, header);
				break;
			}

			case "gnu-short":
				this.fileMember(
					{ kind: "gnu-short", filename: match.filename, ...metadata },
					position,
					header,
				);
				break;

			case "bsd-short":
				this.fileMember(
					{ kind: "bsd-short", filename: match.filename, ...metadata },
					position,
					header,
				);
				break;

			case "deb-short":
				this.fileMember(
					{ kind: "deb-short", filename: match.filename, ...metadata },
					position,
					header,
				);
				break;

			case "bsd-long":
				this.fileMember(
					{
						kind: "bsd-long",
						filename: match.filename,
						nameLength: match.nameLength,
						...metadata,
					},
					position,
					header,
				);
				break;
		}

		return end;
	}

	private fileMember(
		member: ArchiveMember,
		position: number,
		header: ArHeader,
	): void {
		this.memberList.push(member);
		this.logger.debug("Read member", {
			kind: member.kind,
			name: header.name,
			filename: member.filename,
			offset: position,
			size: header.size,
		});
	}

	private fileSymbolTable(table: SymbolTable, position: number): void {
		if (this.symbols) {
			this.logger.warn("Replacing earlier symbol table", { offset: position });
		}
		this.symbols = table;
		this.logger.debug("Read symbol table", {
			kind: table.kind,
			offset: position,
			size: table.filesize,
		});
	}

	/**
	 * A BSD archive whose first member is `debian-binary` is a Debian package.
	 * Only the position of that member is considered; `save` orders by name.
	 */
	private detectDebian(): void {
		if (
			this.formatValue !== "bsd" ||
			this.memberList[0]?.filename !== DEBIAN_BINARY
		) {
			return;
		}

		this.formatValue = "deb";
		this.memberList = this.memberList.map((member): ArchiveMember =>
			member.kind === "bsd-short"
				? { ...member, kind: "deb-short" }
				: member,
		);
		this.logger.debug("Detected Debian package");
	}

	/**
	 * Writes every unit to `sink` without touching member origins, so a
	 * failure leaves the session as it was.
	 */
	private async writeArchive(sink: ArchiveSink): Promise<SavedLayout> {
		const format = this.format;
		const members =
			format === "deb" ? orderDebianMembers(this.memberList) : this.memberList;

		for (const member of [...members, ...(this.symbols ? [this.symbols] : [])]) {
			if (!fitsFormat(member.kind, format)) {
				throw new ArchiveError(
					"INVALID_ARCHIVE",
					`A ${member.kind} member cannot be written to a ${format.toUpperCase()} archive.`,
					{ member: "filename" in member ? member.filename : member.kind },
				);
			}
		}

		const strings = format === "gnu" ? this.strings : null;
		const relocations = new Map<ArchiveMember | SymbolTable, number>();
		let stringsOffset: number | null = null;

		if (format === "deb") {
			this.logger.debug("Ordered Debian members", {
				members: members.map((m) => m.filename),
			});
		}
		this.logger.debug("Saving archive", { format, members: members.length });

		strings?.finalize();
		try {
			await sink.write(MAGIC_BYTES);

			if (this.symbols) {
				relocations.set(
					this.symbols,
					await this.writeUnit(
						sink,
						symbolTableHeader(this.symbols),
						inlineNameBytes(this.symbols, this.codec),
						this.symbols.origin,
						this.symbols.filesize,
					),
				);
			}

			if (strings && strings.length > 0) {
				const content = strings.encode();
				stringsOffset = await this.writeUnit(
					sink,
					{
						name: GNU_STRING_TABLE_NAME,
						date: strings.date,
						uid: strings.uid,
						gid: strings.gid,
						mode: strings.mode,
						size: content.length,
					},
					null,
					{ type: "content", data: content },
					content.length,
				);
			}

			for (const member of members) {
				const offset = await this.writeUnit(
					sink,
					memberHeader(member, strings),
					inlineNameBytes(member, this.codec),
					member.origin,
					member.filesize,
				);
				relocations.set(member, offset);
				this.logger.debug("Wrote member", {
					kind: member.kind,
					filename: member.filename,
					offset,
				});
			}
		} finally {
			strings?.release();
		}

		return { members, relocations, strings, stringsOffset };
	}

	/**
	 * Writes header, inline name, payload and padding. Returns the offset of
	 * the payload in `sink`.
	 */
	private async writeUnit(
		sink: ArchiveSink,
		header: ArHeader,
		inlineName: Uint8Array | null,
		origin: MemberOrigin,
		filesize: number,
	): Promise<number> {
		await sink.write(encodeHeader(header, this.codec));
		if (inlineName) await sink.write(inlineName);

		const offset = sink.position;
		await this.copyPayload(origin, filesize, sink);

		if (sink.position % 2 === 1) await sink.write(PAD);
		return offset;
	}

	private async copyPayload(
		origin: MemberOrigin,
		filesize: number,
		sink: ArchiveSink,
	): Promise<void> {
		switch (origin.type) {
			case "archive":
				await copyRange(
					this.requireInput(),
					origin.offset,
					filesize,
					sink,
					this.chunkSize,
				);
				break;

			case "file": {
				const file = await this.openExternal(origin.path);
				try {
					await copyRange(file, 0, filesize, sink, this.chunkSize);
				} finally {
					await file.close();
				}
				break;
			}

			case "content":
				await copyRange(
					new BufferSource(origin.data),
					0,
					filesize,
					sink,
					this.chunkSize,
				);
				break;
		}
	}
}
