export { Archive, type SymbolTableOptions } from "./archive";
export { getTextCodec, type TextCodec } from "./codec";
export {
	AR_MAGIC,
	DEFAULT_CHUNK_SIZE,
	DEFAULT_FILE_MODE,
	HEADER_SIZE,
} from "./constants";
export {
	ArchiveError,
	type ArchiveErrorCode,
	type ArchiveErrorOptions,
	isArchiveError,
} from "./errors";
export { decodeHeader, encodeHeader } from "./header";
export {
	type ArchiveSink,
	type ArchiveSource,
	BufferSink,
	BufferSource,
	isReadableSink,
	type ReadableSink,
} from "./io";
export {
	createLogger,
	type LogEntry,
	type Logger,
	type LoggerOptions,
	type LogLevel,
	noopLogger,
} from "./logger";
export { StringTable } from "./string-table";
export { copyRange, createRangeStream, writeStream } from "./transfer";
export type {
	ArchiveEncoding,
	ArchiveFormat,
	ArchiveMember,
	ArchiveOptions,
	ArHeader,
	BsdLongMember,
	BsdShortMember,
	BsdSymbolTable,
	DebShortMember,
	GnuLongMember,
	GnuShortMember,
	GnuSymbolTable,
	MemberInit,
	MemberKind,
	MemberMetadata,
	MemberOrigin,
	SymbolTable,
} from "./types";
export type { Classification, MemberVariant } from "./variants";
