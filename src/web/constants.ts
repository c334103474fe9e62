/** Global archive signature, written once at offset 0. */
export const AR_MAGIC = "!<arch>\n";

/** Size of the global archive signature in bytes. */
export const AR_MAGIC_SIZE = 8;

/** Size of a member header in bytes. */
export const HEADER_SIZE = 60;

/** Trailer closing every member header. */
export const HEADER_TERMINATOR = "`\n";

/** Byte appended after a member whose payload ends on an odd offset. */
export const PAD_BYTE = 0x0a;

/** Reference chunk size for bounded payload copies. */
export const DEFAULT_CHUNK_SIZE = 65535;

/** Default permissions for members created without a source file (rw-r--r-- regular file). */
export const DEFAULT_FILE_MODE = 0o100644;

/** Width of the header name field; longer names need an indirect encoding. */
export const NAME_FIELD_SIZE = 16;

/** Offsets and sizes of fields in a member header.
 *
 * @see https://www.freebsd.org/cgi/man.cgi?query=ar&sektion=5
 */
export const AR_HEADER = {
	name: { offset: 0, size: 16 },
	date: { offset: 16, size: 12 },
	uid: { offset: 28, size: 6 },
	gid: { offset: 34, size: 6 },
	mode: { offset: 40, size: 8 },
	size: { offset: 48, size: 10 },
	terminator: { offset: 58, size: 2 },
} as const;

/** GNU symbol table member name. */
export const GNU_SYMBOL_TABLE_NAME = "/";

/** GNU string table member name. */
export const GNU_STRING_TABLE_NAME = "//";

/** Suffix closing a GNU short name and every GNU string table entry. */
export const GNU_NAME_TERMINATOR = "/";

/** Delimiter after each name in the GNU string table. */
export const GNU_STRING_TABLE_DELIMITER = "/\n";

/** Prefix of a BSD name whose bytes follow the header. */
export const BSD_INLINE_NAME_PREFIX = "#1/";

/** BSD symbol table member name. */
export const BSD_SYMBOL_TABLE_NAME = "__.SYMDEF";

/** Suffix marking a BSD symbol table as sorted. */
export const BSD_SORTED_SUFFIX = "SORTED";

/** Name of the first member of a Debian package. */
export const DEBIAN_BINARY = "debian-binary";

/** Name prefixes of the second and third members of a Debian package. */
export const DEBIAN_CONTROL_PREFIX = "control.tar";
export const DEBIAN_DATA_PREFIX = "data.tar";
