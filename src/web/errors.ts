/** Stable archive error codes. */
export type ArchiveErrorCode =
	| "INVALID_ARCHIVE"
	| "INVALID_HEADER_FIELD"
	| "UNKNOWN_MEMBER"
	| "AMBIGUOUS_MEMBER"
	| "UNSUPPORTED_MEMBER"
	| "FORMAT_UNSET"
	| "MEMBER_NOT_FOUND"
	| "SOURCE_UNAVAILABLE";

export interface ArchiveErrorOptions {
	/** Byte position in the stream where the problem was found. */
	offset?: number;
	/** Logical or raw name of the member involved. */
	member?: string;
	expected?: string;
	actual?: string;
	cause?: unknown;
}

/** Error thrown for archive parsing, validation, and write failures. */
export class ArchiveError extends Error {
	/** Machine-readable error code. */
	readonly code: ArchiveErrorCode;
	readonly offset?: number;
	readonly member?: string;
	readonly expected?: string;
	readonly actual?: string;

	constructor(
		code: ArchiveErrorCode,
		message: string,
		options: ArchiveErrorOptions = {},
	) {
		super(
			message,
			options.cause === undefined ? undefined : { cause: options.cause },
		);
		this.name = "ArchiveError";
		this.code = code;
		this.offset = options.offset;
		this.member = options.member;
		this.expected = options.expected;
		this.actual = options.actual;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			offset: this.offset,
			member: this.member,
			expected: this.expected,
			actual: this.actual,
		};
	}
}

export function isArchiveError(
	error: unknown,
	code?: ArchiveErrorCode,
): error is ArchiveError {
	return (
		error instanceof ArchiveError && (code === undefined || error.code === code)
	);
}
