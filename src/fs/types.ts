import type {
	ArchiveMember,
	ArchiveOptions,
	Logger,
	MemberMetadata,
} from "../web/index";

/** Archive options for the filesystem layer, which supplies its own file opener. */
export type ArchiveOptionsFS = Omit<ArchiveOptions, "openFile">;

/**
 * Overrides for a member added from disk. Anything left out is taken from the
 * file's `stat`.
 */
export interface AddFileOptionsFS extends Partial<MemberMetadata> {
	/** Member name. Defaults to the file's base name. */
	name?: string;
}

export interface ExtractOptionsFS {
	/** Extract only members for which this returns true. */
	filter?: (member: ArchiveMember) => boolean;
	/** File mode to apply instead of the member's permission bits. */
	fmode?: number;
	/**
	 * Apply the member's uid and gid. Failures (usually missing privileges) are
	 * logged and ignored. Defaults to `true`.
	 */
	preserveOwner?: boolean;
	logger?: Logger;
}
