export {
	addFile,
	createArchive,
	loadArchive,
	saveArchive,
} from "./archive";
export { extractAll, extractMember } from "./extract";
export { FileSink, FileSource } from "./file";
export type {
	AddFileOptionsFS,
	ArchiveOptionsFS,
	ExtractOptionsFS,
} from "./types";
