import type { FileHandle } from "node:fs/promises";
import * as fs from "node:fs/promises";
import type { ArchiveSource, ReadableSink } from "../web/index";

async function readAt(
	handle: FileHandle,
	position: number,
	length: number,
): Promise<Uint8Array> {
	const buffer = new Uint8Array(length);
	let filled = 0;

	// A single read may return less than requested before end of file.
	while (filled < length) {
		const { bytesRead } = await handle.read(
			buffer,
			filled,
			length - filled,
			position + filled,
		);
		if (bytesRead === 0) break;
		filled += bytesRead;
	}

	return filled === length ? buffer : buffer.subarray(0, filled);
}

/**
 * Random-access source over a file on disk.
 */
export class FileSource implements ArchiveSource {
	private closed = false;

	private constructor(
		readonly path: string,
		private readonly handle: FileHandle,
	) {}

	static async open(path: string): Promise<FileSource> {
		return new FileSource(path, await fs.open(path, "r"));
	}

	read(position: number, length: number): Promise<Uint8Array> {
		return readAt(this.handle, position, length);
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await this.handle.close();
	}
}

/**
 * Sink writing to a file on disk, truncated on open. The file stays readable,
 * so an archive saved here keeps reading its members from it.
 */
export class FileSink implements ReadableSink {
	private written = 0;
	private closed = false;

	private constructor(
		readonly path: string,
		private readonly handle: FileHandle,
	) {}

	static async open(path: string, mode?: number): Promise<FileSink> {
		return new FileSink(path, await fs.open(path, "w+", mode));
	}

	get position(): number {
		return this.written;
	}

	async write(chunk: Uint8Array): Promise<void> {
		let offset = 0;
		while (offset < chunk.length) {
			const { bytesWritten } = await this.handle.write(
				chunk,
				offset,
				chunk.length - offset,
				this.written,
			);
			offset += bytesWritten;
			this.written += bytesWritten;
		}
	}

	read(position: number, length: number): Promise<Uint8Array> {
		return readAt(this.handle, position, length);
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await this.handle.close();
	}
}
