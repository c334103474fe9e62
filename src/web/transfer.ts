import { DEFAULT_CHUNK_SIZE } from "./constants";
import { ArchiveError } from "./errors";
import type { ArchiveSink, ArchiveSource } from "./io";

/**
 * Reads exactly `length` bytes at `position`.
 *
 * @throws {ArchiveError} `INVALID_ARCHIVE` if the source ends first.
 */
export async function readExactly(
	source: ArchiveSource,
	position: number,
	length: number,
): Promise<Uint8Array> {
	const chunk = await source.read(position, length);
	if (chunk.length < length) {
		throw new ArchiveError(
			"INVALID_ARCHIVE",
			`Archive is truncated: expected ${length} bytes at offset ${position}, got ${chunk.length}.`,
			{ offset: position, expected: String(length), actual: String(chunk.length) },
		);
	}
	return chunk;
}

/**
 * Copies `length` bytes starting at `offset` in `source` to `sink`, at most
 * `chunkSize` bytes at a time.
 *
 * @throws {ArchiveError} `INVALID_ARCHIVE` if the source ends early.
 */
export async function copyRange(
	source: ArchiveSource,
	offset: number,
	length: number,
	sink: ArchiveSink,
	chunkSize: number = DEFAULT_CHUNK_SIZE,
): Promise<void> {
	let position = offset;
	let remaining = length;

	while (remaining > 0) {
		const size = Math.min(remaining, chunkSize);
		await sink.write(await readExactly(source, position, size));
		position += size;
		remaining -= size;
	}
}

/**
 * Exposes a byte range of `source` as a pull-based `ReadableStream`, reading
 * at most `chunkSize` bytes per pull.
 *
 * @example
 * ```typescript
 * const stream = createRangeStream(source, member.origin.offset, member.filesize);
 * await stream.pipeTo(destination);
 * ```
 */
export function createRangeStream(
	source: ArchiveSource,
	offset: number,
	length: number,
	chunkSize: number = DEFAULT_CHUNK_SIZE,
): ReadableStream<Uint8Array> {
	let position = offset;
	let remaining = length;

	return new ReadableStream<Uint8Array>({
		async pull(controller) {
			if (remaining === 0) {
				controller.close();
				return;
			}

			const size = Math.min(remaining, chunkSize);
			// Copy, since sources may hand out views of a buffer they reuse.
			controller.enqueue(new Uint8Array(await readExactly(source, position, size)));
			position += size;
			remaining -= size;

			if (remaining === 0) controller.close();
		},
	});
}

/**
 * Exposes an in-memory payload as a `ReadableStream` in bounded chunks.
 */
export function createBytesStream(
	data: Uint8Array,
	chunkSize: number = DEFAULT_CHUNK_SIZE,
): ReadableStream<Uint8Array> {
	let position = 0;

	return new ReadableStream<Uint8Array>({
		pull(controller) {
			if (position >= data.length) {
				controller.close();
				return;
			}

			const end = Math.min(data.length, position + chunkSize);
			controller.enqueue(new Uint8Array(data.subarray(position, end)));
			position = end;

			if (position >= data.length) controller.close();
		},
	});
}

/**
 * Like {@link createRangeStream}, but opens the source on the first pull and
 * closes it once the range is read, the stream is cancelled, or a read fails.
 */
export function createOwnedRangeStream(
	open: () => Promise<ArchiveSource>,
	offset: number,
	length: number,
	chunkSize: number = DEFAULT_CHUNK_SIZE,
): ReadableStream<Uint8Array> {
	let source: ArchiveSource | null = null;
	let position = offset;
	let remaining = length;

	const release = async () => {
		const opened = source;
		source = null;
		await opened?.close();
	};

	return new ReadableStream<Uint8Array>({
		async pull(controller) {
			try {
				source ??= await open();

				if (remaining > 0) {
					const size = Math.min(remaining, chunkSize);
					controller.enqueue(
						new Uint8Array(await readExactly(source, position, size)),
					);
					position += size;
					remaining -= size;
				}

				if (remaining === 0) {
					await release();
					controller.close();
				}
			} catch (error) {
				await release();
				throw error;
			}
		},
		async cancel() {
			await release();
		},
	});
}

/**
 * Writes every chunk of `stream` to `sink`. The stream is cancelled if a
 * write fails.
 */
export async function writeStream(
	stream: ReadableStream<Uint8Array>,
	sink: ArchiveSink,
): Promise<void> {
	const reader = stream.getReader();

	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;

			try {
				await sink.write(value);
			} catch (error) {
				await reader.cancel(error);
				throw error;
			}
		}
	} finally {
		reader.releaseLock();
	}
}
