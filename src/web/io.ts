/**
 * Random-access byte source an archive is loaded from.
 *
 * `read` returns fewer than `length` bytes only at the end of the source.
 */
export interface ArchiveSource {
	read(position: number, length: number): Promise<Uint8Array>;
	close(): Promise<void>;
}

/**
 * Sequential byte sink an archive is saved to. `position` is the number of
 * bytes written so far.
 */
export interface ArchiveSink {
	readonly position: number;
	write(chunk: Uint8Array): Promise<void>;
	close(): Promise<void>;
}

/** A sink whose written bytes can be read back. */
export type ReadableSink = ArchiveSink & ArchiveSource;

export function isReadableSink(sink: ArchiveSink): sink is ReadableSink {
	return "read" in sink && typeof sink.read === "function";
}

/**
 * Source over an in-memory buffer.
 */
export class BufferSource implements ArchiveSource {
	constructor(private readonly data: Uint8Array) {}

	async read(position: number, length: number): Promise<Uint8Array> {
		const start = Math.min(position, this.data.length);
		const end = Math.min(this.data.length, start + length);
		return this.data.subarray(start, end);
	}

	async close(): Promise<void> {
		return;
	}
}

/**
 * Growable in-memory sink. The written bytes are available through
 * {@link BufferSink.toUint8Array} and can be read back as a source.
 */
export class BufferSink implements ReadableSink {
	private buffer: Uint8Array = new Uint8Array(1024);
	private length = 0;

	get position(): number {
		return this.length;
	}

	async write(chunk: Uint8Array): Promise<void> {
		if (chunk.length === 0) return;

		const required = this.length + chunk.length;
		if (required > this.buffer.length) {
			const grown = new Uint8Array(Math.max(required, this.buffer.length * 2));
			grown.set(this.buffer.subarray(0, this.length));
			this.buffer = grown;
		}

		this.buffer.set(chunk, this.length);
		this.length = required;
	}

	async read(position: number, length: number): Promise<Uint8Array> {
		const start = Math.min(position, this.length);
		const end = Math.min(this.length, start + length);
		return this.buffer.subarray(start, end);
	}

	/** Copy of everything written so far. */
	toUint8Array(): Uint8Array {
		return this.buffer.slice(0, this.length);
	}

	async close(): Promise<void> {
		return;
	}
}
