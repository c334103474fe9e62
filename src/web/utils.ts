export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/**
 * Strips whitespace and NUL padding from both ends of a name.
 */
export function trimName(value: string): string {
	return value.replace(/^[\s\0]+|[\s\0]+$/g, "");
}

/**
 * Returns true if the name contains any whitespace character.
 */
export function hasWhitespace(value: string): boolean {
	return /\s/.test(value);
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
	let totalLength = 0;
	for (const chunk of chunks) totalLength += chunk.length;

	const result = new Uint8Array(totalLength);
	let offset = 0;
	for (const chunk of chunks) {
		result.set(chunk, offset);
		offset += chunk.length;
	}

	return result;
}

/**
 * Renders bytes for error messages, escaping anything outside printable ASCII.
 */
export function describeBytes(bytes: Uint8Array): string {
	let result = "";
	for (const byte of bytes) {
		if (byte === 0x0a) result += "\\n";
		else if (byte >= 0x20 && byte < 0x7f) result += String.fromCharCode(byte);
		else result += `\\x${byte.toString(16).padStart(2, "0")}`;
	}
	return `"${result}"`;
}

/**
 * Reads an entire ReadableStream of Uint8Arrays into a single, combined Uint8Array.
 *
 * The easy way to do this is `new Response(stream).arrayBuffer()`, but we can be more
 * performant by buffering the chunks directly.
 */
export async function streamToBuffer(
	stream: ReadableStream<Uint8Array>,
): Promise<Uint8Array> {
	const chunks: Uint8Array[] = [];
	const reader = stream.getReader();

	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;

			chunks.push(value);
		}

		return concatBytes(chunks);
	} finally {
		reader.releaseLock();
	}
}
