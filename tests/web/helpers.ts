/** Runs `fn` and returns what it throws. */
export function thrown(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error("Expected the call to throw.");
}
