export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/** Decodes bytes one-to-one into a string, as header fields are. */
export function decodeLatin1(bytes: Uint8Array): string {
	let out = "";
	for (const byte of bytes) out += String.fromCharCode(byte);
	return out;
}

/** Removes a trailing `\r\n` or `\n` from a decoded line. */
export function stripLineEnding(line: string): string {
	if (line.endsWith("\r\n")) return line.slice(0, -2);
	if (line.endsWith("\n")) return line.slice(0, -1);
	return line;
}

/** Joins chunks into a single array. */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
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

/** Whether `bytes` begins with the bytes of `prefix`. */
export function startsWith(
	bytes: Uint8Array,
	prefix: ArrayLike<number>,
): boolean {
	if (bytes.length < prefix.length) return false;
	for (let i = 0; i < prefix.length; i++) {
		if (bytes[i] !== prefix[i]) return false;
	}
	return true;
}
