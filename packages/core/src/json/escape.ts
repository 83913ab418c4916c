/**
 * Escape a string for embedding between JSON double quotes.
 *
 * Only `"`, `\` and code units below 0x20 are rewritten; everything else,
 * non-ASCII included, is emitted as-is.
 */
export function escapeJsonString(input: string): string {
	let out = "";
	for (let i = 0; i < input.length; i++) {
		const code = input.charCodeAt(i);
		switch (code) {
			case 0x22:
				out += '\\"';
				break;
			case 0x5c:
				out += "\\\\";
				break;
			case 0x08:
				out += "\\b";
				break;
			case 0x0c:
				out += "\\f";
				break;
			case 0x0a:
				out += "\\n";
				break;
			case 0x0d:
				out += "\\r";
				break;
			case 0x09:
				out += "\\t";
				break;
			default:
				out += code < 0x20 ? `\\u${code.toString(16).padStart(4, "0")}` : input.charAt(i);
		}
	}
	return out;
}
