/** Windows batch files are written with CRLF line endings. */
export function toBatch(lines: string[]): string {
	return `${lines.join("\r\n")}\r\n`;
}
