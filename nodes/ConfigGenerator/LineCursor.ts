/**
 * Forward-only line source shared by the directive dispatcher and every
 * block reader. Each `for...of` over the cursor resumes where the last one
 * stopped, and a line handed out once is never handed out again.
 */
export class LineCursor implements Iterable<string> {
	private position = 0;

	constructor(private readonly lines: readonly string[]) {}

	/**
	 * Split text into lines that keep their trailing newline, so blocks can be
	 * copied verbatim. CRLF is folded to LF first.
	 */
	static fromText(text: string): LineCursor {
		const normalized = text.replace(/\r\n/g, '\n');
		return new LineCursor(normalized.match(/[^\n]*\n|[^\n]+$/g) ?? []);
	}

	*[Symbol.iterator](): Generator<string, void, undefined> {
		while (this.position < this.lines.length) {
			const line = this.lines[this.position];
			this.position += 1;
			yield line;
		}
	}

	get consumed(): number {
		return this.position;
	}
}
