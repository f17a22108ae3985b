import { DatabaseFormatError, type SourcePosition } from "../model/errors";

/** Characters that may not appear in macro, field, entry-type names or cite keys (from btparse). */
export const ANY_NAME = /[^\s"#%'(),={}]+/;
/** Macro, field and entry-type names additionally may not start with a digit. */
export const NOT_DIGIT_NAME = /[^\d\s"#%'(),={}][^\s"#%'(),={}]*/;
export const CHARS_NO_CURLY = /[^{}]+/;
export const CHARS_NO_QUOTE_CURLY = /[^"{}]+/;
export const NUMBER = /[0-9]+/;
const WHITESPACE = /\s*/;

/** A brace group's contents: text runs and nested groups, braces removed. */
export type CurlyTree = Array<string | CurlyTree>;

/**
 * Cursor over one source string. Every parse call gets its own scanner, so
 * compiled patterns and failure bookkeeping are never shared between calls.
 *
 * Failures are not exceptions: matchers return null (or false) and leave the
 * cursor where it was. The scanner remembers the furthest offset at which
 * something was expected, which is what a syntax error reports.
 */
export class Scanner {
	pos = 0;
	private depth = 0;
	private furthest = 0;
	private readonly expected = new Set<string>();
	private readonly sticky = new Map<RegExp, RegExp>();

	constructor(
		readonly input: string,
		readonly maxDepth = 256,
	) {}

	get done(): boolean {
		return this.pos >= this.input.length;
	}

	peek(): string {
		return this.input.charAt(this.pos);
	}

	reset(pos: number): void {
		this.pos = pos;
	}

	skipWhitespace(): void {
		this.match(WHITESPACE);
	}

	/** Match `pattern` exactly at the cursor and advance past it. */
	match(pattern: RegExp, expected?: string): string | null {
		let re = this.sticky.get(pattern);
		if (!re) {
			re = new RegExp(pattern.source, `${pattern.flags.replace(/[gy]/g, "")}y`);
			this.sticky.set(pattern, re);
		}
		re.lastIndex = this.pos;
		const found = re.exec(this.input);
		if (!found) {
			if (expected) this.fail(expected);
			return null;
		}
		this.pos += found[0].length;
		return found[0];
	}

	literal(text: string): boolean {
		if (this.input.startsWith(text, this.pos)) {
			this.pos += text.length;
			return true;
		}
		this.fail(JSON.stringify(text));
		return false;
	}

	/** Case-insensitive keyword. No word boundary is required after it. */
	keyword(word: string): boolean {
		const candidate = this.input.slice(this.pos, this.pos + word.length);
		if (candidate.toLowerCase() === word.toLowerCase()) {
			this.pos += word.length;
			return true;
		}
		this.fail(`"${word}"`);
		return false;
	}

	fail(expected: string): null {
		if (this.pos > this.furthest) {
			this.furthest = this.pos;
			this.expected.clear();
		}
		if (this.pos === this.furthest) {
			this.expected.add(expected);
		}
		return null;
	}

	enterGroup(): void {
		this.depth++;
		if (this.depth > this.maxDepth) {
			throw new DatabaseFormatError(
				`Brace nesting deeper than ${this.maxDepth} levels at ${describePosition(this.positionAt(this.pos))}`,
				this.positionAt(this.pos),
			);
		}
	}

	leaveGroup(): void {
		this.depth--;
	}

	positionAt(offset: number): SourcePosition {
		const before = this.input.slice(0, offset);
		const lines = before.split("\n");
		return { offset, line: lines.length, column: lines[lines.length - 1].length + 1 };
	}

	/** Syntax error describing the furthest point the grammar reached. */
	error(): DatabaseFormatError {
		const position = this.positionAt(this.furthest);
		const expected = this.expected.size > 0 ? [...this.expected].join(" or ") : "end of input";
		const near = this.input.slice(this.furthest, this.furthest + 20).split("\n")[0];
		const found = near ? `"${near}"` : "end of input";
		return new DatabaseFormatError(
			`Expected ${expected} at ${describePosition(position)}, found ${found}`,
			position,
			expected,
		);
	}
}

export function describePosition(position: SourcePosition): string {
	return `line ${position.line}, column ${position.column}`;
}

/**
 * `{` + (nested group | chars without braces)* + `}`. The cursor must be on
 * the opening brace; whitespace inside the group is preserved.
 */
export function balancedCurly(s: Scanner): CurlyTree | null {
	const start = s.pos;
	if (!s.literal("{")) return null;
	s.enterGroup();
	const items: CurlyTree = [];
	for (;;) {
		if (s.peek() === "{") {
			const nested = balancedCurly(s);
			if (!nested) break;
			items.push(nested);
			continue;
		}
		const text = s.match(CHARS_NO_CURLY);
		if (text === null) break;
		items.push(text);
	}
	s.leaveGroup();
	if (!s.literal("}")) {
		s.reset(start);
		return null;
	}
	return items;
}

/** `"` + (group | chars without quote or braces)* + `"`. */
export function quotedString(s: Scanner): CurlyTree | null {
	const start = s.pos;
	if (!s.literal('"')) return null;
	const items: CurlyTree = [];
	for (;;) {
		if (s.peek() === "{") {
			const nested = balancedCurly(s);
			if (!nested) break;
			items.push(nested);
			continue;
		}
		const text = s.match(CHARS_NO_QUOTE_CURLY);
		if (text === null) break;
		items.push(text);
	}
	if (!s.literal('"')) {
		s.reset(start);
		return null;
	}
	return items;
}

/**
 * Flatten a group depth-first into one string. Nested groups lose their
 * braces: `{An {S}ample}` becomes "An Sample".
 */
export function flattenCurly(tree: CurlyTree): string {
	return tree.map((item) => (typeof item === "string" ? item : flattenCurly(item))).join("");
}

/**
 * Raw text of a bracketed block up to the matching `close` at depth zero,
 * braces kept verbatim. With `)` as the closing bracket, nested parentheses
 * outside brace groups are balanced too. The cursor must be just past the
 * opening bracket.
 */
export function rawUntilClose(s: Scanner, close: string): string | null {
	const start = s.pos;
	let depth = 0;
	let parens = 0;
	while (!s.done) {
		const ch = s.peek();
		if (ch === close && depth === 0 && parens === 0) {
			return s.input.slice(start, s.pos);
		}
		if (close === ")" && depth === 0) {
			if (ch === "(") parens++;
			else if (ch === ")") parens--;
		}
		if (ch === "{") {
			depth++;
			s.enterGroup();
		} else if (ch === "}") {
			if (depth === 0) break;
			depth--;
			s.leaveGroup();
		}
		s.pos++;
	}
	for (; depth > 0; depth--) s.leaveGroup();
	s.fail(JSON.stringify(close));
	s.reset(start);
	return null;
}
