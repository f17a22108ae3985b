import type { Comment, Preamble } from "../model/document";
import { Entry } from "../model/entry";
import type { FieldValue, MacroDefinition } from "../model/values";
import { nameList } from "./names";
import { ANY_NAME, type Scanner, rawUntilClose } from "./scanner";
import { fieldValue, lowerName } from "./values";

export type TopLevelItem =
	| { kind: "entry"; entry: Entry }
	| { kind: "comment"; comment: Comment }
	| { kind: "macro"; definition: MacroDefinition }
	| { kind: "preamble"; preamble: Preamble };

const NAME_FIELDS = new Set(["author", "editor"]);
const CLOSING: Record<string, string> = { "{": "}", "(": ")" };

/**
 * `{ inner }` or `( inner )`. `inner` receives the closing bracket so it can
 * tell where its contents end.
 */
function bracketed<T>(s: Scanner, inner: (close: string) => T | null): T | null {
	const start = s.pos;
	s.skipWhitespace();
	const open = s.peek();
	const close = CLOSING[open];
	if (close === undefined) {
		s.fail('"{" or "("');
		s.reset(start);
		return null;
	}
	s.pos++;
	const result = inner(close);
	if (result !== null) {
		s.skipWhitespace();
		if (s.literal(close)) return result;
	}
	s.reset(start);
	return null;
}

/** fieldname = value, or author/editor = { name and name ... } */
export function fieldDef(s: Scanner): [string, FieldValue] | null {
	const start = s.pos;
	s.skipWhitespace();
	const field = lowerName(s, "field name");
	if (field === null) return null;
	s.skipWhitespace();
	if (!s.literal("=")) {
		s.reset(start);
		return null;
	}

	if (NAME_FIELDS.has(field)) {
		const beforeValue = s.pos;
		s.skipWhitespace();
		const names = nameList(s);
		if (names !== null && endsField(s)) {
			return [field, { kind: "names", names }];
		}
		s.reset(beforeValue);
	}

	const value = fieldValue(s);
	if (value === null) {
		s.reset(start);
		return null;
	}
	return [field, value];
}

/** Whether the cursor (after whitespace) sits on a field separator or a closing bracket. */
function endsField(s: Scanner): boolean {
	const before = s.pos;
	s.skipWhitespace();
	const next = s.peek();
	s.reset(before);
	return next === "," || next === "}" || next === ")";
}

/** field ( `,` field )* [`,`], stopping before `close`. */
export function fieldList(s: Scanner, close: string): Map<string, FieldValue> | null {
	const fields = new Map<string, FieldValue>();
	for (;;) {
		s.skipWhitespace();
		if (s.peek() === close) return fields;
		const field = fieldDef(s);
		if (field === null) return null;
		fields.set(field[0], field[1]);
		s.skipWhitespace();
		if (!s.literal(",")) return fields;
	}
}

function comment(s: Scanner): TopLevelItem | null {
	s.skipWhitespace();
	if (!s.keyword("comment")) return null;
	const text = bracketed(s, (close) => rawUntilClose(s, close));
	return text === null ? null : { kind: "comment", comment: { kind: "explicit", text } };
}

function preamble(s: Scanner): TopLevelItem | null {
	s.skipWhitespace();
	if (!s.keyword("preamble")) return null;
	const value = bracketed(s, () => fieldValue(s));
	return value === null ? null : { kind: "preamble", preamble: { value } };
}

function macro(s: Scanner): TopLevelItem | null {
	s.skipWhitespace();
	if (!s.keyword("string")) return null;
	const definition = bracketed(s, (): MacroDefinition | null => {
		s.skipWhitespace();
		const key = lowerName(s, "macro name");
		if (key === null) return null;
		s.skipWhitespace();
		if (!s.literal("=")) return null;
		const value = fieldValue(s);
		return value === null ? null : { key, value };
	});
	return definition === null ? null : { kind: "macro", definition };
}

function entry(s: Scanner, at: number): TopLevelItem | null {
	s.skipWhitespace();
	const entrytype = lowerName(s, "entry type");
	if (entrytype === null) return null;

	const body = bracketed(s, (close) => {
		s.skipWhitespace();
		const citekey = s.match(ANY_NAME, "cite key");
		if (citekey === null) return null;
		s.skipWhitespace();
		if (s.peek() === close) return { citekey, fields: new Map<string, FieldValue>() };
		if (!s.literal(",")) return null;
		const fields = fieldList(s, close);
		return fields === null ? null : { citekey, fields };
	});
	if (body === null) return null;

	const source = s.input.slice(at, s.pos);
	return {
		kind: "entry",
		entry: new Entry(entrytype, body.citekey, body.fields, source, { start: at, end: s.pos }),
	};
}

/**
 * One `@`-construct. The reserved keywords are tried before the generic
 * entry, whose type name would otherwise match them.
 */
export function definition(s: Scanner): TopLevelItem | null {
	s.skipWhitespace();
	const at = s.pos;
	if (!s.literal("@")) return null;
	const afterAt = s.pos;

	for (const production of [comment, preamble, macro]) {
		const item = production(s);
		if (item !== null) return item;
		s.reset(afterAt);
	}
	const item = entry(s, at);
	if (item === null) s.reset(at);
	return item;
}
