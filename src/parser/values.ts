import { type FieldValue, MacroReference, type ValuePart, concatenate } from "../model/values";
import {
	NOT_DIGIT_NAME,
	NUMBER,
	type Scanner,
	balancedCurly,
	flattenCurly,
	quotedString,
} from "./scanner";

/** Macro, field and entry-type names: no leading digit, lowercased. */
export function lowerName(s: Scanner, expected?: string): string | null {
	const name = s.match(NOT_DIGIT_NAME, expected);
	return name === null ? null : name.toLowerCase();
}

/** number | macro reference | quoted string | braced string */
export function value(s: Scanner): ValuePart | null {
	s.skipWhitespace();
	const number = s.match(NUMBER);
	if (number !== null) return number;

	const macro = lowerName(s);
	if (macro !== null) return new MacroReference(macro);

	const next = s.peek();
	if (next === '"') {
		const quoted = quotedString(s);
		return quoted === null ? null : flattenCurly(quoted);
	}
	if (next === "{") {
		const braced = balancedCurly(s);
		return braced === null ? null : flattenCurly(braced);
	}
	s.fail("a number, macro name, quoted or braced string");
	return null;
}

/** value ( `#` value )*, collapsed to a string when every part is text. */
export function fieldValue(s: Scanner): FieldValue | null {
	const start = s.pos;
	const first = value(s);
	if (first === null) {
		s.reset(start);
		return null;
	}
	const parts: ValuePart[] = [first];
	for (;;) {
		const before = s.pos;
		s.skipWhitespace();
		if (!s.literal("#")) {
			s.reset(before);
			break;
		}
		const next = value(s);
		if (next === null) {
			s.reset(start);
			return null;
		}
		parts.push(next);
	}
	return concatenate(parts);
}
