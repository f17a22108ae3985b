import type { Name } from "../model/values";
import { type Scanner, balancedCurly, flattenCurly } from "./scanner";

/** A bare token, optionally ending in a period: "David", "G.", "O'Neil". */
const NAME_TOKEN = /[^\s.,{}]+\.?/;
/** Lowercase-led word followed by whitespace: "van", "der", "de". */
const NOBILITY_WORD = /\p{Ll}[\p{L}\p{N}_]+\.?(?=\s)/u;
/** The `and` separating names, when something other than `}` follows it. */
const NAME_SEPARATOR = /and(?=[\s{])/i;

/**
 * One whitespace-delimited name part. Bare tokens and brace groups that touch
 * each other form a single part; groups contribute their text without braces,
 * so `{Ministry of Truth and Justice}` is one part and its `and` is literal.
 */
export function namePart(s: Scanner): string | null {
	s.skipWhitespace();
	const start = s.pos;
	const chunks: string[] = [];
	for (;;) {
		if (s.peek() === "{") {
			const group = balancedCurly(s);
			if (group === null) break;
			chunks.push(flattenCurly(group));
			continue;
		}
		const before = s.pos;
		const token = s.match(NAME_TOKEN);
		if (token === null) break;
		// `and{` is a separator followed by a braced name
		if (chunks.length === 0 && /^and$/i.test(token) && s.peek() === "{") {
			s.reset(before);
			break;
		}
		chunks.push(token);
	}
	if (chunks.length === 0) {
		return s.fail("a name");
	}
	if (s.input.slice(start, s.pos).toLowerCase() === "and") {
		s.reset(start);
		return s.fail("a name");
	}
	return chunks.join("");
}

function nameParts(s: Scanner): string[] {
	const parts: string[] = [];
	for (;;) {
		const part = namePart(s);
		if (part === null) return parts;
		parts.push(part);
	}
}

function comma(s: Scanner): boolean {
	s.skipWhitespace();
	return s.literal(",");
}

/** lastname(s) `,` [suffix `,`] firstname(s) */
function commaNameRest(s: Scanner): Omit<Name, "nobility"> | null {
	const last = nameParts(s);
	if (last.length === 0 || !comma(s)) return null;

	const beforeSuffix = s.pos;
	let suffix = namePart(s) ?? undefined;
	if (suffix !== undefined && !comma(s)) {
		s.reset(beforeSuffix);
		suffix = undefined;
	}

	const first = nameParts(s);
	if (first.length === 0) return null;
	return { first: first.join(" "), last: last.join(" "), suffix };
}

/**
 * Comma-style name, e.g. "van der Zalm, E." or "Forney, Jr., David G.".
 * Leading lowercase words are tried as nobility, longest run first, falling
 * back to fewer particles when the rest does not parse.
 */
export function commaName(s: Scanner): Name | null {
	s.skipWhitespace();
	const start = s.pos;

	const particles: number[] = [start];
	for (;;) {
		if (s.match(NOBILITY_WORD) === null) break;
		s.skipWhitespace();
		particles.push(s.pos);
	}

	for (let count = particles.length - 1; count >= 0; count--) {
		s.reset(particles[count]);
		const rest = commaNameRest(s);
		if (rest === null) continue;

		const nobility =
			count > 0 ? s.input.slice(start, particles[count]).trim().split(/\s+/).join(" ") : undefined;
		return buildName({ ...rest, nobility });
	}
	s.reset(start);
	return null;
}

/** Literal-style name: the last part is the last name, the rest the first name. */
export function literalName(s: Scanner): Name | null {
	const parts = nameParts(s);
	if (parts.length === 0) return null;
	const last = parts[parts.length - 1];
	const first = parts.length > 1 ? parts.slice(0, -1).join(" ") : undefined;
	return buildName({ first, last });
}

export function name(s: Scanner): Name | null {
	return commaName(s) ?? literalName(s);
}

/** `{` name ( and name )* `}`. The cursor must be on the opening brace. */
export function nameList(s: Scanner): Name[] | null {
	const start = s.pos;
	if (!s.literal("{")) return null;
	s.enterGroup();
	const names: Name[] = [];
	const fail = (): null => {
		s.leaveGroup();
		s.reset(start);
		return null;
	};

	for (;;) {
		const next = name(s);
		if (next === null) return fail();
		names.push(next);

		s.skipWhitespace();
		if (s.match(NAME_SEPARATOR, '"and"') === null) break;
	}
	s.skipWhitespace();
	if (!s.literal("}")) return fail();
	s.leaveGroup();
	return names;
}

/** Drops absent optional parts so that equal names compare equal. */
function buildName(parts: Name): Name {
	const result: Name = { last: parts.last };
	if (parts.first !== undefined) result.first = parts.first;
	if (parts.nobility !== undefined) result.nobility = parts.nobility;
	if (parts.suffix !== undefined) result.suffix = parts.suffix;
	return result;
}
