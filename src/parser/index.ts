import { readFile } from "node:fs/promises";
import { BibDocument } from "../model/document";
import { DatabaseFormatError } from "../model/errors";
import type { Name } from "../model/values";
import { logger } from "../logger";
import { type TopLevelItem, definition } from "./entries";
import { name as nameProduction, nameList } from "./names";
import { Scanner, describePosition } from "./scanner";
import type { ParseMode, ParseOptions, ParseResult } from "./types";

export type {
	BibtexParseError,
	DuplicateKeyPolicy,
	ParseMode,
	ParseOptions,
	ParseResult,
} from "./types";

export const DEFAULT_PARSE_OPTIONS: Required<ParseOptions> = {
	mode: "strict",
	duplicateKeys: "overwrite",
	maxDepth: 256,
};

/**
 * Everything before the first `@` is an implicit comment, kept verbatim when
 * it contains more than whitespace.
 */
function implicitComment(s: Scanner): TopLevelItem | null {
	const at = s.input.indexOf("@");
	const end = at === -1 ? s.input.length : at;
	const text = s.input.slice(0, end);
	s.reset(end);
	return /\S/.test(text) ? { kind: "comment", comment: { kind: "implicit", text } } : null;
}

function parseItems(s: Scanner, mode: ParseMode): TopLevelItem[] {
	const items: TopLevelItem[] = [];
	const leading = implicitComment(s);
	if (leading) items.push(leading);

	for (;;) {
		s.skipWhitespace();
		if (s.done) return items;
		const at = s.pos;
		let item: TopLevelItem | null;
		try {
			item = definition(s);
		} catch (error) {
			// nesting beyond maxDepth ends a lenient parse like any other failure
			if (mode === "lenient" && error instanceof DatabaseFormatError) {
				s.reset(at);
				warnUnparsed(s, error.message);
				return items;
			}
			throw error;
		}
		if (item === null) break;
		items.push(item);
	}

	if (mode === "strict") {
		throw s.error();
	}
	warnUnparsed(s, s.error().message);
	return items;
}

function warnUnparsed(s: Scanner, reason: string): void {
	const from = describePosition(s.positionAt(s.pos));
	logger.warn(`Ignoring unparsed BibTeX input from ${from}:`, reason);
}

function assemble(items: TopLevelItem[], options: Required<ParseOptions>): BibDocument {
	const document = new BibDocument();
	for (const item of items) {
		switch (item.kind) {
			case "entry": {
				const { citekey } = item.entry;
				if (document.has(citekey)) {
					if (options.duplicateKeys === "error") {
						throw new DatabaseFormatError(`Duplicate cite key "${citekey}"`);
					}
					if (options.duplicateKeys === "keep-first") {
						logger.debug(`Keeping first entry for duplicate cite key "${citekey}"`);
						break;
					}
					// the replacement keeps the position of the first occurrence
					logger.debug(`Overwriting entry for duplicate cite key "${citekey}"`);
				}
				document.add(item.entry);
				break;
			}
			case "comment":
				document.comments.push(item.comment);
				break;
			case "macro":
				document.defineMacro(item.definition.key, item.definition.value);
				break;
			case "preamble":
				document.preamble = item.preamble;
				break;
		}
	}
	return document;
}

/**
 * Parse BibTeX source text into a {@link BibDocument}.
 * Throws {@link DatabaseFormatError} on malformed input.
 */
export function parseBibtex(source: string, options: ParseOptions = {}): BibDocument {
	const resolved: Required<ParseOptions> = {
		mode: options.mode ?? DEFAULT_PARSE_OPTIONS.mode,
		duplicateKeys: options.duplicateKeys ?? DEFAULT_PARSE_OPTIONS.duplicateKeys,
		maxDepth: options.maxDepth ?? DEFAULT_PARSE_OPTIONS.maxDepth,
	};
	const scanner = new Scanner(source, resolved.maxDepth);
	const items = parseItems(scanner, resolved.mode);
	const document = assemble(items, resolved);
	logger.debug(
		`Parsed ${document.size} entries, ${document.macroDefinitions.size} macros,`,
		`${document.comments.length} comments`,
	);
	return document;
}

/** Like {@link parseBibtex}, but reports format errors as a result value. */
export function tryParseBibtex(source: string, options: ParseOptions = {}): ParseResult {
	try {
		return { ok: true, document: parseBibtex(source, options) };
	} catch (error) {
		if (error instanceof DatabaseFormatError) {
			return {
				ok: false,
				error: { code: "PARSE_ERROR", message: error.message, position: error.position },
			};
		}
		throw error;
	}
}

export async function readBibFile(path: string, options: ParseOptions = {}): Promise<BibDocument> {
	const source = await readFile(path, "utf8");
	return parseBibtex(source, options);
}

/** Parse a single author or editor name, e.g. "van der Zalm, E.". */
export function parseName(text: string): Name {
	const s = new Scanner(text);
	const parsed = nameProduction(s);
	s.skipWhitespace();
	if (parsed === null || !s.done) {
		if (parsed !== null) s.fail("end of name");
		throw s.error();
	}
	return parsed;
}

/**
 * Parse an `and`-separated list of names: the contents of an author field
 * without its enclosing braces.
 */
export function parseNames(text: string): Name[] {
	const s = new Scanner(`{${text}}`);
	const names = nameList(s);
	if (names === null || !s.done) {
		throw s.error();
	}
	return names;
}
