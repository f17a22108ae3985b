import { readFile } from "node:fs/promises";
import { JournalFormatError } from "./errors";

/** A journal, identified by the macro that stands for it in the database. */
export class Journal {
	constructor(
		readonly macro: string,
		readonly abbr: string,
		readonly full: string,
	) {}

	/** Human-readable name with braces and ampersands stripped. */
	displayName(abbreviated = false): string {
		return (abbreviated ? this.abbr : this.full).replace(/[{}&]/g, "");
	}
}

/**
 * Ordered collection of journals keyed by macro. Lookups are
 * case-insensitive, like macro references in the database.
 */
export class JournalsFile {
	private readonly journals = new Map<string, Journal>();

	constructor(
		journals: Iterable<Journal> = [],
		readonly separator = "|",
	) {
		for (const journal of journals) {
			this.add(journal);
		}
	}

	add(journal: Journal): void {
		this.journals.set(journal.macro.toLowerCase(), journal);
	}

	get(macro: string): Journal | undefined {
		return this.journals.get(macro.toLowerCase());
	}

	has(macro: string): boolean {
		return this.journals.has(macro.toLowerCase());
	}

	delete(macro: string): boolean {
		return this.journals.delete(macro.toLowerCase());
	}

	get size(): number {
		return this.journals.size;
	}

	values(): IterableIterator<Journal> {
		return this.journals.values();
	}

	toString(): string {
		return [...this.journals.values()]
			.map((j) => `${j.macro}${this.separator}${j.abbr}${this.separator}${j.full}\n`)
			.join("");
	}
}

/**
 * Parse a journals definition text: one `macro|abbreviation|full name` per
 * line. Blank lines and lines starting with `#` are ignored.
 */
export function parseJournals(text: string, separator = "|", origin = "<string>"): JournalsFile {
	const file = new JournalsFile([], separator);
	for (const rawLine of text.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (line === "" || line.startsWith("#")) continue;
		const parts = line.split(separator);
		if (parts.length !== 3) {
			throw new JournalFormatError(`Could not parse line '${line}' in journals file ${origin}`);
		}
		const [macro, abbr, full] = parts;
		file.add(new Journal(macro, abbr, full));
	}
	return file;
}

export async function readJournalsFile(path: string, separator = "|"): Promise<JournalsFile> {
	const text = await readFile(path, "utf8");
	return parseJournals(text, separator, path);
}
