import type { Entry } from "./entry";
import type { JournalsFile } from "./journals";
import { type FieldValue, type MacroDefinition, type ValueResolver, createResolver } from "./values";

export interface Comment {
	/** `explicit` for `@comment{...}`, `implicit` for text before the first `@`. */
	kind: "explicit" | "implicit";
	text: string;
}

export interface Preamble {
	value: FieldValue;
}

/**
 * A parsed BibTeX database. Entries keep their source order and are keyed
 * by cite key (case-sensitive); macros are keyed by lowercase name.
 */
export class BibDocument {
	readonly entries = new Map<string, Entry>();
	readonly comments: Comment[] = [];
	readonly macroDefinitions = new Map<string, MacroDefinition>();
	preamble?: Preamble;

	get size(): number {
		return this.entries.size;
	}

	get(citekey: string): Entry | undefined {
		return this.entries.get(citekey);
	}

	has(citekey: string): boolean {
		return this.entries.has(citekey);
	}

	keys(): IterableIterator<string> {
		return this.entries.keys();
	}

	values(): IterableIterator<Entry> {
		return this.entries.values();
	}

	add(entry: Entry): void {
		this.entries.set(entry.citekey, entry);
	}

	delete(citekey: string): boolean {
		return this.entries.delete(citekey);
	}

	defineMacro(key: string, value: FieldValue): void {
		const normalized = key.toLowerCase();
		this.macroDefinitions.set(normalized, { key: normalized, value });
	}

	/** Resolver for display text that knows this document's `@string` macros. */
	resolver(journals?: JournalsFile, abbreviate = true): ValueResolver {
		return createResolver({ macros: this.macroDefinitions, journals, abbreviate });
	}

	/** Paths of all documents linked through `file` fields, in entry order. */
	referencedFiles(): string[] {
		const files: string[] = [];
		for (const entry of this.entries.values()) {
			const file = entry.filename();
			if (file) files.push(file);
		}
		return files;
	}
}
