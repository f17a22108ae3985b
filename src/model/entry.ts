import { DatabaseFormatError } from "./errors";
import {
	type FieldValue,
	type ValueResolver,
	createResolver,
	formatLastName,
	isNameList,
} from "./values";

export interface SourceSpan {
	start: number;
	end: number;
}

const DOI_RESOLVER = "http://dx.doi.org/";

/**
 * A BibTeX entry: type, cite key and an ordered map of lowercase field names
 * to values, plus the verbatim source it was parsed from.
 */
export class Entry {
	readonly fields: Map<string, FieldValue>;

	constructor(
		readonly entrytype: string,
		readonly citekey: string,
		fields: Iterable<[string, FieldValue]> = [],
		readonly source = "",
		readonly span: SourceSpan = { start: 0, end: 0 },
	) {
		this.fields = new Map();
		for (const [name, value] of fields) {
			this.fields.set(name.toLowerCase(), value);
		}
	}

	get(field: string): FieldValue | undefined {
		return this.fields.get(field.toLowerCase());
	}

	has(field: string): boolean {
		return this.fields.has(field.toLowerCase());
	}

	set(field: string, value: FieldValue): void {
		this.fields.set(field.toLowerCase(), value);
	}

	delete(field: string): boolean {
		return this.fields.delete(field.toLowerCase());
	}

	/**
	 * The document path stored in a JabRef-style `file` field
	 * (`:path/to/doc.pdf:PDF`), with `\;` unescaped. Undefined when the
	 * entry has no (or an empty) `file` field.
	 */
	filename(): string | undefined {
		const value = this.get("file");
		if (value === undefined || value === "") return undefined;

		if (typeof value !== "string" || !value.startsWith(":") || value.lastIndexOf(":") === 0) {
			throw new DatabaseFormatError(
				`Wrong file URL format in entry "${this.citekey}": ${createResolver()(value)}`,
			);
		}
		return value.slice(1, value.lastIndexOf(":")).replaceAll("\\;", ";");
	}

	doiURL(resolve: ValueResolver = createResolver()): string | undefined {
		const doi = this.get("doi");
		return doi === undefined ? undefined : DOI_RESOLVER + resolve(doi);
	}

	/**
	 * Comma-separated last names of a name-list field, e.g. "Helmling, van der Zalm".
	 * Names beyond `maxNames` are replaced by "et al.".
	 */
	lastNames(field = "author", maxNames = 3): string | undefined {
		const value = this.get(field);
		if (value === undefined) return undefined;
		if (!isNameList(value)) return createResolver()(value);

		const shown = value.names.slice(0, maxNames).map(formatLastName).join(", ");
		return value.names.length > maxNames ? `${shown} et al.` : shown;
	}

	/** The `date` field, or else month and year, e.g. "March 2011". */
	datestr(resolve: ValueResolver = createResolver()): string {
		const date = this.get("date");
		if (date !== undefined) return resolve(date);

		const parts: string[] = [];
		const month = this.get("month");
		const year = this.get("year");
		if (month !== undefined) parts.push(resolve(month));
		if (year !== undefined) parts.push(resolve(year));
		return parts.join(" ");
	}

	toString(): string {
		const author = this.get("author");
		const by = author === undefined ? "unknown" : createResolver()(author);
		return `${this.entrytype}(${this.citekey}) by ${by}`;
	}
}
