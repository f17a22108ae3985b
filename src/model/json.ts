import type { BibDocument, Comment } from "./document";
import type { Entry } from "./entry";
import { type FieldValue, MacroReference, type Name, type ValuePart } from "./values";

export type JsonValuePart = string | { macro: string };

export type JsonFieldValue = JsonValuePart | { concat: JsonValuePart[] } | { names: Name[] };

export type JsonEntry = {
	citekey: string;
	entrytype: string;
	fields: Record<string, JsonFieldValue>;
};

export type JsonDocument = {
	entries: JsonEntry[];
	comments: Comment[];
	macros: Record<string, JsonFieldValue>;
	preamble: JsonFieldValue | null;
};

function partToJson(part: ValuePart): JsonValuePart {
	return part instanceof MacroReference ? { macro: part.name } : part;
}

export function valueToJson(value: FieldValue): JsonFieldValue {
	if (typeof value === "string" || value instanceof MacroReference) return partToJson(value);
	if (value.kind === "names") return { names: value.names };
	return { concat: value.parts.map(partToJson) };
}

export function entryToJson(entry: Entry): JsonEntry {
	const fields: Record<string, JsonFieldValue> = {};
	for (const [name, value] of entry.fields) {
		fields[name] = valueToJson(value);
	}
	return { citekey: entry.citekey, entrytype: entry.entrytype, fields };
}

export function documentToJson(document: BibDocument): JsonDocument {
	const macros: Record<string, JsonFieldValue> = {};
	for (const macro of document.macroDefinitions.values()) {
		macros[macro.key] = valueToJson(macro.value);
	}
	return {
		entries: [...document.values()].map(entryToJson),
		comments: [...document.comments],
		macros,
		preamble: document.preamble ? valueToJson(document.preamble.value) : null,
	};
}
