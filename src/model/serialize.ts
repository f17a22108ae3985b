import type { BibDocument } from "./document";
import type { Entry } from "./entry";
import { type FieldValue, MacroReference, type Name, type ValuePart } from "./values";

const NEEDS_BRACES = /,|\band\b/i;
/** A leading lowercase word would read back as nobility. */
const LOWERCASE_LEAD = /^\p{Ll}[\p{L}\p{N}_]+\.?\s/u;

function protect(part: string): string {
	return NEEDS_BRACES.test(part) ? `{${part}}` : part;
}

/** Comma-style rendering that reads back as the same name. */
export function serializeName(name: Name): string {
	if (name.first === undefined) {
		return /\s|,|\band\b/i.test(name.last) ? `{${name.last}}` : name.last;
	}
	const lastName = LOWERCASE_LEAD.test(name.last) ? `{${name.last}}` : protect(name.last);
	const last = [name.nobility, lastName].filter(Boolean).join(" ");
	const suffix = name.suffix ? `, ${protect(name.suffix)}` : "";
	return `${last}${suffix}, ${protect(name.first)}`;
}

function serializePart(part: ValuePart): string {
	return part instanceof MacroReference ? part.name : `{${part}}`;
}

export function serializeValue(value: FieldValue): string {
	if (typeof value === "string" || value instanceof MacroReference) return serializePart(value);
	if (value.kind === "names") return `{${value.names.map(serializeName).join(" and ")}}`;
	return value.parts.map(serializePart).join(" # ");
}

export function serializeEntry(entry: Entry): string {
	const fields = [...entry.fields].map(([name, value]) => `  ${name} = ${serializeValue(value)}`);
	const body = fields.length > 0 ? `,\n${fields.join(",\n")}\n` : "";
	return `@${entry.entrytype}{${entry.citekey}${body}}\n`;
}

/**
 * Write a document back as BibTeX: implicit comments, preamble, macros,
 * entries, then explicit comments.
 */
export function serializeDocument(document: BibDocument): string {
	const blocks: string[] = [];
	for (const comment of document.comments) {
		if (comment.kind === "implicit") blocks.push(comment.text.trimEnd());
	}
	if (document.preamble) {
		blocks.push(`@preamble{${serializeValue(document.preamble.value)}}`);
	}
	for (const macro of document.macroDefinitions.values()) {
		blocks.push(`@string{${macro.key} = ${serializeValue(macro.value)}}`);
	}
	for (const entry of document.values()) {
		blocks.push(serializeEntry(entry).trimEnd());
	}
	for (const comment of document.comments) {
		if (comment.kind === "explicit") blocks.push(`@comment{${comment.text}}`);
	}
	return blocks.length > 0 ? `${blocks.join("\n\n")}\n` : "";
}
