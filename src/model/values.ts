import type { JournalsFile } from "./journals";

/** A bare identifier in a field value that names a `@string` macro (or a journal). */
export class MacroReference {
	constructor(readonly name: string) {}

	equals(other: unknown): boolean {
		return other instanceof MacroReference && other.name === this.name;
	}

	toString(): string {
		return `MacroReference(${this.name})`;
	}
}

/** A structured author or editor name. `last` is always present. */
export interface Name {
	first?: string;
	nobility?: string;
	last: string;
	suffix?: string;
}

export type ValuePart = string | MacroReference;

/** A `#`-concatenation that still contains at least one macro reference. */
export interface Concatenation {
	kind: "concat";
	parts: ValuePart[];
}

export interface NameList {
	kind: "names";
	names: Name[];
}

export type FieldValue = string | MacroReference | Concatenation | NameList;

export interface MacroDefinition {
	key: string;
	value: FieldValue;
}

export function isConcatenation(value: FieldValue): value is Concatenation {
	return typeof value === "object" && !(value instanceof MacroReference) && value.kind === "concat";
}

export function isNameList(value: FieldValue): value is NameList {
	return typeof value === "object" && !(value instanceof MacroReference) && value.kind === "names";
}

/**
 * Joins concatenated parts. If every part is text the result collapses to one
 * string; otherwise the parts are kept as they are.
 */
export function concatenate(parts: ValuePart[]): string | MacroReference | Concatenation {
	if (parts.every((part): part is string => typeof part === "string")) {
		return parts.join("");
	}
	if (parts.length === 1 && parts[0] instanceof MacroReference) {
		return parts[0];
	}
	return { kind: "concat", parts };
}

/** Nobility, last name and suffix, e.g. "van der Zalm Jr.". */
export function formatLastName(name: Name): string {
	return [name.nobility, name.last, name.suffix].filter(Boolean).join(" ");
}

/** "David G. Forney, Jr." */
export function formatName(name: Name): string {
	const main = [name.first, name.nobility, name.last].filter(Boolean).join(" ");
	return name.suffix ? `${main}, ${name.suffix}` : main;
}

export interface ResolveContext {
	macros?: ReadonlyMap<string, MacroDefinition>;
	journals?: JournalsFile;
	/** Use abbreviated journal names. Defaults to true. */
	abbreviate?: boolean;
}

export type ValueResolver = (value: FieldValue) => string;

/**
 * Render a field value as display text. Macros resolve through the journals
 * file first, then through the document's `@string` definitions; anything
 * left unresolved renders as its macro name.
 */
export function textify(value: FieldValue, context: ResolveContext = {}): string {
	return render(value, context, new Set());
}

function render(value: FieldValue, context: ResolveContext, resolving: Set<string>): string {
	if (typeof value === "string") return value;
	if (value instanceof MacroReference) return renderMacro(value, context, resolving);
	if (value.kind === "names") return value.names.map(formatName).join(" and ");
	return value.parts.map((part) => render(part, context, resolving)).join("");
}

function renderMacro(ref: MacroReference, context: ResolveContext, resolving: Set<string>): string {
	const journal = context.journals?.get(ref.name);
	if (journal) return journal.displayName(context.abbreviate ?? true);

	const definition = context.macros?.get(ref.name);
	if (!definition || resolving.has(ref.name)) return ref.name;

	resolving.add(ref.name);
	const text = render(definition.value, context, resolving);
	resolving.delete(ref.name);
	return text;
}

export function createResolver(context: ResolveContext = {}): ValueResolver {
	return (value) => textify(value, context);
}
