import type { BibDocument } from "../model/document";
import type { SourcePosition } from "../model/errors";

/**
 * `strict` requires the whole input to parse; `lenient` keeps everything
 * parsed before the first construct that fails and ignores the rest.
 */
export type ParseMode = "strict" | "lenient";

/** What happens when a cite key occurs twice in one database. */
export type DuplicateKeyPolicy = "overwrite" | "error" | "keep-first";

export interface ParseOptions {
	mode?: ParseMode;
	duplicateKeys?: DuplicateKeyPolicy;
	/** Maximum brace nesting depth before the input is rejected. */
	maxDepth?: number;
}

export interface BibtexParseError {
	code: "PARSE_ERROR";
	message: string;
	position?: SourcePosition;
}

export type ParseResult =
	| { ok: true; document: BibDocument }
	| { ok: false; error: BibtexParseError };
