import type { DocumentCache } from "../cache/document-cache";
import type { BibDocument } from "../model/document";
import { DatabaseFormatError } from "../model/errors";
import type { ParseOptions } from "../parser/index";
import { createErrorResponse } from "../types";

export type CachedParse =
	| { ok: true; document: BibDocument }
	| { ok: false; response: ReturnType<typeof createErrorResponse> };

/** Parse through the shared cache, turning format errors into a PARSE_ERROR envelope. */
export function parseWithCache(
	cache: DocumentCache,
	source: string,
	options: ParseOptions,
	parse: (source: string, options: ParseOptions) => BibDocument,
): CachedParse {
	try {
		return { ok: true, document: cache.getOrParse(source, options, parse) };
	} catch (error) {
		if (error instanceof DatabaseFormatError) {
			return {
				ok: false,
				response: createErrorResponse("PARSE_ERROR", error.message, error.position),
			};
		}
		throw error;
	}
}
