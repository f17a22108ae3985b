import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { DocumentCache } from "../cache/document-cache";
import type { Entry } from "../model/entry";
import { DatabaseFormatError } from "../model/errors";
import type { JournalsFile } from "../model/journals";
import type { ValueResolver } from "../model/values";
import { type ParseOptions, parseBibtex } from "../parser/index";
import { createErrorResponse, createToolResponse } from "../types";
import { parseWithCache } from "./shared";

export function registerDescribeEntryTool(
	server: McpServer,
	cache: DocumentCache,
	options: ParseOptions,
	journals?: JournalsFile,
): void {
	server.registerTool(
		"describe_entry",
		{
			description:
				"Summarize one entry of a BibTeX database: title, journal, last names of the authors, date, DOI URL and linked document. Macros resolve through the database's @string definitions and the configured journals file.",
			inputSchema: {
				source: z.string().min(1).describe("Complete BibTeX source text"),
				citekey: z.string().min(1).describe("Cite key of the entry, e.g. 'Helmling2014'"),
				maxNames: z
					.number()
					.int()
					.positive()
					.optional()
					.describe("Authors listed before 'et al.' (default 3)"),
			},
		},
		async ({ source, citekey, maxNames }) => {
			const result = parseWithCache(cache, source, options, parseBibtex);
			if (!result.ok) return result.response;

			const entry = result.document.get(citekey);
			if (!entry) {
				return createErrorResponse("NOT_FOUND", `No entry with cite key "${citekey}"`, {
					citekeys: [...result.document.keys()],
				});
			}

			const resolve = result.document.resolver(journals);
			try {
				return createToolResponse({
					valid: true,
					metadata: describe(entry, resolve, maxNames ?? 3),
					error: null,
				});
			} catch (error) {
				if (error instanceof DatabaseFormatError) {
					return createErrorResponse("FORMAT_ERROR", error.message);
				}
				throw error;
			}
		},
	);
}

function describe(entry: Entry, resolve: ValueResolver, maxNames: number) {
	const text = (field: string): string | null => {
		const value = entry.get(field);
		return value === undefined ? null : resolve(value);
	};
	return {
		citekey: entry.citekey,
		entrytype: entry.entrytype,
		title: text("title"),
		journal: text("journal"),
		authors: entry.lastNames("author", maxNames) ?? null,
		editors: entry.lastNames("editor", maxNames) ?? null,
		date: entry.datestr(resolve),
		doiURL: entry.doiURL(resolve) ?? null,
		filename: entry.filename() ?? null,
	};
}
