import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { DocumentCache } from "../cache/document-cache";
import { logger } from "../logger";
import { documentToJson } from "../model/json";
import { type ParseOptions, parseBibtex } from "../parser/index";
import { createToolResponse } from "../types";
import { parseWithCache } from "./shared";

export function registerParseBibtexTool(
	server: McpServer,
	cache: DocumentCache,
	options: ParseOptions,
): void {
	server.registerTool(
		"parse_bibtex",
		{
			description:
				"Parse BibTeX source into entries, comments, @string macros and the preamble. Author and editor fields are split into structured names; macro references are kept distinct from literal text.",
			inputSchema: {
				source: z.string().min(1).describe("Complete BibTeX source text"),
				mode: z
					.enum(["strict", "lenient"])
					.optional()
					.describe("strict rejects any unparsable input; lenient ignores trailing input"),
			},
		},
		async ({ source, mode }) => {
			const parseOptions = { ...options, mode: mode ?? options.mode };
			const result = parseWithCache(cache, source, parseOptions, parseBibtex);
			if (!result.ok) return result.response;

			logger.debug("parse_bibtex parsed", result.document.size, "entries");
			return createToolResponse({
				valid: true,
				metadata: documentToJson(result.document),
				error: null,
			});
		},
	);
}
