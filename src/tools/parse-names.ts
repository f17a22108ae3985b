import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DatabaseFormatError } from "../model/errors";
import { formatName } from "../model/values";
import { parseNames } from "../parser/index";
import { createErrorResponse, createToolResponse } from "../types";

export function registerParseNamesTool(server: McpServer): void {
	server.registerTool(
		"parse_names",
		{
			description:
				"Split a BibTeX author or editor list into structured names (first, nobility, last, suffix). Accepts both 'Last, First' and 'First Last' styles; braced groups are kept whole.",
			inputSchema: {
				names: z
					.string()
					.min(1)
					.describe(
						"Contents of an author field without the outer braces, e.g. 'van der Zalm, E. and Helmling, Michael'",
					),
			},
		},
		async ({ names }) => {
			try {
				const parsed = parseNames(names);
				return createToolResponse({
					valid: true,
					metadata: { names: parsed, formatted: parsed.map(formatName) },
					error: null,
				});
			} catch (error) {
				if (error instanceof DatabaseFormatError) {
					return createErrorResponse("PARSE_ERROR", error.message, error.position);
				}
				throw error;
			}
		},
	);
}
