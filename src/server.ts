import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DocumentCache } from "./cache/document-cache";
import { type Config, parserOptionsFromConfig } from "./config";
import { logger } from "./logger";
import type { JournalsFile } from "./model/journals";
import { registerDescribeEntryTool } from "./tools/describe-entry";
import { registerParseBibtexTool } from "./tools/parse-bibtex";
import { registerParseNamesTool } from "./tools/parse-names";

/**
 * Module-level document cache. Persists across stateless transport requests,
 * which each build a fresh McpServer.
 */
let sharedCache: DocumentCache | null = null;

function getCache(): DocumentCache {
	if (!sharedCache) {
		sharedCache = new DocumentCache();
	}
	return sharedCache;
}

/** Reset the shared cache (for testing). */
export function resetCache(): void {
	sharedCache = null;
}

/**
 * Register all bibkit tools on the given MCP server. `journals` resolves
 * journal macros to their names in describe_entry.
 */
export function registerTools(server: McpServer, config: Config, journals?: JournalsFile): void {
	const cache = getCache();
	const options = parserOptionsFromConfig(config);

	registerParseBibtexTool(server, cache, options);
	registerParseNamesTool(server);
	registerDescribeEntryTool(server, cache, options, journals);
	logger.debug("Registered tools: parse_bibtex, parse_names, describe_entry");
}

export function createServer(config: Config, journals?: JournalsFile): McpServer {
	const server = new McpServer(
		{ name: "bibkit", version: "0.1.0" },
		{ capabilities: { logging: {} } },
	);

	registerTools(server, config, journals);

	return server;
}
