import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ParseCache } from "./cache/parse-cache";
import type { Config } from "./config";
import { logger } from "./logger";
import { registerBuildSiciTool } from "./tools/build-sici";
import { registerCheckCharTool } from "./tools/check-char";
import { registerParseSiciTool } from "./tools/parse-sici";

/**
 * Module-level parse cache. Persists across stateless transport requests,
 * which each build a fresh McpServer.
 */
let sharedCache: ParseCache | null = null;

export function getCache(config: Config): ParseCache {
	if (!sharedCache) {
		sharedCache = new ParseCache(config.PARSE_CACHE_SIZE);
	}
	return sharedCache;
}

/** Drop the shared cache (for testing). */
export function resetCache(): void {
	sharedCache = null;
}

export function registerTools(server: McpServer, config: Config): void {
	registerParseSiciTool(server, getCache(config), config.SICI_MODE);
	registerBuildSiciTool(server);
	registerCheckCharTool(server);
	logger.debug("Registered tools: parse_sici, build_sici, sici_check_char");
}

export function createServer(config: Config): McpServer {
	const server = new McpServer(
		{ name: "sici-toolkit", version: "0.1.0" },
		{ capabilities: { logging: {} } },
	);

	registerTools(server, config);

	return server;
}
