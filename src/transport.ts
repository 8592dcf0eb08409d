import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { type Request, type Response } from "express";
import type { Config } from "./config";
import { loadConfig } from "./config";
import { logger } from "./logger";
import { createServer, getCache } from "./server";

const sseTransports = new Map<string, SSEServerTransport>();

function jsonRpcError(code: number, message: string) {
	return { jsonrpc: "2.0", error: { code, message }, id: null };
}

function methodNotAllowed(_req: Request, res: Response): void {
	res.writeHead(405).end(JSON.stringify(jsonRpcError(-32000, "Method not allowed.")));
}

function logCloseFailure(what: string) {
	return (error: unknown) => logger.warn(`${what} close failed:`, error);
}

export function createApp(config?: Config) {
	const resolvedConfig = config ?? loadConfig();
	const app = express();
	app.use(express.json());

	// Streamable HTTP, stateless: one McpServer per request.
	app.post("/mcp", async (req: Request, res: Response) => {
		const server = createServer(resolvedConfig);
		try {
			const transport = new StreamableHTTPServerTransport({
				sessionIdGenerator: undefined,
			});
			await server.connect(transport);
			await transport.handleRequest(req, res, req.body);
			res.on("close", () => {
				transport.close().catch(logCloseFailure("Transport"));
				server.close().catch(logCloseFailure("Server"));
			});
		} catch (error) {
			logger.error("MCP request error:", error);
			if (!res.headersSent) {
				res.status(500).json(jsonRpcError(-32603, "Internal server error"));
			}
		}
	});

	app.get("/mcp", methodNotAllowed);
	app.delete("/mcp", methodNotAllowed);

	// Legacy SSE clients.
	app.get("/sse", async (_req: Request, res: Response) => {
		const server = createServer(resolvedConfig);
		try {
			const transport = new SSEServerTransport("/messages", res);
			sseTransports.set(transport.sessionId, transport);
			logger.info("SSE client connected, sessionId:", transport.sessionId);

			res.on("close", () => {
				sseTransports.delete(transport.sessionId);
				server.close().catch(logCloseFailure("Server"));
				logger.info("SSE client disconnected, sessionId:", transport.sessionId);
			});

			await server.connect(transport);
		} catch (error) {
			logger.error("SSE connection error:", error);
			if (!res.headersSent) {
				res.status(500).end();
			}
		}
	});

	app.post("/messages", async (req: Request, res: Response) => {
		const { sessionId } = req.query;
		const transport = typeof sessionId === "string" ? sseTransports.get(sessionId) : undefined;

		if (!transport) {
			res.status(400).json({ error: "Unknown or expired session" });
			return;
		}

		try {
			await transport.handlePostMessage(req, res, req.body);
		} catch (error) {
			logger.error("SSE message error:", error);
			if (!res.headersSent) {
				res.status(500).json({ error: "Internal server error" });
			}
		}
	});

	app.get("/health", (_req: Request, res: Response) => {
		res.status(200).json({ status: "ok", parseCache: getCache(resolvedConfig).stats() });
	});

	return app;
}
