import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ParseCache } from "../cache/parse-cache.js";
import { logger } from "../logger.js";
import { Sici, SiciError, type SiciMode, SiciModeSchema } from "../sici/index.js";
import { type ToolResponseEnvelope, createToolResponse, errorEnvelope } from "../types.js";

export function parseToEnvelope(raw: string, mode: SiciMode): ToolResponseEnvelope {
	if (!raw) {
		return errorEnvelope("EMPTY_INPUT", "No string to parse");
	}
	const sici = new Sici({ mode });
	try {
		const outcome = sici.parse(raw);
		if (outcome.roundTrip === undefined) {
			// lax mode turns strict-mode aborts into an outcome without a round trip
			return errorEnvelope("UNSUPPORTED_VERSION", `Unsupported SICI version in "${raw}"`);
		}
		const snapshot = sici.toJSON();
		return {
			valid: outcome.valid,
			metadata: {
				roundTrip: outcome.roundTrip,
				canonical: snapshot.sici,
				checkChar: sici.checkChar(),
				fields: snapshot.fields,
				problems: snapshot.problems,
			},
			error: outcome.valid
				? null
				: { code: "INVALID_SICI", message: "SICI does not conform to Z39.56" },
		};
	} catch (error) {
		if (error instanceof SiciError) {
			return errorEnvelope(error.code, error.message, sici.listProblems());
		}
		throw error;
	}
}

export function registerParseSiciTool(
	server: McpServer,
	cache: ParseCache,
	defaultMode: SiciMode,
): void {
	server.registerTool(
		"parse_sici",
		{
			description:
				"Parse a Serial Item and Contribution Identifier (SICI, ANSI/NISO Z39.56) into its item, contribution and control segments. Reports every problem found and whether the canonical form reproduces the input exactly.",
			inputSchema: {
				sici: z
					.string()
					.min(1)
					.describe("SICI to parse, e.g., '0066-4200(1990)25<>1.0.TX;2-S'"),
				mode: z
					.string()
					.optional()
					.describe("'strict' fails on any problem, 'lax' reports problems (default)"),
			},
		},
		async ({ sici, mode }) => {
			const resolvedMode = SiciModeSchema.safeParse(mode ?? defaultMode);
			if (!resolvedMode.success) {
				return createToolResponse(
					errorEnvelope("INVALID_MODE", `Invalid mode "${mode}": expected "strict" or "lax"`),
				);
			}

			const cached = cache.get(resolvedMode.data, sici);
			if (cached) {
				logger.debug("parse_sici cache hit:", sici);
				return createToolResponse(cached);
			}

			const envelope = parseToEnvelope(sici, resolvedMode.data);
			cache.set(resolvedMode.data, sici, envelope);
			return createToolResponse(envelope);
		},
	);
}
