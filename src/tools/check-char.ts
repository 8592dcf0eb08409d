import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { calculateCheckChar, extractCheckChar } from "../sici/index.js";
import { createToolResponse, errorEnvelope } from "../types.js";

export function registerCheckCharTool(server: McpServer): void {
	server.registerTool(
		"sici_check_char",
		{
			description:
				"Compute the check character of a SICI ending in '-', or verify the check character of a complete SICI.",
			inputSchema: {
				sici: z
					.string()
					.min(1)
					.describe("SICI with or without its check character, e.g., '0066-4200(1990)25<>1.0.TX;2-'"),
			},
		},
		async ({ sici }) => {
			if (sici.endsWith("-")) {
				const checkChar = calculateCheckChar(sici);
				return createToolResponse({
					valid: true,
					metadata: { checkChar, sici: sici + checkChar },
					error: null,
				});
			}

			const given = extractCheckChar(sici);
			if (given === undefined) {
				return createToolResponse(
					errorEnvelope(
						"PARSE_ERROR",
						`"${sici}" does not end in "-" or "-" followed by a check character`,
					),
				);
			}

			const prefix = sici.slice(0, -1);
			const checkChar = calculateCheckChar(prefix);
			const matches = checkChar === given;
			return createToolResponse({
				valid: matches,
				metadata: { checkChar, given, sici: prefix + checkChar },
				error: matches
					? null
					: {
							code: "CHECK_CHAR_MISMATCH",
							message: `Check character "${given}" should be "${checkChar}"`,
						},
			});
		},
	);
}
