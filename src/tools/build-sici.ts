import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { buildSici } from "../sici/index.js";
import { createToolResponse } from "../types.js";

const controlValue = z.union([z.number().int(), z.string()]);

export function registerBuildSiciTool(server: McpServer): void {
	server.registerTool(
		"build_sici",
		{
			description:
				"Assemble a SICI from its parts and append the check character. Omitted control fields take their defaults; the code structure identifier is derived from the contribution fields.",
			inputSchema: {
				issn: z.string().optional().describe("ISSN, e.g., '0361-526X'"),
				chronology: z.string().optional().describe("Date of the item, e.g., '199502/03'"),
				enumeration: z.string().optional().describe("Enumeration kept as given"),
				volume: z.string().optional(),
				issue: z.string().optional(),
				supplOrIdx: z.string().optional().describe("'+' for a supplement, '*' for an index"),
				location: z.string().optional().describe("Location in the item, e.g., a page"),
				titleCode: z.string().optional().describe("Title code of up to six characters"),
				localNumber: z.string().optional(),
				csi: controlValue.optional().describe("Code structure identifier (1|2|3)"),
				dpi: controlValue.optional().describe("Derivative part identifier (0|1|2|3)"),
				mfi: z.string().optional().describe("Medium/format identifier, e.g., 'TX'"),
				version: controlValue.optional().describe("Standard version; only 2 is supported"),
			},
		},
		async (fields) => {
			const sici = buildSici(fields);
			const snapshot = sici.toJSON();
			return createToolResponse({
				valid: snapshot.valid,
				metadata: {
					sici: snapshot.sici,
					checkChar: sici.checkChar(),
					fields: snapshot.fields,
					problems: snapshot.problems,
				},
				error: snapshot.valid
					? null
					: { code: "INVALID_SICI", message: "SICI does not conform to Z39.56" },
			});
		},
	);
}
