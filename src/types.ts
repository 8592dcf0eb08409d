export interface ToolResponseEnvelope {
	valid: boolean;
	metadata: Record<string, unknown> | null;
	error: { code: string; message: string; details?: unknown } | null;
}

export function createToolResponse(envelope: ToolResponseEnvelope) {
	return {
		content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
	};
}

export function errorEnvelope(code: string, message: string, details?: unknown): ToolResponseEnvelope {
	return {
		valid: false,
		metadata: null,
		error: details === undefined ? { code, message } : { code, message, details },
	};
}
