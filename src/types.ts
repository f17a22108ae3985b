export interface ToolResponseEnvelope {
	valid: boolean;
	metadata: Record<string, unknown> | null;
	error: { code: ToolErrorCode; message: string; details?: unknown } | null;
}

export type ToolErrorCode = "PARSE_ERROR" | "NOT_FOUND" | "FORMAT_ERROR";

export function createToolResponse(envelope: ToolResponseEnvelope) {
	return {
		content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
	};
}

export function createErrorResponse(code: ToolErrorCode, message: string, details?: unknown) {
	return createToolResponse({
		valid: false,
		metadata: null,
		error: details === undefined ? { code, message } : { code, message, details },
	});
}
