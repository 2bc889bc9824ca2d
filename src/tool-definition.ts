import type { ZodRawShape } from 'zod';
import type { ToolCallback } from '@modelcontextprotocol/sdk/server/mcp.js';

/**
 * A tool registered through registerInstrumentedTools(): the explicit,
 * patch-free way to get every handler wrapped.
 */
export interface ToolDefinition {
	/** MCP tool name (e.g. 'get_ticker'); also reported as `tool_name`. */
	name: string;
	/** Shown to the LLM. */
	description: string;
	/** Zod raw shape of the tool arguments. */
	inputSchema: ZodRawShape;
	handler: ToolCallback<ZodRawShape>;
}
