import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { log } from '../lib/logger.js';
import { loadTelemetryConfig, toTelemetryOptions } from './config.js';
import { instrumentMcpServer } from './mcp.js';
import type { Telemetry } from './types.js';

export { instrumentHandler, toolCallInterceptor, buildExecutionRecord } from './interceptor.js';
export { enableToolLogging, instrumentRegistration } from './patcher.js';
export type { DecoratorToolHost, ToolDecorator, ToolRegistration, InstrumentRegistrationOptions } from './patcher.js';
export { instrumentMcpServer, registerInstrumentedTools } from './mcp.js';
export { createTelemetry } from './telemetry.js';
export { TelemetryTransport } from './transport.js';
export { loadTelemetryConfig, toTelemetryOptions } from './config.js';
export type { TelemetryConfig } from './config.js';
export { ExecutionRecordSchema } from './schemas.js';
export { TelemetrySetupError } from '../lib/error.js';
export { DEFAULT_CHARS_PER_TOKEN, estimateOutputTokens } from '../lib/tokens.js';
export type { TokenEstimator } from '../lib/tokens.js';
export type { ToolDefinition } from './tool-definition.js';
export type { AnyHandler, ExecutionRecord, ExecutionStatus, RecordTransport, Telemetry, TelemetryOptions } from './types.js';

/**
 * Environment-driven setup for an MCP server: call once, before registering tools.
 *
 * @returns the telemetry context, or null when telemetry is disabled or no collector URL is set
 */
export function setupToolTelemetry(server: McpServer, env?: NodeJS.ProcessEnv): Telemetry | null {
	const cfg = loadTelemetryConfig(env);
	if (!cfg.enabled) {
		log('info', 'telemetry.disabled', { reason: cfg.endpoint ? 'MCP_TELEMETRY_DISABLED' : 'MCP_TELEMETRY_URL not set' });
		return null;
	}
	return instrumentMcpServer(server, toTelemetryOptions(cfg));
}
