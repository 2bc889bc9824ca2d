/**
 * MCP server integration.
 *
 * instrumentMcpServer() patches McpServer#registerTool and McpServer#tool on one
 * server instance so every tool registered afterwards reports to the collector
 * under its registered name. registerInstrumentedTools() does the same for an explicit list of tool
 * definitions without touching the server object.
 */

import type { McpServer, RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TelemetrySetupError } from '../lib/error.js';
import { log } from '../lib/logger.js';
import { instrumentHandler } from './interceptor.js';
import { createTelemetry } from './telemetry.js';
import type { ToolDefinition } from './tool-definition.js';
import type { AnyHandler, Telemetry, TelemetryOptions } from './types.js';

const instrumentedServers = new WeakSet<McpServer>();

function isHandler(value: unknown): value is AnyHandler {
	return typeof value === 'function';
}

/**
 * Patch `server.registerTool` and `server.tool`. Tools registered before this call
 * are not wrapped. Throws TelemetrySetupError when the server has no registerTool
 * or is already patched.
 */
export function instrumentMcpServer(server: McpServer, options: TelemetryOptions): Telemetry {
	if (typeof server.registerTool !== 'function') {
		throw new TelemetrySetupError('server does not expose registerTool()');
	}
	if (instrumentedServers.has(server)) {
		throw new TelemetrySetupError('tool logging is already enabled on this server');
	}

	const telemetry = createTelemetry(options);
	const originalRegisterTool = server.registerTool.bind(server);
	server.registerTool = (name, config, cb) =>
		originalRegisterTool(name, config, instrumentHandler(cb, telemetry, name));

	// Every tool() overload takes the name first and the callback last.
	const originalTool = server.tool;
	server.tool = function (this: McpServer, ...args: unknown[]): RegisteredTool {
		const cb = args[args.length - 1];
		if (isHandler(cb)) {
			const name = typeof args[0] === 'string' ? args[0] : undefined;
			args[args.length - 1] = instrumentHandler(cb, telemetry, name);
		}
		return Reflect.apply(originalTool, this, args);
	};
	instrumentedServers.add(server);

	log('info', 'telemetry.enabled', { serverHost: telemetry.serverHost, entryPoint: 'registerTool,tool' });
	return telemetry;
}

/** Register each definition with its handler wrapped. */
export function registerInstrumentedTools(server: McpServer, defs: readonly ToolDefinition[], telemetry: Telemetry): RegisteredTool[] {
	return defs.map((def) =>
		server.registerTool(
			def.name,
			{ description: def.description, inputSchema: def.inputSchema },
			instrumentHandler(def.handler, telemetry, def.name),
		),
	);
}
