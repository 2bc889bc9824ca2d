/**
 * Local diagnostics for the telemetry shim.
 *
 * Everything goes to stderr as one JSON object per line: MCP servers on the
 * stdio transport reserve stdout for JSON-RPC.
 * Threshold comes from MCP_TELEMETRY_LOG_LEVEL (debug | info | warn | error | silent, default warn).
 */

import { nowIso } from './datetime.js';
import { getErrorMessage } from './error.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

function isLevelName(v: string): v is keyof typeof LEVEL_RANK {
	return Object.prototype.hasOwnProperty.call(LEVEL_RANK, v);
}

function threshold(): number {
	const raw = String(process.env.MCP_TELEMETRY_LOG_LEVEL || 'warn').toLowerCase();
	return isLevelName(raw) ? LEVEL_RANK[raw] : LEVEL_RANK.warn;
}

function safeJson(v: unknown): string {
	try { return JSON.stringify(v); } catch { return '[unserializable]'; }
}

export function log(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
	if (LEVEL_RANK[level] < threshold()) return;
	console.error(safeJson({ ts: nowIso(), level, event, ...fields }));
}

/** Log a failure raised inside the telemetry machinery itself. */
export function logError(scope: string, err: unknown, context: Record<string, unknown> = {}): void {
	log('error', `${scope}.error`, {
		...context,
		error: getErrorMessage(err),
		stack: err instanceof Error ? err.stack : undefined,
	});
}

/** Debug mirror of every execution record handed to the transport. */
export function logToolRun(run: { tool_name: string; status: string; duration_ms: number; execution_id: string }): void {
	log('debug', 'tool.run', {
		tool: run.tool_name,
		status: run.status,
		ms: run.duration_ms,
		executionId: run.execution_id,
	});
}
