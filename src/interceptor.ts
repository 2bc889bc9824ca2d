/**
 * Tool-call interceptor.
 *
 * Wraps a handler so every call produces exactly one ExecutionRecord
 * (id, timing, outcome, output size) for the transport, while the caller gets
 * back exactly what the handler returned or threw. Native promises are observed on
 * settle and handed back untouched; any other thenable is a plain return value.
 */

import { randomUUID } from 'node:crypto';
import { formatLogTimestamp } from '../lib/datetime.js';
import { getErrorMessage } from '../lib/error.js';
import { logError, logToolRun } from '../lib/logger.js';
import { createTelemetry } from './telemetry.js';
import type { AnyHandler, ExecutionRecord, Telemetry } from './types.js';

type Outcome =
	| { status: 'SUCCESS'; value: unknown }
	| { status: 'FAILURE'; error: unknown };

function safeEstimate(telemetry: Telemetry, value: unknown, toolName: string): number | undefined {
	try {
		return telemetry.estimateTokens(value);
	} catch (err: unknown) {
		logError('token_estimator', err, { tool: toolName });
		return undefined;
	}
}

export function buildExecutionRecord(
	telemetry: Telemetry,
	call: { executionId: string; toolName: string; startMs: number; endMs: number },
	outcome: Outcome,
): ExecutionRecord {
	const base = {
		execution_id: call.executionId,
		tool_name: call.toolName,
		start_timestamp: formatLogTimestamp(call.startMs, telemetry.timezone),
		end_timestamp: formatLogTimestamp(call.endMs, telemetry.timezone),
		duration_ms: Math.max(0, Math.round(call.endMs - call.startMs)),
		server_host: telemetry.serverHost,
	};
	let record: ExecutionRecord;
	if (outcome.status === 'SUCCESS') {
		const outputTokens = safeEstimate(telemetry, outcome.value, call.toolName);
		record = outputTokens === undefined
			? { ...base, status: 'SUCCESS', error_message: null }
			: { ...base, status: 'SUCCESS', error_message: null, output_tokens: outputTokens };
	} else {
		record = { ...base, status: 'FAILURE', error_message: getErrorMessage(outcome.error) };
	}
	return Object.freeze(record);
}

/**
 * Wrap `handler` so each call is timed and reported.
 *
 * @param toolName reported as `tool_name`; defaults to the handler's own name
 */
export function instrumentHandler<F extends AnyHandler>(handler: F, telemetry: Telemetry, toolName?: string): F;
export function instrumentHandler(handler: AnyHandler, telemetry: Telemetry, toolName?: string): AnyHandler {
	const name = toolName || handler.name || 'anonymous';

	const wrapper = function (this: unknown, ...args: never[]): unknown {
		const executionId = randomUUID();
		const startMs = Date.now();

		// Never throws: observability problems stay on the side channel.
		const finish = (outcome: Outcome): void => {
			try {
				const record = buildExecutionRecord(telemetry, { executionId, toolName: name, startMs, endMs: Date.now() }, outcome);
				logToolRun(record);
				telemetry.transport.sendAsync(record);
			} catch (err: unknown) {
				logError('interceptor', err, { tool: name, executionId });
			}
		};

		let result: unknown;
		try {
			result = handler.apply(this, args);
		} catch (err: unknown) {
			finish({ status: 'FAILURE', error: err });
			throw err;
		}

		// Only native promises are observed: calling then() on another thenable may re-run its work.
		if (result instanceof Promise) {
			void result.then(
				(value) => finish({ status: 'SUCCESS', value }),
				(error: unknown) => finish({ status: 'FAILURE', error }),
			);
			return result;
		}

		finish({ status: 'SUCCESS', value: result });
		return result;
	};

	Object.defineProperty(wrapper, 'name', { value: handler.name, configurable: true });
	return wrapper;
}

/**
 * One-off form: wrap a single handler for `serverHost`, posting to `endpoint`.
 * Prefer createTelemetry() + instrumentHandler() when wrapping many handlers
 * so they share one delivery queue.
 */
export function toolCallInterceptor<F extends AnyHandler>(handler: F, serverHost: string, endpoint: string): F {
	return instrumentHandler(handler, createTelemetry({ serverHost, endpoint }));
}
