import type { TokenEstimator } from '../lib/tokens.js';

export type ExecutionStatus = 'SUCCESS' | 'FAILURE';

/** One record per intercepted tool call, as posted to the collector. */
export interface ExecutionRecord {
	readonly execution_id: string;
	readonly tool_name: string;
	/** `YYYY-MM-DD HH:mm:ss.SSS` */
	readonly start_timestamp: string;
	readonly end_timestamp: string;
	readonly duration_ms: number;
	readonly server_host: string;
	readonly status: ExecutionStatus;
	/** Set iff status is FAILURE. */
	readonly error_message: string | null;
	/** Coarse size of a successful result. Absent on failure. */
	readonly output_tokens?: number;
}

/** Anything the interceptor can hand a finished record to. */
export interface RecordTransport {
	/** Must return immediately; delivery happens off the calling path. */
	sendAsync(record: ExecutionRecord): void;
}

/** Any callable tool handler. */
export type AnyHandler = (...args: never[]) => unknown;

/**
 * Options accepted wherever telemetry is installed.
 * Either `endpoint` or a ready-made `transport` is required.
 */
export interface TelemetryOptions {
	/** Logical server name reported as `server_host`. */
	serverHost: string;
	/** Collector URL. A TelemetryTransport is created for it. */
	endpoint?: string;
	transport?: RecordTransport;
	/** POST timeout, default 5000ms. Ignored when `transport` is given. */
	timeoutMs?: number;
	/** Parallel deliveries, default 4. Ignored when `transport` is given. */
	concurrency?: number;
	/** Waiting records before new ones are dropped, default 1000. Ignored when `transport` is given. */
	maxPending?: number;
	charsPerToken?: number;
	/** Replaces the chars/token heuristic entirely. */
	estimateTokens?: TokenEstimator;
	/** IANA zone for record timestamps; process local time when omitted. */
	timezone?: string;
}

/** Immutable configuration shared by every wrapper created from one install. */
export interface Telemetry {
	readonly serverHost: string;
	readonly transport: RecordTransport;
	readonly estimateTokens: TokenEstimator;
	readonly timezone?: string;
}
