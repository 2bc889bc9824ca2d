import pLimit from 'p-limit';
import { postJson, DEFAULT_POST_TIMEOUT_MS } from '../lib/http.js';
import { getErrorMessage, isAbortError } from '../lib/error.js';
import { log } from '../lib/logger.js';
import { ExecutionRecordSchema } from './schemas.js';
import type { ExecutionRecord, RecordTransport } from './types.js';

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_MAX_PENDING = 1000;

export interface TelemetryTransportOptions {
	endpoint: string;
	timeoutMs?: number;
	concurrency?: number;
	maxPending?: number;
}

/**
 * Delivers execution records to the collector.
 *
 * send() is a single best-effort POST that resolves to success/failure and never
 * rejects. sendAsync() hands the record to a concurrency limiter and returns at
 * once; once maxPending records are waiting, new ones are dropped.
 */
export class TelemetryTransport implements RecordTransport {
	readonly endpoint: string;
	private readonly timeoutMs: number;
	private readonly maxPending: number;
	private readonly limit: ReturnType<typeof pLimit>;
	private readonly inflight = new Set<Promise<boolean>>();
	private droppedCount = 0;

	constructor({ endpoint, timeoutMs = DEFAULT_POST_TIMEOUT_MS, concurrency = DEFAULT_CONCURRENCY, maxPending = DEFAULT_MAX_PENDING }: TelemetryTransportOptions) {
		for (const [key, value] of [['concurrency', concurrency], ['maxPending', maxPending]] as const) {
			if (!Number.isInteger(value) || value < 1) {
				throw new RangeError(`${key} must be a positive integer, got ${value}`);
			}
		}
		this.endpoint = endpoint;
		this.timeoutMs = timeoutMs;
		this.maxPending = maxPending;
		this.limit = pLimit(concurrency);
	}

	async send(record: ExecutionRecord): Promise<boolean> {
		try {
			const body = JSON.stringify(ExecutionRecordSchema.parse(record));
			await postJson(this.endpoint, body, { timeoutMs: this.timeoutMs });
			return true;
		} catch (err: unknown) {
			log('warn', 'telemetry.delivery_failed', {
				endpoint: this.endpoint,
				executionId: record.execution_id,
				tool: record.tool_name,
				reason: isAbortError(err) ? `timeout (${this.timeoutMs}ms)` : getErrorMessage(err),
			});
			return false;
		}
	}

	sendAsync(record: ExecutionRecord): void {
		if (this.limit.pendingCount >= this.maxPending) {
			this.droppedCount += 1;
			log('warn', 'telemetry.record_dropped', {
				executionId: record.execution_id,
				tool: record.tool_name,
				maxPending: this.maxPending,
			});
			return;
		}
		// send() never rejects
		const task = this.limit(() => this.send(record));
		this.inflight.add(task);
		void task.finally(() => this.inflight.delete(task));
	}

	/** Waits until every accepted record has been attempted. */
	async flush(): Promise<void> {
		while (this.inflight.size > 0) {
			await Promise.allSettled([...this.inflight]);
		}
	}

	get pending(): number {
		return this.limit.activeCount + this.limit.pendingCount;
	}

	get dropped(): number {
		return this.droppedCount;
	}
}
