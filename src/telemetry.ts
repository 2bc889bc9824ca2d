import { TelemetrySetupError, getErrorMessage } from '../lib/error.js';
import { isValidTimeZone } from '../lib/datetime.js';
import { createTokenEstimator } from '../lib/tokens.js';
import { TelemetryTransport } from './transport.js';
import type { RecordTransport, Telemetry, TelemetryOptions } from './types.js';

function asSetupError<T>(fn: () => T): T {
	try {
		return fn();
	} catch (err: unknown) {
		throw new TelemetrySetupError(getErrorMessage(err));
	}
}

/**
 * Resolve install-time options into the immutable context every wrapper shares.
 * Throws TelemetrySetupError on unusable options.
 */
export function createTelemetry(options: TelemetryOptions): Telemetry {
	const { serverHost, endpoint, timezone } = options;
	if (!serverHost) {
		throw new TelemetrySetupError('serverHost is required');
	}
	if (timezone && !isValidTimeZone(timezone)) {
		throw new TelemetrySetupError(`unknown time zone: ${timezone}`);
	}

	let transport: RecordTransport | undefined = options.transport;
	if (!transport) {
		if (!endpoint) {
			throw new TelemetrySetupError('either endpoint or transport is required');
		}
		if (!URL.canParse(endpoint)) {
			throw new TelemetrySetupError(`endpoint is not a valid URL: ${endpoint}`);
		}
		transport = asSetupError(() => new TelemetryTransport({
			endpoint,
			timeoutMs: options.timeoutMs,
			concurrency: options.concurrency,
			maxPending: options.maxPending,
		}));
	}

	const estimateTokens = options.estimateTokens ?? asSetupError(() => createTokenEstimator(options.charsPerToken));

	return Object.freeze({ serverHost, transport, estimateTokens, timezone });
}
