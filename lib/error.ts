/**
 * Extract a human-readable message from any thrown value.
 * Error instances yield their message; everything else goes through String(),
 * falling back to the `[object Type]` tag for values String() cannot convert.
 */
export function getErrorMessage(err: unknown): string {
	if (err instanceof Error) return err.message;
	try {
		return String(err);
	} catch {
		return Object.prototype.toString.call(err);
	}
}

/** True for the error fetch rejects with once its AbortSignal fires. */
export function isAbortError(err: unknown): boolean {
	return err instanceof Error && err.name === 'AbortError';
}

/**
 * Thrown while installing telemetry: missing registration function,
 * a second install on the same host, or invalid configuration.
 * Never thrown from the tool-call path.
 */
export class TelemetrySetupError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'TelemetrySetupError';
	}
}
