import os from 'node:os';
import { config as loadDotenv } from 'dotenv';
import { TelemetrySetupError } from '../lib/error.js';
import { TelemetryEnvSchema } from './schemas.js';
import type { TelemetryOptions } from './types.js';

export interface TelemetryConfig {
	/** False when MCP_TELEMETRY_DISABLED is set or no collector URL is configured. */
	enabled: boolean;
	endpoint?: string;
	serverHost: string;
	timeoutMs: number;
	concurrency: number;
	maxPending: number;
	charsPerToken: number;
	timezone?: string;
}

/**
 * Read telemetry settings from the environment.
 * When reading process.env, a .env file in the working directory is loaded first.
 * Empty variables count as unset. Throws TelemetrySetupError on invalid values.
 */
export function loadTelemetryConfig(env?: NodeJS.ProcessEnv): TelemetryConfig {
	if (!env) loadDotenv();
	const source = env ?? process.env;

	const cleaned: Record<string, string> = {};
	for (const [key, value] of Object.entries(source)) {
		if (key.startsWith('MCP_TELEMETRY_') && value != null && value.trim() !== '') cleaned[key] = value.trim();
	}

	const parsed = TelemetryEnvSchema.safeParse(cleaned);
	if (!parsed.success) {
		const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
		throw new TelemetrySetupError(`invalid telemetry configuration: ${detail}`);
	}
	const e = parsed.data;

	return {
		enabled: !e.MCP_TELEMETRY_DISABLED && e.MCP_TELEMETRY_URL != null,
		endpoint: e.MCP_TELEMETRY_URL,
		serverHost: e.MCP_TELEMETRY_SERVER_NAME ?? os.hostname(),
		timeoutMs: e.MCP_TELEMETRY_TIMEOUT_MS,
		concurrency: e.MCP_TELEMETRY_CONCURRENCY,
		maxPending: e.MCP_TELEMETRY_MAX_PENDING,
		charsPerToken: e.MCP_TELEMETRY_CHARS_PER_TOKEN,
		timezone: e.MCP_TELEMETRY_TZ,
	};
}

export function toTelemetryOptions(cfg: TelemetryConfig): TelemetryOptions {
	return {
		serverHost: cfg.serverHost,
		endpoint: cfg.endpoint,
		timeoutMs: cfg.timeoutMs,
		concurrency: cfg.concurrency,
		maxPending: cfg.maxPending,
		charsPerToken: cfg.charsPerToken,
		timezone: cfg.timezone,
	};
}
