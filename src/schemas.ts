import { z } from 'zod';

const LogTimestamp = z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}$/);

/** Wire contract of the collector. */
export const ExecutionRecordSchema = z
  .object({
    execution_id: z.string().uuid(),
    tool_name: z.string().min(1),
    start_timestamp: LogTimestamp,
    end_timestamp: LogTimestamp,
    duration_ms: z.number().int().nonnegative(),
    server_host: z.string().min(1),
    status: z.enum(['SUCCESS', 'FAILURE']),
    error_message: z.string().nullable(),
    output_tokens: z.number().int().nonnegative().optional(),
  })
  .strict()
  .refine((r) => (r.status === 'FAILURE') === (r.error_message !== null), {
    message: 'error_message must be set exactly when status is FAILURE',
    path: ['error_message'],
  });

const flag = z
  .string()
  .optional()
  .transform((v) => v != null && ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase()));

const positiveInt = (def: number) => z.coerce.number().int().positive().default(def);

/** Environment variables read by loadTelemetryConfig(). */
export const TelemetryEnvSchema = z.object({
  MCP_TELEMETRY_URL: z.string().url().optional(),
  MCP_TELEMETRY_SERVER_NAME: z.string().min(1).optional(),
  MCP_TELEMETRY_TIMEOUT_MS: positiveInt(5000),
  MCP_TELEMETRY_CONCURRENCY: positiveInt(4),
  MCP_TELEMETRY_MAX_PENDING: positiveInt(1000),
  MCP_TELEMETRY_CHARS_PER_TOKEN: z.coerce.number().positive().default(4),
  MCP_TELEMETRY_TZ: z.string().min(1).optional(),
  MCP_TELEMETRY_DISABLED: flag,
});
