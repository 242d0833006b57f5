/**
 * Typed configuration - all config lives in the environment, parsed with Zod
 * at startup. App exits immediately on invalid config.
 *
 * Anova BLE bridge configuration covering:
 * - Server settings
 * - Cooker identity
 * - Connection retry and scan timeouts
 * - Reply framing policy per command class
 * - Polling
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Optional string - empty string becomes undefined.
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

const positiveMs = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8084).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("AnovaBridge").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Cooker Identity
  // ==========================================================================
  ANOVA_ADDRESS: optionalString.describe(
    "Cooker BLE address; the first discovered cooker is used when empty",
  ),
  ANOVA_NAME: z
    .string()
    .default("Anova Precision Cooker")
    .describe("Display name for the cooker"),

  // ==========================================================================
  // Connection
  // ==========================================================================
  CONNECT_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1)
    .default(3)
    .describe("Connection attempts before giving up"),
  CONNECT_TIMEOUT_MS: positiveMs(10000).describe(
    "Per-attempt link timeout (raised to the 10s stack floor)",
  ),
  LOOKUP_TIMEOUT_MS: positiveMs(2000).describe(
    "Direct address lookup timeout before falling back to a scan",
  ),
  SCAN_TIMEOUT_MS: positiveMs(15000).describe("Discovery scan duration"),
  FALLBACK_SCAN_TIMEOUT_MS: positiveMs(5000).describe(
    "Scan used during connect when the direct lookup misses",
  ),
  POLLING_INTERVAL_MS: positiveMs(10000).describe(
    "Interval between status refresh cycles",
  ),
  COMMAND_DELAY_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(250)
    .describe("Pause between the round trips of one refresh cycle"),

  // ==========================================================================
  // Reply Framing
  // ==========================================================================
  STATUS_SILENCE_MS: positiveMs(3000).describe(
    "Silence window that ends a status-class reply",
  ),
  STATUS_MIN_WAIT_MS: positiveMs(1500).describe(
    "Minimum wait before a status-class reply can complete",
  ),
  STATUS_TIMEOUT_MS: positiveMs(8000).describe(
    "Overall timeout for a status-class exchange",
  ),
  ACK_SILENCE_MS: positiveMs(1000).describe(
    "Silence window that ends an acknowledge-class reply",
  ),
  ACK_MIN_WAIT_MS: positiveMs(500).describe(
    "Minimum wait before an acknowledge-class reply can complete",
  ),
  ACK_TIMEOUT_MS: positiveMs(5000).describe(
    "Overall timeout for an acknowledge-class exchange",
  ),

  // ==========================================================================
  // Feature Flags
  // ==========================================================================
  ANOVA_READ_TIMER: envBoolean(false).describe(
    "Add a 'read timer' round trip to every refresh cycle",
  ),
});

// Parse at startup - exits immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Reply framing policies for the exchange layer.
 */
export function getFramingConfig(): Readonly<{
  status: { silenceWindowMs: number; minimumWaitMs: number; timeoutMs: number };
  acknowledge: {
    silenceWindowMs: number;
    minimumWaitMs: number;
    timeoutMs: number;
  };
}> {
  return {
    status: {
      silenceWindowMs: config.STATUS_SILENCE_MS,
      minimumWaitMs: config.STATUS_MIN_WAIT_MS,
      timeoutMs: config.STATUS_TIMEOUT_MS,
    },
    acknowledge: {
      silenceWindowMs: config.ACK_SILENCE_MS,
      minimumWaitMs: config.ACK_MIN_WAIT_MS,
      timeoutMs: config.ACK_TIMEOUT_MS,
    },
  };
}

/**
 * Connection settings for the connection manager.
 */
export function getConnectionConfig(): Readonly<{
  attempts: number;
  timeoutMs: number;
  lookupTimeoutMs: number;
  scanTimeoutMs: number;
  fallbackScanTimeoutMs: number;
}> {
  return {
    attempts: config.CONNECT_ATTEMPTS,
    timeoutMs: config.CONNECT_TIMEOUT_MS,
    lookupTimeoutMs: config.LOOKUP_TIMEOUT_MS,
    scanTimeoutMs: config.SCAN_TIMEOUT_MS,
    fallbackScanTimeoutMs: config.FALLBACK_SCAN_TIMEOUT_MS,
  };
}
