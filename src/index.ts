/**
 * Anova BLE Bridge - Application Entry Point
 *
 * Sets up:
 * - Cooker identity (configured address or first discovered cooker)
 * - BLE client over noble
 * - Status monitoring loop
 * - Hono server with request ID tracing and global error handling
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import { config, getConnectionConfig, getFramingConfig } from "./config.js";
import { AnovaClient } from "./cooker/index.js";
import {
  type DeviceIdentity,
  createDeviceIdentity,
  formatDeviceError,
  isPlaceholderAddress,
} from "./device/index.js";
import { createLogger } from "./logger.js";
import { StatusMonitor } from "./monitoring/index.js";
import type { BleTransport } from "./transport/index.js";
import { NobleTransport } from "./transport/noble.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  ANOVA BLE BRIDGE");
console.log("========================================");
console.log("");

const connectionConfig = getConnectionConfig();

// Log configuration summary
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    address: config.ANOVA_ADDRESS ?? "(discover)",
    connectAttempts: connectionConfig.attempts,
    connectTimeoutMs: connectionConfig.timeoutMs,
    pollingIntervalMs: config.POLLING_INTERVAL_MS,
    readTimer: config.ANOVA_READ_TIMER,
  },
  "Configuration loaded",
);

// =============================================================================
// COOKER IDENTITY
// =============================================================================

/**
 * Configured cooker, or the first one a scan finds.
 */
async function resolveIdentity(
  transport: BleTransport,
): Promise<DeviceIdentity | null> {
  if (config.ANOVA_ADDRESS) {
    const identity = createDeviceIdentity(config.ANOVA_ADDRESS, config.ANOVA_NAME);
    if (identity.isErr()) {
      log.fatal(formatDeviceError(identity.error));
      return null;
    }
    if (isPlaceholderAddress(identity.value.address)) {
      log.warn(
        { address: identity.value.address },
        "ANOVA_ADDRESS looks like a placeholder; set your cooker's real address",
      );
    }
    return identity.value;
  }

  log.info("ANOVA_ADDRESS not set; scanning for cookers...");
  const devices = await AnovaClient.discoverDevices(
    transport,
    connectionConfig.scanTimeoutMs,
  );
  const first = devices[0];
  if (!first) {
    log.fatal("No cooker found. Is it powered on and in range?");
    return null;
  }
  if (devices.length > 1) {
    log.warn({ devices }, "Several cookers found; using the first");
  }
  return first;
}

// =============================================================================
// STARTUP
// =============================================================================

async function main(): Promise<void> {
  const transport = new NobleTransport();

  const identity = await resolveIdentity(transport);
  if (!identity) {
    process.exit(1);
  }

  const client = new AnovaClient(transport, identity, {
    connection: {
      lookupTimeoutMs: connectionConfig.lookupTimeoutMs,
      scanTimeoutMs: connectionConfig.fallbackScanTimeoutMs,
    },
    policies: getFramingConfig(),
    commandDelayMs: config.COMMAND_DELAY_MS,
    readTimer: config.ANOVA_READ_TIMER,
  });
  const monitor = new StatusMonitor(client, config.POLLING_INTERVAL_MS);
  const app = createApp(client, monitor);

  const server = serve(
    {
      fetch: app.fetch,
      port: config.PORT,
      hostname: "0.0.0.0", // Bind to all interfaces for remote access
    },
    (info) => {
      log.info(
        { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
        `🚀 ${config.APP_NAME} listening on port ${info.port}`,
      );
    },
  );

  const connected = await client.connect(
    connectionConfig.attempts,
    connectionConfig.timeoutMs,
  );
  if (connected) {
    log.info({ device: identity, status: client.status }, "Cooker connected");
  } else {
    log.warn({ device: identity }, "Cooker not reachable yet; polling will retry");
  }

  // Start the monitoring loop (runs in background)
  monitor.start().catch((error: unknown) => {
    log.error({ error }, "Monitoring loop crashed");
  });

  // ===========================================================================
  // GRACEFUL SHUTDOWN
  // ===========================================================================

  const shutdown = async (signal: string) => {
    log.info({ signal }, `${signal} received. Shutting down gracefully...`);

    // Stop monitoring loop
    monitor.stop();

    // Release the BLE link
    await client.disconnect();

    server.close();
    log.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ error }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((error: unknown) => {
  log.fatal({ error }, "Startup failed");
  process.exit(1);
});
