import { createServices } from "@/lib/app";
import { loadConfig, redactConfig, type AppConfig } from "@/lib/config";
import { ConfigError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error("❌ Invalid configuration:");
      for (const issue of error.issues) {
        console.error(`   ${issue.field}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const logger = createLogger({ level: config.logLevel });
  logger.info({ config: redactConfig(config) }, "Starting slot watcher");

  const services = createServices(config, logger);
  services.engine.start(config.sync.pollIntervalMs);
  services.telegram?.startPolling();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "Shutting down");
    await Promise.all([services.engine.stop(), services.telegram?.stop()]);
    services.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
