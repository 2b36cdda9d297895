import dotenv from "dotenv";
dotenv.config();

import { ServiceContainer } from "@di/ServiceContainer";
import { isSuccess } from "@core/types";
import { IHubService } from "@core/interfaces";
import { SHUTDOWN_FORCE_EXIT_MS } from "@core/constants";
import { getLogger } from "@utils/logger";
import { extractErrorInfo } from "@utils/typeGuards";

const logger = getLogger("Inkboard");

/**
 * Main Entry Point for the Inkboard display hub
 *
 * 1. Loads the configuration file
 * 2. Builds the hub from the service container
 * 3. Starts providers, scheduler and display mode
 * 4. Sets up graceful shutdown and SIGHUP reloads
 */
async function main() {
  logger.info("🚀 Starting Inkboard display hub...\n");

  try {
    const container = ServiceContainer.getInstance();

    const configService = container.getConfigService();
    logger.info(`Loading configuration from ${configService.getConfigPath()}`);
    const configResult = await configService.load();

    if (!isSuccess(configResult)) {
      const { code, message } = extractErrorInfo(configResult.error);
      logger.error(`${message} (${code})`);
      logger.error(configResult.error.message);
      for (const issue of configResult.error.issues) {
        logger.error(`  - ${issue}`);
      }
      process.exit(1);
    }

    const config = configResult.data;
    logger.info("✓ Configuration loaded\n");

    const hub = container.getHubService(config);
    await hub.start();

    const status = hub.getStatus();
    logger.info("✅ Inkboard is ready!\n");
    logger.info(
      `   Display: ${config.display.width}x${config.display.height} (${config.display.transport})`,
    );
    logger.info(`   Mode: ${status.mode}`);
    logger.info(`   Layouts: ${hub.listLayouts().join(", ") || "(none)"}`);
    logger.info(
      `   Providers: ${status.providerStatuses.map((p) => p.name).join(", ") || "(none)"}\n`,
    );

    setupGracefulShutdown(hub);
  } catch (error) {
    const { code, message } = extractErrorInfo(error);
    logger.error(`Fatal error during startup (${code}): ${message}`);
    process.exit(1);
  }
}

/**
 * Setup handlers for graceful shutdown
 */
function setupGracefulShutdown(hub: IHubService): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`\n${signal} received. Shutting down gracefully...`);

    // Force exit if the in-flight push never settles
    const forceExitTimeout = setTimeout(() => {
      logger.warn("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_FORCE_EXIT_MS);

    try {
      await hub.stop();

      clearTimeout(forceExitTimeout);
      logger.info("✓ Shutdown complete");
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimeout);
      logger.error("Error during shutdown:", error);
      process.exit(1);
    }
  };

  // Re-read the configuration file
  process.on("SIGHUP", () => {
    logger.info("SIGHUP received. Reloading configuration...");
    hub
      .reloadFromFile()
      .then((result) => {
        if (result.success) {
          logger.info("✓ Configuration reloaded");
        } else {
          const { code, message } = extractErrorInfo(result.error);
          logger.warn(`${message} (${code}); keeping the previous configuration`);
        }
      })
      .catch((error) => {
        logger.error("Reload failed:", error);
      });
  });

  // Handle shutdown signals
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  // Handle uncaught errors
  process.on("uncaughtException", (error) => {
    logger.error("Uncaught exception:", error);
    void shutdown("UNCAUGHT_EXCEPTION");
  });

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled rejection:", reason);
    void shutdown("UNHANDLED_REJECTION");
  });
}

// Start the application
main().catch((error) => {
  logger.error("Failed to start application:", error);
  process.exit(1);
});
