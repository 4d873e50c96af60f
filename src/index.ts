import dotenv from "dotenv";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { FilePipeline } from "./pipeline/pipeline";
import { buildCollaborators } from "./services/collaborator.factory";
import { RunService } from "./services/run.service";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

async function startServer() {
  try {
    logger.info("Initializing services...");

    const config = loadConfig();
    const pipeline = new FilePipeline(buildCollaborators(config), config.pipeline);
    const runService = new RunService(pipeline);
    const app = createApp(runService, config.apiKey);

    const server = app.listen(config.port, "0.0.0.0", () => {
      logger.info(`Server listening on port ${config.port}`);
      logger.info("Server ready to accept requests");
    });

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      server.close();
      await runService.shutdown();
      process.exit(0);
    };
    process.on("SIGTERM", () => void shutdown("SIGTERM"));
    process.on("SIGINT", () => void shutdown("SIGINT"));
  } catch (error) {
    logger.error("Failed to start server:", error);
    process.exit(1);
  }
}

void startServer();
