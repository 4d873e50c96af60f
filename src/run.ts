import dotenv from "dotenv";
import { loadConfig } from "./config";
import { FilePipeline } from "./pipeline/pipeline";
import { buildCollaborators } from "./services/collaborator.factory";
import { loadFileTasks } from "./services/batch.service";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

const controller = new AbortController();

async function runBatch() {
  try {
    const config = loadConfig();
    const filesPath = process.argv[2] || config.filesPath;

    logger.info(`Running pipeline over ${filesPath}`);
    const tasks = await loadFileTasks(filesPath);

    const pipeline = new FilePipeline(buildCollaborators(config), config.pipeline);
    const report = await pipeline.run(tasks, { signal: controller.signal });

    process.exit(report.failed === 0 && report.missing === 0 ? 0 : 2);
  } catch (error) {
    logger.error("Pipeline run failed:", error);
    process.exit(1);
  }
}

// First signal cancels the run; the report still accounts for every file
process.on("SIGINT", () => {
  logger.info("SIGINT received, cancelling run...");
  controller.abort();
});
process.on("SIGTERM", () => {
  logger.info("SIGTERM received, cancelling run...");
  controller.abort();
});

void runBatch();
