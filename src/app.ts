import express from "express";
import cors from "cors";
import { createAuthMiddleware } from "./middleware/auth.middleware";
import { createRunController, healthCheck } from "./controllers/run.controller";
import type { RunService } from "./services/run.service";

export function createApp(runService: RunService, apiKey?: string) {
  const app = express();
  const auth = createAuthMiddleware(apiKey);
  const runs = createRunController(runService);

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "5mb" }));

  // Public routes
  app.get("/health", healthCheck);

  // Protected routes
  app.post("/runs", auth, runs.startRun);
  app.get("/runs", auth, runs.listRuns);
  app.get("/runs/:runId", auth, runs.getRun);

  return app;
}
