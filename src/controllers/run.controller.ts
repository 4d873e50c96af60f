import type { Request, Response } from "express";
import Joi from "joi";
import logger from "../utils/logger";
import { fileRecordsSchema, parseFileRecords } from "../services/batch.service";
import { BatchValidationError } from "../pipeline/errors";
import type { RunService } from "../services/run.service";

// Validation schemas
const startRunSchema = Joi.object({
  files: fileRecordsSchema,
});

const runIdSchema = Joi.string().uuid().required();

export function createRunController(runService: RunService) {
  async function startRun(req: Request, res: Response): Promise<void> {
    try {
      const { error, value } = startRunSchema.validate(req.body || {});
      if (error) {
        res
          .status(400)
          .json({ error: "Invalid request body", details: error.message });
        return;
      }

      const tasks = parseFileRecords(value.files);
      const record = runService.startRun(tasks);

      res.status(202).json({
        ok: true,
        runId: record.runId,
        expected: record.expected,
      });
    } catch (error) {
      if (error instanceof BatchValidationError) {
        res
          .status(400)
          .json({ error: "Invalid request body", details: error.message });
        return;
      }
      logger.error("Error in startRun controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  async function getRun(req: Request, res: Response): Promise<void> {
    try {
      const { runId } = req.params;

      const { error } = runIdSchema.validate(runId);
      if (error) {
        res
          .status(400)
          .json({ error: "Invalid runId format", details: error.message });
        return;
      }

      const record = runService.getRun(runId);
      if (!record) {
        res.status(404).json({ error: "Run not found" });
        return;
      }

      res.status(200).json(record);
    } catch (error) {
      logger.error("Error in getRun controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  async function listRuns(req: Request, res: Response): Promise<void> {
    try {
      const runs = runService.listRuns().map((r) => ({
        runId: r.runId,
        status: r.status,
        expected: r.expected,
        createdAt: r.createdAt,
      }));
      res.status(200).json({ runs });
    } catch (error) {
      logger.error("Error in listRuns controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  return { startRun, getRun, listRuns };
}

export async function healthCheck(req: Request, res: Response): Promise<void> {
  res
    .status(200)
    .json({ status: "healthy", timestamp: new Date().toISOString() });
}
