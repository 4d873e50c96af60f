import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import type { FileTask } from "../models/file-task.model";
import type {
  RunRecord,
  RunSummary,
  VerificationReport,
} from "../models/report.model";
import type { FilePipeline } from "../pipeline/pipeline";

export interface RunServiceOptions {
  /** Finished runs kept for lookup; the oldest are dropped first. */
  maxRetainedRuns: number;
}

const DEFAULT_OPTIONS: RunServiceOptions = { maxRetainedRuns: 100 };

interface ActiveRun {
  record: RunRecord;
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Keeps pipeline runs started over HTTP. State lives in memory for the life
 * of the process only.
 */
export class RunService {
  private pipeline: FilePipeline;
  private options: RunServiceOptions;
  private runs = new Map<string, ActiveRun>();

  constructor(pipeline: FilePipeline, options: Partial<RunServiceOptions> = {}) {
    this.pipeline = pipeline;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  startRun(tasks: FileTask[]): RunRecord {
    const runId = uuidv4();
    const now = new Date().toISOString();
    const record: RunRecord = {
      runId,
      status: "running",
      expected: tasks.length,
      createdAt: now,
      updatedAt: now,
    };
    const controller = new AbortController();

    const done = this.pipeline
      .run(tasks, { signal: controller.signal })
      .then((report) => {
        record.status = "completed";
        record.report = summarize(report);
        record.updatedAt = new Date().toISOString();
        logger.info(`Run ${runId} completed`, {
          succeeded: report.succeeded,
          failed: report.failed,
          missing: report.missing,
        });
      })
      .catch((error: unknown) => {
        record.status = "failed";
        record.error = error instanceof Error ? error.message : String(error);
        record.updatedAt = new Date().toISOString();
        logger.error(`Run ${runId} failed:`, error);
      })
      .finally(() => this.evictFinishedRuns());

    this.runs.set(runId, { record, controller, done });
    logger.info(`Started run ${runId} with ${tasks.length} file(s)`);
    return record;
  }

  getRun(runId: string): RunRecord | null {
    return this.runs.get(runId)?.record ?? null;
  }

  listRuns(): RunRecord[] {
    return Array.from(this.runs.values(), (run) => run.record);
  }

  /** Resolves once the run has settled, whatever its outcome. */
  async waitFor(runId: string): Promise<RunRecord | null> {
    const run = this.runs.get(runId);
    if (!run) return null;
    await run.done;
    return run.record;
  }

  /** Aborts every running run and waits for them to settle. */
  async shutdown(): Promise<void> {
    const active = Array.from(this.runs.values()).filter(
      (run) => run.record.status === "running",
    );
    for (const run of active) {
      run.controller.abort();
    }
    await Promise.all(active.map((run) => run.done));
    logger.info(`Run service stopped (${active.length} run(s) cancelled)`);
  }

  private evictFinishedRuns(): void {
    let excess = this.runs.size - this.options.maxRetainedRuns;
    for (const [runId, run] of this.runs) {
      if (excess <= 0) break;
      if (run.record.status === "running") continue;
      this.runs.delete(runId);
      excess--;
    }
  }
}

function summarize(report: VerificationReport): RunSummary {
  return {
    expected: report.expected,
    processed: report.processed,
    succeeded: report.succeeded,
    failed: report.failed,
    missing: report.missing,
    failures: report.failures,
  };
}
