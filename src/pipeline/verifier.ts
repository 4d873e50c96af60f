import logger from "../utils/logger";
import { isRegistered } from "../models/file-task.model";
import type { FileTask } from "../models/file-task.model";
import type { TaskFailure, VerificationReport } from "../models/report.model";
import type { StageQueue } from "./stage-queue";

export function buildReport(
  expected: number,
  processed: FileTask[],
): VerificationReport {
  const failures: TaskFailure[] = [];
  let succeeded = 0;

  for (const task of processed) {
    if (isRegistered(task)) {
      succeeded++;
      continue;
    }
    const status = task.status;
    failures.push({
      id: task.id,
      name: task.name,
      stage: status.state === "FAILED" ? status.stage : "metadata",
      cause:
        status.state === "FAILED"
          ? status.cause
          : `reached verification in state ${status.state}`,
    });
  }

  return {
    expected,
    processed: processed.length,
    succeeded,
    failed: processed.length - succeeded,
    missing: expected - processed.length,
    failures,
    tasks: processed,
  };
}

/**
 * Single consumer of the verify queue. Collects tasks until the done marker
 * arrives, then reports across the whole batch.
 */
export async function verify(
  verifyQueue: StageQueue<FileTask>,
  expected: number,
): Promise<VerificationReport> {
  const processed: FileTask[] = [];

  for (;;) {
    const item = await verifyQueue.take();
    if (item.kind === "done") break;
    processed.push(item.task);
    logger.debug(`Verified ${item.task.name} - ${item.task.status.state}`, {
      taskId: item.task.id,
    });
  }

  const report = buildReport(expected, processed);
  logReport(report);
  return report;
}

export function logReport(report: VerificationReport): void {
  logger.info("Verification report", {
    expected: report.expected,
    processed: report.processed,
    succeeded: report.succeeded,
    failed: report.failed,
    missing: report.missing,
  });
  for (const failure of report.failures) {
    logger.warn(`File ${failure.name} failed at ${failure.stage}: ${failure.cause}`, {
      taskId: failure.id,
    });
  }
  if (report.missing !== 0) {
    logger.warn(`Missing files: ${report.missing}`);
  }
}
