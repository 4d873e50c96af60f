import type { FileTask, PipelineStage, TaskId } from "./file-task.model";

export interface TaskFailure {
  id: TaskId;
  name: string;
  stage: PipelineStage;
  cause: string;
}

export interface VerificationReport {
  expected: number;
  processed: number;
  succeeded: number;
  failed: number;
  missing: number;
  failures: TaskFailure[];
  tasks: FileTask[];
}

/** What a run record keeps once the run completes. */
export type RunSummary = Omit<VerificationReport, "tasks">;

export type RunStatus = "running" | "completed" | "failed";

export interface RunRecord {
  runId: string;
  status: RunStatus;
  expected: number;
  createdAt: string;
  updatedAt: string;
  report?: RunSummary;
  error?: string;
}
