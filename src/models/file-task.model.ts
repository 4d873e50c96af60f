import { InvalidTransitionError } from "../pipeline/errors";

export type TaskId = string | number;

export interface ObjectLocation {
  bucket: string;
  key: string;
}

export type PipelineStage = "transfer" | "metadata";

export type TaskStatus =
  | { state: "READY" }
  | { state: "TRANSFERRED" }
  | { state: "REGISTERED" }
  | { state: "FAILED"; stage: PipelineStage; cause: string };

export type TaskState = TaskStatus["state"];

export interface FileTask {
  id: TaskId;
  name: string;
  source: ObjectLocation;
  // key stays "" until the transfer stage completes
  destination: ObjectLocation;
  metadata: Record<string, string>;
  // "" until metadata registration succeeds
  registrationId: string;
  status: TaskStatus;
}

export interface NewFileTask {
  id: TaskId;
  name: string;
  source: ObjectLocation;
  destinationBucket: string;
  metadata?: Record<string, string>;
}

export function createFileTask(input: NewFileTask): FileTask {
  return {
    id: input.id,
    name: input.name,
    source: { ...input.source },
    destination: { bucket: input.destinationBucket, key: "" },
    metadata: { ...(input.metadata ?? {}) },
    registrationId: "",
    status: { state: "READY" },
  };
}

export function markTransferred(task: FileTask, destinationKey: string): void {
  assertState(task, "READY", "TRANSFERRED");
  task.destination.key = destinationKey;
  task.status = { state: "TRANSFERRED" };
}

export function markRegistered(task: FileTask, registrationId: string): void {
  assertState(task, "TRANSFERRED", "REGISTERED");
  task.registrationId = registrationId;
  task.status = { state: "REGISTERED" };
}

/**
 * A transfer failure is only legal from READY, a metadata failure only from
 * TRANSFERRED.
 */
export function markFailed(
  task: FileTask,
  stage: PipelineStage,
  cause: string,
): void {
  assertState(task, stage === "transfer" ? "READY" : "TRANSFERRED", "FAILED");
  task.status = { state: "FAILED", stage, cause };
}

export function isRegistered(task: FileTask): boolean {
  return task.status.state === "REGISTERED";
}

function assertState(task: FileTask, expected: TaskState, next: TaskState): void {
  if (task.status.state !== expected) {
    throw new InvalidTransitionError(task.id, task.status.state, next);
  }
}
