/**
 * Errors raised by the pipeline and its collaborators.
 */

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export class TransferError extends Error {
  constructor(cause: unknown) {
    super(`Transfer failed: ${describeCause(cause)}`);
    this.name = "TransferError";
  }
}

export class RegistrationError extends Error {
  constructor(cause: unknown) {
    super(`Registration failed: ${describeCause(cause)}`);
    this.name = "RegistrationError";
  }
}

/** The sentinel/close contract between stages was broken. Always fatal. */
export class ShutdownProtocolViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShutdownProtocolViolation";
  }
}

export class InvalidTransitionError extends Error {
  taskId: string | number;

  constructor(taskId: string | number, from: string, to: string) {
    super(`Task ${taskId}: invalid status transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.taskId = taskId;
  }
}

export class BatchValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BatchValidationError";
  }
}

export const CANCELLED = "cancelled";
