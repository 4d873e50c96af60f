import logger from "../utils/logger";
import { markFailed, markRegistered } from "../models/file-task.model";
import type { FileTask } from "../models/file-task.model";
import type { RegistrationService } from "../models/collaborator.model";
import { CANCELLED, RegistrationError } from "./errors";
import type { StageQueue } from "./stage-queue";
import type { WorkerBody } from "./worker-pool";

export interface MetadataWorkerDeps {
  input: StageQueue<FileTask>;
  output: StageQueue<FileTask>;
  registration: RegistrationService;
  signal?: AbortSignal;
}

/** Successes and failures both go to `output`, which is the verify queue. */
export function metadataWorker(deps: MetadataWorkerDeps): WorkerBody {
  const { input, output, registration, signal } = deps;

  return async (workerName) => {
    for (;;) {
      const item = await input.take();
      if (item.kind === "done") {
        logger.debug(`Metadata worker ${workerName} got done marker`);
        return;
      }
      const task = item.task;

      if (signal?.aborted) {
        markFailed(task, "metadata", CANCELLED);
        await output.put(task);
        continue;
      }

      let registrationId: string;
      try {
        registrationId = await registration.register(
          task.metadata,
          task.destination,
          signal,
        );
      } catch (error) {
        const failure =
          error instanceof RegistrationError ? error : new RegistrationError(error);
        logger.warn(`Metadata worker ${workerName} failed file ${task.name}`, {
          taskId: task.id,
          cause: failure.message,
        });
        markFailed(task, "metadata", failure.message);
        await output.put(task);
        continue;
      }

      markRegistered(task, registrationId);
      logger.debug(`Metadata worker ${workerName} registered ${task.name}`, {
        taskId: task.id,
        registrationId,
      });
      await output.put(task);
    }
  };
}
