import logger from "../utils/logger";
import { markFailed, markTransferred } from "../models/file-task.model";
import type { FileTask } from "../models/file-task.model";
import type { ReplicationService } from "../models/collaborator.model";
import { CANCELLED, TransferError } from "./errors";
import type { StageQueue } from "./stage-queue";
import type { WorkerBody } from "./worker-pool";

export interface TransferWorkerDeps {
  input: StageQueue<FileTask>;
  output: StageQueue<FileTask>;
  failures: StageQueue<FileTask>;
  replication: ReplicationService;
  signal?: AbortSignal;
}

export function transferWorker(deps: TransferWorkerDeps): WorkerBody {
  const { input, output, failures, replication, signal } = deps;

  return async (workerName) => {
    for (;;) {
      const item = await input.take();
      if (item.kind === "done") {
        logger.debug(`Transfer worker ${workerName} got done marker`);
        return;
      }
      const task = item.task;

      if (signal?.aborted) {
        markFailed(task, "transfer", CANCELLED);
        await failures.put(task);
        continue;
      }

      let destinationKey: string;
      try {
        destinationKey = await replication.replicate(
          task.source,
          task.destination.bucket,
          signal,
        );
      } catch (error) {
        const failure =
          error instanceof TransferError ? error : new TransferError(error);
        logger.warn(`Transfer worker ${workerName} failed file ${task.name}`, {
          taskId: task.id,
          cause: failure.message,
        });
        markFailed(task, "transfer", failure.message);
        await failures.put(task);
        continue;
      }

      markTransferred(task, destinationKey);
      logger.debug(
        `Transfer worker ${workerName} copied ${task.name} to ${task.destination.bucket}/${destinationKey}`,
        { taskId: task.id },
      );
      await output.put(task);
    }
  };
}
