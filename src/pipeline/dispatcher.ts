import logger from "../utils/logger";
import type { FileTask } from "../models/file-task.model";
import type { StageQueue } from "./stage-queue";

/**
 * Puts every task onto the transfer queue exactly once. Done markers are the
 * coordinator's job, since only it knows the transfer pool size.
 */
export async function dispatch(
  tasks: Iterable<FileTask>,
  transferQueue: StageQueue<FileTask>,
): Promise<number> {
  let count = 0;
  for (const task of tasks) {
    logger.debug(`Dispatching file ${task.name}`, { taskId: task.id });
    await transferQueue.put(task);
    count++;
  }
  logger.info(`Dispatcher queued ${count} file(s)`);
  return count;
}
