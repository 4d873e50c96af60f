import logger from "../utils/logger";
import type { StageQueue } from "./stage-queue";

export type WorkerBody = (workerName: string) => Promise<void>;

export type CrashHandler = (error: unknown) => void;

/**
 * A fixed number of async workers consuming one stage queue. Each worker must
 * return after taking exactly one done marker from its input queue.
 */
export class WorkerPool {
  readonly name: string;
  readonly size: number;
  private running: Promise<void> | null = null;

  constructor(name: string, size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool ${name}: size must be a positive integer`);
    }
    this.name = name;
    this.size = size;
  }

  /**
   * `onCrash` runs as soon as the first worker throws, so the caller can
   * unblock stages that would otherwise wait on this pool forever.
   */
  start(body: WorkerBody, onCrash?: CrashHandler): void {
    if (this.running) {
      throw new Error(`Worker pool ${this.name} already started`);
    }
    const workers = Array.from({ length: this.size }, (_, i) => {
      const workerName = `${this.name}-${i + 1}`;
      return body(workerName).then(() => {
        logger.debug(`Worker ${workerName} finished`);
      });
    });
    this.running = Promise.all(workers).then(() => undefined);
    // A crash may land long before join() is awaited; join() rethrows it.
    void this.running.catch((error: unknown) => {
      logger.error(`Worker pool ${this.name} crashed:`, error);
      onCrash?.(error);
    });
    logger.debug(`Worker pool ${this.name} started with ${this.size} worker(s)`);
  }

  /** Resolves once every worker has returned; rejects on the first crash. */
  async join(): Promise<void> {
    if (!this.running) {
      throw new Error(`Worker pool ${this.name} was never started`);
    }
    await this.running;
  }

  /**
   * Send one done marker per worker to `input`, wait for all workers, then
   * close `input`.
   */
  async drainAndJoin<T>(input: StageQueue<T>): Promise<void> {
    await input.signalDone(this.size);
    await this.join();
    input.close();
    logger.debug(`Worker pool ${this.name} drained, queue ${input.name} closed`);
  }
}
