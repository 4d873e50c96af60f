import logger from "../utils/logger";
import { createFileTask } from "../models/file-task.model";
import type { FileTask } from "../models/file-task.model";
import type {
  RegistrationService,
  ReplicationService,
} from "../models/collaborator.model";
import type { VerificationReport } from "../models/report.model";
import { dispatch } from "./dispatcher";
import { BatchValidationError } from "./errors";
import { metadataWorker } from "./metadata.worker";
import { StageQueue } from "./stage-queue";
import { transferWorker } from "./transfer.worker";
import { verify } from "./verifier";
import { WorkerPool } from "./worker-pool";

export interface PipelineOptions {
  transferWorkers: number;
  metadataWorkers: number;
  /** 0 keeps every stage queue unbounded. */
  queueCapacity?: number;
}

export interface PipelineCollaborators {
  replication: ReplicationService;
  registration: RegistrationService;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  transferWorkers: 3,
  metadataWorkers: 2,
  queueCapacity: 0,
};

/**
 * Dispatcher -> transfer pool -> metadata pool -> verifier.
 *
 * Shutdown order: a stage's input queue gets its done markers only after
 * every producer feeding it has been joined. The verify queue is fed by both
 * pools, so it gets its single marker after the metadata pool is joined.
 */
export class FilePipeline {
  private readonly collaborators: PipelineCollaborators;
  private readonly options: PipelineOptions;

  constructor(
    collaborators: PipelineCollaborators,
    options: Partial<PipelineOptions> = {},
  ) {
    this.collaborators = collaborators;
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...options };
  }

  /**
   * Runs a batch of READY tasks. The pipeline works on its own copies, so the
   * caller's list is left untouched and can be run again; the report's tasks
   * are those copies.
   */
  async run(
    tasks: readonly FileTask[],
    runOptions: RunOptions = {},
  ): Promise<VerificationReport> {
    assertRunnable(tasks);
    const work = tasks.map((task) =>
      createFileTask({
        id: task.id,
        name: task.name,
        source: task.source,
        destinationBucket: task.destination.bucket,
        metadata: task.metadata,
      }),
    );

    const { signal } = runOptions;
    const capacity = this.options.queueCapacity ?? 0;
    const transferQueue = new StageQueue<FileTask>("transfer", capacity);
    const metadataQueue = new StageQueue<FileTask>("metadata", capacity);
    const verifyQueue = new StageQueue<FileTask>("verify", capacity);

    const transferPool = new WorkerPool("transfer", this.options.transferWorkers);
    const metadataPool = new WorkerPool("metadata", this.options.metadataWorkers);

    // A dead stage would leave its neighbours blocked on a full or empty queue
    const abortStages = (error: unknown) => {
      transferQueue.abort(error);
      metadataQueue.abort(error);
      verifyQueue.abort(error);
    };

    const onAbort = () => {
      logger.warn("Pipeline run cancelled, remaining files will be marked failed");
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    logger.info(`Pipeline starting with ${work.length} file(s)`, {
      transferWorkers: transferPool.size,
      metadataWorkers: metadataPool.size,
      queueCapacity: capacity,
    });

    transferPool.start(
      transferWorker({
        input: transferQueue,
        output: metadataQueue,
        failures: verifyQueue,
        replication: this.collaborators.replication,
        signal,
      }),
      abortStages,
    );
    metadataPool.start(
      metadataWorker({
        input: metadataQueue,
        output: verifyQueue,
        registration: this.collaborators.registration,
        signal,
      }),
      abortStages,
    );
    const verifying = verify(verifyQueue, work.length);
    void verifying.catch(abortStages);

    try {
      await dispatch(work, transferQueue);
      await transferPool.drainAndJoin(transferQueue);
      logger.info("Transfer stage closed");

      await metadataPool.drainAndJoin(metadataQueue);
      logger.info("Metadata stage closed");

      await verifyQueue.signalDone(1);
      const report = await verifying;
      verifyQueue.close();
      logger.info("Pipeline complete");

      return report;
    } catch (error) {
      abortStages(error);
      await Promise.allSettled([transferPool.join(), metadataPool.join(), verifying]);
      throw error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

function assertRunnable(tasks: readonly FileTask[]): void {
  const seen = new Set<string>();
  for (const task of tasks) {
    const key = `${typeof task.id}:${task.id}`;
    if (seen.has(key)) {
      throw new BatchValidationError(`Duplicate task id: ${task.id}`);
    }
    seen.add(key);
    if (task.status.state !== "READY") {
      throw new BatchValidationError(
        `Task ${task.id} is ${task.status.state}, only READY tasks can run`,
      );
    }
  }
}
