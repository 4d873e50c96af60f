import logger from "../utils/logger";
import { extractUniqueId, generateDestinationKey } from "../utils/dest-key";
import { RegistrationError, TransferError } from "../pipeline/errors";
import type { ObjectLocation } from "../models/file-task.model";
import type {
  RegistrationService,
  ReplicationService,
} from "../models/collaborator.model";

/** Latency range in milliseconds; [0, 0] resolves on the next tick. */
export type LatencyRange = readonly [min: number, max: number];

export interface SimulationOptions {
  latencyMs?: LatencyRange;
  /** Decides per call whether the collaborator fails. */
  shouldFail?: (location: ObjectLocation) => boolean;
  random?: () => number;
}

function pickDelay(range: LatencyRange, random: () => number): number {
  const [min, max] = range;
  return min + (max - min) * random();
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("operation aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("operation aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Stand-in for the S3 copy with short latency, used for local runs. */
export class SimulatedReplicationService implements ReplicationService {
  private latency: LatencyRange;
  private shouldFail: (location: ObjectLocation) => boolean;
  private random: () => number;

  constructor(options: SimulationOptions = {}) {
    this.latency = options.latencyMs ?? [200, 500];
    this.shouldFail = options.shouldFail ?? (() => false);
    this.random = options.random ?? Math.random;
  }

  async replicate(
    source: ObjectLocation,
    destinationBucket: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const startedAt = new Date();
    await wait(pickDelay(this.latency, this.random), signal);
    if (this.shouldFail(source)) {
      throw new TransferError(`simulated copy failure for ${source.bucket}/${source.key}`);
    }
    const key = generateDestinationKey(startedAt);
    logger.debug(`Simulated copy ${source.bucket}/${source.key} -> ${destinationBucket}/${key}`);
    return key;
  }
}

/**
 * Stand-in for the registry API. Echoes the uuid embedded in the destination
 * key, as the real registry does.
 */
export class SimulatedRegistrationService implements RegistrationService {
  private latency: LatencyRange;
  private shouldFail: (location: ObjectLocation) => boolean;
  private random: () => number;

  constructor(options: SimulationOptions = {}) {
    this.latency = options.latencyMs ?? [1000, 2000];
    this.shouldFail = options.shouldFail ?? (() => false);
    this.random = options.random ?? Math.random;
  }

  async register(
    metadata: Record<string, string>,
    destination: ObjectLocation,
    signal?: AbortSignal,
  ): Promise<string> {
    await wait(pickDelay(this.latency, this.random), signal);
    if (this.shouldFail(destination)) {
      throw new RegistrationError(`simulated registry failure for ${destination.key}`);
    }
    const fileId = extractUniqueId(destination.key);
    if (!fileId) {
      throw new RegistrationError(
        `destination key "${destination.key}" has no embedded file id`,
      );
    }
    logger.debug(`Simulated registration of ${fileId}`, { meta: metadata });
    return fileId;
  }
}
