import { describe, it, expect, vi } from "vitest";
import { FilePipeline } from "../src/pipeline/pipeline";
import { BatchValidationError } from "../src/pipeline/errors";
import {
  extractUniqueId,
  generateDestinationKey,
  parseDestinationKey,
} from "../src/utils/dest-key";
import type {
  RegistrationService,
  ReplicationService,
} from "../src/models/collaborator.model";
import { SimulatedReplicationService } from "../src/services/simulated.service";
import { fastCollaborators, makeTasks } from "./helpers";

const echoRegistration: RegistrationService = {
  async register(_metadata, destination) {
    const id = extractUniqueId(destination.key);
    if (!id) throw new Error(`bad key ${destination.key}`);
    return id;
  },
};

/** A signal whose state cannot be read, so any worker that checks it throws. */
function unreadableSignal(message: string): AbortSignal {
  const signal = new AbortController().signal;
  Object.defineProperty(signal, "aborted", {
    get() {
      throw new Error(message);
    },
  });
  return signal;
}

describe("FilePipeline", () => {
  it("should register both files with one worker per stage", async () => {
    const pipeline = new FilePipeline(fastCollaborators(), {
      transferWorkers: 1,
      metadataWorkers: 1,
    });

    const report = await pipeline.run(makeTasks(2));

    expect(report.expected).toBe(2);
    expect(report.processed).toBe(2);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(0);
    expect(report.missing).toBe(0);
    expect(report.failures).toEqual([]);

    for (const task of report.tasks) {
      expect(task.status).toEqual({ state: "REGISTERED" });
      expect(parseDestinationKey(task.destination.key)).not.toBeNull();
      expect(task.registrationId).toBe(extractUniqueId(task.destination.key));
    }
  });

  it("should report one failure when registration fails for one of three files", async () => {
    const registration: RegistrationService = {
      async register(metadata, destination, signal) {
        if (metadata.fileId === "2") throw new Error("registry unavailable");
        return echoRegistration.register(metadata, destination, signal);
      },
    };
    const pipeline = new FilePipeline(
      { ...fastCollaborators(), registration },
      { transferWorkers: 3, metadataWorkers: 2 },
    );

    const report = await pipeline.run(makeTasks(3));

    expect(report.processed).toBe(3);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);
    expect(report.missing).toBe(0);
    expect(report.failures).toEqual([
      {
        id: 2,
        name: "test_2.pdf",
        stage: "metadata",
        cause: "Registration failed: registry unavailable",
      },
    ]);
    const failed = report.tasks.find((t) => t.id === 2);
    expect(failed?.registrationId).toBe("");
    expect(failed?.destination.key).not.toBe("");
  });

  it("should send transfer failures straight to verification", async () => {
    const register = vi.fn(echoRegistration.register);
    const replication = new SimulatedReplicationService({
      latencyMs: [0, 0],
      shouldFail: (source) => source.key === "p1/f1",
    });
    const pipeline = new FilePipeline(
      { replication, registration: { register } },
      { transferWorkers: 2, metadataWorkers: 2 },
    );

    const report = await pipeline.run(makeTasks(3));

    expect(report.processed).toBe(3);
    expect(report.succeeded).toBe(2);
    expect(report.failures).toEqual([
      {
        id: 1,
        name: "test_1.pdf",
        stage: "transfer",
        cause: "Transfer failed: simulated copy failure for src/p1/f1",
      },
    ]);
    expect(register).toHaveBeenCalledTimes(2);
    expect(report.tasks.find((t) => t.id === 1)?.destination.key).toBe("");
  });

  it("should terminate on empty input", async () => {
    const pipeline = new FilePipeline(fastCollaborators());
    const report = await pipeline.run([]);
    expect(report).toEqual({
      expected: 0,
      processed: 0,
      succeeded: 0,
      failed: 0,
      missing: 0,
      failures: [],
      tasks: [],
    });
  });

  it("should process many more files than workers without loss or duplication", async () => {
    const pipeline = new FilePipeline(fastCollaborators(), {
      transferWorkers: 3,
      metadataWorkers: 2,
    });
    const tasks = makeTasks(250);

    const report = await pipeline.run(tasks);

    expect(report.processed).toBe(250);
    expect(report.succeeded).toBe(250);
    const ids = new Set(report.tasks.map((t) => t.id));
    expect(ids.size).toBe(250);
    const keys = new Set(report.tasks.map((t) => t.destination.key));
    expect(keys.size).toBe(250);
  });

  it("should stamp destination keys within the run window", async () => {
    const runStart = Math.floor(Date.now() / 1000) * 1000;
    const report = await new FilePipeline(fastCollaborators()).run(makeTasks(5));
    const runEnd = Date.now();

    for (const task of report.tasks) {
      const parsed = parseDestinationKey(task.destination.key);
      expect(parsed).not.toBeNull();
      expect(parsed?.timestamp.getTime()).toBeGreaterThanOrEqual(runStart);
      expect(parsed?.timestamp.getTime()).toBeLessThanOrEqual(runEnd);
    }
  });

  it("should give disjoint destination keys when the same list runs twice", async () => {
    const pipeline = new FilePipeline(fastCollaborators());
    const first = await pipeline.run(makeTasks(20));
    const second = await pipeline.run(makeTasks(20));

    const firstKeys = new Set(first.tasks.map((t) => t.destination.key));
    const overlap = second.tasks.filter((t) => firstKeys.has(t.destination.key));
    expect(firstKeys.size).toBe(20);
    expect(overlap).toEqual([]);
  });

  it("should only register files that already have a destination key", async () => {
    const keysSeen: string[] = [];
    const registration: RegistrationService = {
      async register(metadata, destination, signal) {
        keysSeen.push(destination.key);
        return echoRegistration.register(metadata, destination, signal);
      },
    };
    await new FilePipeline({ ...fastCollaborators(), registration }).run(makeTasks(10));

    expect(keysSeen).toHaveLength(10);
    expect(keysSeen.every((k) => parseDestinationKey(k) !== null)).toBe(true);
  });

  it("should run transfer workers concurrently up to the pool size", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const replication: ReplicationService = {
      async replicate() {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return generateDestinationKey();
      },
    };
    const pipeline = new FilePipeline(
      { replication, registration: echoRegistration },
      { transferWorkers: 3, metadataWorkers: 1 },
    );

    const report = await pipeline.run(makeTasks(6));

    expect(report.succeeded).toBe(6);
    expect(maxInFlight).toBe(3);
  });

  it("should terminate with bounded queues of capacity one", async () => {
    const pipeline = new FilePipeline(fastCollaborators(), {
      transferWorkers: 2,
      metadataWorkers: 3,
      queueCapacity: 1,
    });

    const report = await pipeline.run(makeTasks(40));

    expect(report.processed).toBe(40);
    expect(report.succeeded).toBe(40);
    expect(report.missing).toBe(0);
  });

  it("should fail every file as cancelled when aborted before the run", async () => {
    const controller = new AbortController();
    controller.abort();
    const register = vi.fn(echoRegistration.register);
    const pipeline = new FilePipeline({
      replication: fastCollaborators().replication,
      registration: { register },
    });

    const report = await pipeline.run(makeTasks(4), { signal: controller.signal });

    expect(report.processed).toBe(4);
    expect(report.failed).toBe(4);
    expect(report.missing).toBe(0);
    expect(report.failures.map((f) => [f.stage, f.cause])).toEqual([
      ["transfer", "cancelled"],
      ["transfer", "cancelled"],
      ["transfer", "cancelled"],
      ["transfer", "cancelled"],
    ]);
    expect(register).not.toHaveBeenCalled();
  });

  it("should account for every file when cancelled mid-run", async () => {
    const controller = new AbortController();
    const replication: ReplicationService = {
      async replicate() {
        return generateDestinationKey();
      },
    };
    const registration: RegistrationService = {
      async register(metadata, destination, signal) {
        controller.abort();
        return echoRegistration.register(metadata, destination, signal);
      },
    };
    const pipeline = new FilePipeline(
      { replication, registration },
      { transferWorkers: 1, metadataWorkers: 1 },
    );

    const report = await pipeline.run(makeTasks(8), { signal: controller.signal });

    expect(report.processed).toBe(8);
    expect(report.missing).toBe(0);
    expect(report.succeeded).toBeGreaterThanOrEqual(1);
    expect(report.succeeded + report.failed).toBe(8);
    expect(report.failures.every((f) => f.cause === "cancelled")).toBe(true);
  });

  it("should reject duplicate task ids before starting", async () => {
    const tasks = makeTasks(2);
    tasks[1].id = tasks[0].id;
    await expect(new FilePipeline(fastCollaborators()).run(tasks)).rejects.toBeInstanceOf(
      BatchValidationError,
    );
  });

  it("should leave the caller's tasks untouched so the same list can run again", async () => {
    const pipeline = new FilePipeline(fastCollaborators());
    const tasks = makeTasks(5);

    const first = await pipeline.run(tasks);
    const second = await pipeline.run(tasks);

    expect(first.succeeded).toBe(5);
    expect(second.succeeded).toBe(5);
    for (const task of tasks) {
      expect(task.status).toEqual({ state: "READY" });
      expect(task.destination.key).toBe("");
      expect(task.registrationId).toBe("");
    }
    expect(second.tasks.some((t) => tasks.includes(t) || first.tasks.includes(t))).toBe(false);
    const firstKeys = new Set(first.tasks.map((t) => t.destination.key));
    expect(second.tasks.filter((t) => firstKeys.has(t.destination.key))).toEqual([]);
  });

  it("should run the same list twice through bounded queues", async () => {
    const pipeline = new FilePipeline(fastCollaborators(), {
      transferWorkers: 2,
      metadataWorkers: 2,
      queueCapacity: 1,
    });
    const tasks = makeTasks(10);

    await pipeline.run(tasks);
    const second = await pipeline.run(tasks);

    expect(second.processed).toBe(10);
    expect(second.succeeded).toBe(10);
  });

  it("should reject tasks that are not READY", async () => {
    const tasks = makeTasks(2);
    tasks[1].status = { state: "REGISTERED" };

    await expect(new FilePipeline(fastCollaborators()).run(tasks)).rejects.toThrow(
      new BatchValidationError("Task 2 is REGISTERED, only READY tasks can run"),
    );
  });

  it("should reject the run when a stage crashes", async () => {
    const pipeline = new FilePipeline(fastCollaborators(), {
      transferWorkers: 2,
      metadataWorkers: 2,
    });

    await expect(
      pipeline.run(makeTasks(4), { signal: unreadableSignal("signal unavailable") }),
    ).rejects.toThrow("signal unavailable");
  });

  it("should reject instead of hanging when a stage crashes with bounded queues", async () => {
    const pipeline = new FilePipeline(fastCollaborators(), {
      transferWorkers: 2,
      metadataWorkers: 2,
      queueCapacity: 1,
    });

    await expect(
      pipeline.run(makeTasks(10), { signal: unreadableSignal("signal unavailable") }),
    ).rejects.toThrow("signal unavailable");
  });
});
