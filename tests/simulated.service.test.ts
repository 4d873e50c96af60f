import { describe, it, expect } from "vitest";
import {
  SimulatedRegistrationService,
  SimulatedReplicationService,
} from "../src/services/simulated.service";
import { RegistrationError, TransferError } from "../src/pipeline/errors";
import { extractUniqueId } from "../src/utils/dest-key";

const SOURCE = { bucket: "src", key: "p1/f1" };

describe("simulated collaborators", () => {
  it("should replicate to a well-formed destination key", async () => {
    const service = new SimulatedReplicationService({ latencyMs: [0, 0] });
    const key = await service.replicate(SOURCE, "dest");
    expect(extractUniqueId(key)).not.toBeNull();
  });

  it("should fail replication when told to", async () => {
    const service = new SimulatedReplicationService({
      latencyMs: [0, 0],
      shouldFail: () => true,
    });
    await expect(service.replicate(SOURCE, "dest")).rejects.toBeInstanceOf(TransferError);
  });

  it("should echo the key uuid as registration id", async () => {
    const service = new SimulatedRegistrationService({ latencyMs: [0, 0] });
    const key = "2025/01/15/14/30/45/550e8400-e29b-41d4-a716-446655440000";
    await expect(service.register({}, { bucket: "dest", key })).resolves.toBe(
      "550e8400-e29b-41d4-a716-446655440000",
    );
  });

  it("should reject registration of a malformed key", async () => {
    const service = new SimulatedRegistrationService({ latencyMs: [0, 0] });
    await expect(
      service.register({}, { bucket: "dest", key: "p1/f1" }),
    ).rejects.toBeInstanceOf(RegistrationError);
  });

  it("should stop waiting when the signal aborts", async () => {
    const service = new SimulatedRegistrationService({ latencyMs: [10000, 10000] });
    const controller = new AbortController();
    const pending = service.register(
      {},
      { bucket: "dest", key: "2025/01/15/14/30/45/550e8400-e29b-41d4-a716-446655440000" },
      controller.signal,
    );
    controller.abort();
    await expect(pending).rejects.toThrow("operation aborted");
  });
});
