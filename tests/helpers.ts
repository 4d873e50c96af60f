import type { Request, Response } from "express";
import { createFileTask } from "../src/models/file-task.model";
import type { FileTask } from "../src/models/file-task.model";
import {
  SimulatedRegistrationService,
  SimulatedReplicationService,
} from "../src/services/simulated.service";
import type { PipelineCollaborators } from "../src/pipeline/pipeline";

export function makeTasks(count: number, prefix = "test"): FileTask[] {
  return Array.from({ length: count }, (_, i) =>
    createFileTask({
      id: i + 1,
      name: `${prefix}_${i + 1}.pdf`,
      source: { bucket: "src", key: `p1/f${i + 1}` },
      destinationBucket: "dest",
      metadata: { fileId: String(i + 1) },
    }),
  );
}

/** Simulated collaborators with no latency. */
export function fastCollaborators(): PipelineCollaborators {
  return {
    replication: new SimulatedReplicationService({ latencyMs: [0, 0] }),
    registration: new SimulatedRegistrationService({ latencyMs: [0, 0] }),
  };
}

/** Minimal express Response double recording status and body. */
export class ResponseDouble {
  statusCode = 0;
  body: unknown = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }

  asResponse(): Response {
    return this as unknown as Response;
  }
}

export function makeRequest(init: {
  method?: string;
  url?: string;
  body?: unknown;
  params?: Record<string, string>;
  headers?: Record<string, string>;
}): Request {
  return {
    method: init.method ?? "GET",
    originalUrl: init.url ?? "/runs",
    body: init.body,
    params: init.params ?? {},
    headers: init.headers ?? {},
  } as unknown as Request;
}
