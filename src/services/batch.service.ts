import fs from "fs/promises";
import Joi from "joi";
import logger from "../utils/logger";
import { BatchValidationError } from "../pipeline/errors";
import { createFileTask } from "../models/file-task.model";
import type { FileTask, TaskId } from "../models/file-task.model";

/** Input record shape, as the upstream file inventory exports it. */
export interface FileRecord {
  id: TaskId;
  name: string;
  src_bucket: string;
  src_key: string;
  dest_bucket: string;
  dest_key?: string;
  meta?: Record<string, string>;
  upload_id?: string;
  status?: "READY";
}

const fileRecordSchema = Joi.object<FileRecord>({
  id: Joi.alternatives()
    .try(Joi.number().integer(), Joi.string().min(1))
    .required(),
  name: Joi.string().min(1).required(),
  src_bucket: Joi.string().min(1).required(),
  src_key: Joi.string().min(1).required(),
  dest_bucket: Joi.string().min(1).required(),
  // Records enter the pipeline before transfer and registration
  dest_key: Joi.string().valid("").optional(),
  upload_id: Joi.string().valid("").optional(),
  meta: Joi.object().pattern(Joi.string(), Joi.string().allow("")).default({}),
  status: Joi.string().valid("READY").optional(),
});

export const fileRecordsSchema = Joi.array()
  .items(fileRecordSchema)
  .unique((a: FileRecord, b: FileRecord) => a.id === b.id)
  .required();

export function parseFileRecords(raw: unknown): FileTask[] {
  const { error, value } = fileRecordsSchema.validate(raw, { abortEarly: true });
  if (error) {
    throw new BatchValidationError(`Invalid file records: ${error.message}`);
  }
  const records: FileRecord[] = value;

  return records.map((record) =>
    createFileTask({
      id: record.id,
      name: record.name,
      source: { bucket: record.src_bucket, key: record.src_key },
      destinationBucket: record.dest_bucket,
      metadata: record.meta,
    }),
  );
}

export async function loadFileTasks(filePath: string): Promise<FileTask[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch (error) {
    logger.error(`Error reading file records from ${filePath}:`, error);
    const message = error instanceof Error ? error.message : String(error);
    throw new BatchValidationError(`Could not read ${filePath}: ${message}`);
  }
  const tasks = parseFileRecords(raw);
  logger.info(`Loaded ${tasks.length} file record(s) from ${filePath}`);
  return tasks;
}
