import { CopyObjectCommand, S3Client } from "@aws-sdk/client-s3";
import logger from "../utils/logger";
import { generateDestinationKey } from "../utils/dest-key";
import { TransferError } from "../pipeline/errors";
import type { ObjectLocation } from "../models/file-task.model";
import type { ReplicationService } from "../models/collaborator.model";

export interface S3Settings {
  endpoint?: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle: boolean;
  maxAttempts: number;
}

export function createS3Client(settings: S3Settings): S3Client {
  return new S3Client({
    endpoint: settings.endpoint,
    region: settings.region,
    credentials:
      settings.accessKeyId && settings.secretAccessKey
        ? {
            accessKeyId: settings.accessKeyId,
            secretAccessKey: settings.secretAccessKey,
          }
        : undefined,
    forcePathStyle: settings.forcePathStyle, // Required for MinIO
    maxAttempts: settings.maxAttempts,
  });
}

export function copySourceFor(source: ObjectLocation): string {
  const encodedKey = source.key.split("/").map(encodeURIComponent).join("/");
  return `${source.bucket}/${encodedKey}`;
}

/**
 * Server-side S3 -> S3 copy. Retries happen inside the SDK (maxAttempts), so a
 * rejection here is final for the task.
 */
export class S3ReplicationService implements ReplicationService {
  private client: S3Client;
  private now: () => Date;

  constructor(client: S3Client, now: () => Date = () => new Date()) {
    this.client = client;
    this.now = now;
  }

  async replicate(
    source: ObjectLocation,
    destinationBucket: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const destinationKey = generateDestinationKey(this.now());

    try {
      await this.client.send(
        new CopyObjectCommand({
          Bucket: destinationBucket,
          Key: destinationKey,
          CopySource: copySourceFor(source),
        }),
        { abortSignal: signal },
      );
    } catch (error) {
      logger.error(
        `Error copying ${source.bucket}/${source.key} to ${destinationBucket}:`,
        error,
      );
      throw new TransferError(error);
    }

    logger.debug(
      `Copied ${source.bucket}/${source.key} to ${destinationBucket}/${destinationKey}`,
    );
    return destinationKey;
  }
}
