import axios from "axios";
import type { AxiosInstance } from "axios";
import Joi from "joi";
import logger from "../utils/logger";
import { extractUniqueId } from "../utils/dest-key";
import { RegistrationError } from "../pipeline/errors";
import type { ObjectLocation } from "../models/file-task.model";
import type { RegistrationService } from "../models/collaborator.model";

export interface RegistrySettings {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
}

export type RegistryHttpClient = Pick<AxiosInstance, "post">;

interface RegistrationResponse {
  id: string;
}

const registrationResponseSchema = Joi.object<RegistrationResponse>({
  id: Joi.string().uuid().required(),
}).unknown(true);

export function createRegistryClient(settings: RegistrySettings): AxiosInstance {
  return axios.create({
    baseURL: settings.baseUrl,
    timeout: settings.timeoutMs,
    headers: {
      Authorization: `Bearer ${settings.apiKey}`,
      "Content-Type": "application/json",
    },
  });
}

function isRetryable(error: unknown): boolean {
  if (axios.isCancel(error)) return false;
  if (!axios.isAxiosError(error)) return false;
  const status = error.response?.status;
  // No response at all: network error or timeout
  if (status === undefined) return true;
  return status >= 500 || status === 408 || status === 429;
}

/**
 * Registers file metadata with the registry API. The file id sent to the API
 * is the uuid embedded in the destination key, and the API must echo it back.
 */
export class HttpRegistrationService implements RegistrationService {
  private http: RegistryHttpClient;
  private maxRetries: number;
  private baseDelay: number;

  constructor(
    http: RegistryHttpClient,
    options: Pick<RegistrySettings, "maxRetries" | "baseDelayMs">,
  ) {
    this.http = http;
    this.maxRetries = options.maxRetries;
    this.baseDelay = options.baseDelayMs;
  }

  async register(
    metadata: Record<string, string>,
    destination: ObjectLocation,
    signal?: AbortSignal,
  ): Promise<string> {
    const fileId = extractUniqueId(destination.key);
    if (!fileId) {
      throw new RegistrationError(
        `destination key "${destination.key}" has no embedded file id`,
      );
    }

    const body = {
      id: fileId,
      bucket: destination.bucket,
      key: destination.key,
      meta: metadata,
    };

    const data = await this.postWithRetry(body, fileId, signal);

    const { error, value } = registrationResponseSchema.validate(data);
    if (error) {
      throw new RegistrationError(`invalid registry response: ${error.message}`);
    }
    if (value.id !== fileId) {
      throw new RegistrationError(
        `registry returned id ${value.id}, expected ${fileId}`,
      );
    }
    return value.id;
  }

  private async postWithRetry(
    body: Record<string, unknown>,
    fileId: string,
    signal?: AbortSignal,
  ): Promise<unknown> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        logger.debug(
          `Registration attempt ${attempt}/${this.maxRetries} for ${fileId}`,
        );
        const response = await this.http.post<unknown>("/files", body, { signal });
        return response.data;
      } catch (error) {
        lastError = error;
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(
          `Registration attempt ${attempt} failed for ${fileId}: ${message}`,
        );

        if (!isRetryable(error) || signal?.aborted) break;

        if (attempt < this.maxRetries) {
          const delay = this.baseDelay * Math.pow(2, attempt - 1); // Exponential backoff
          logger.debug(`Retrying registration of ${fileId} in ${delay}ms...`);
          await this.sleep(delay);
        }
      }
    }

    throw new RegistrationError(lastError);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
