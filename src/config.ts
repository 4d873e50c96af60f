import Joi from "joi";
import type { S3Settings } from "./services/storage.service";
import type { RegistrySettings } from "./services/registration.service";
import type { PipelineOptions } from "./pipeline/pipeline";

export type CollaboratorMode = "simulated" | "live";

export interface AppConfig {
  port: number;
  apiKey?: string;
  pipeline: Required<PipelineOptions>;
  collaborators: CollaboratorMode;
  s3: S3Settings;
  registry: RegistrySettings;
  filesPath: string;
}

const envSchema = Joi.object({
  SERVER_PORT: Joi.number().port().default(8080),
  SERVER_API_KEY: Joi.string().optional(),
  TRANSFER_WORKERS: Joi.number().integer().min(1).default(3),
  METADATA_WORKERS: Joi.number().integer().min(1).default(2),
  QUEUE_CAPACITY: Joi.number().integer().min(0).default(0),
  COLLABORATORS: Joi.string().valid("simulated", "live").default("simulated"),
  S3_ENDPOINT: Joi.string().uri().optional(),
  S3_REGION: Joi.string().default("us-east-1"),
  S3_ACCESS_KEY: Joi.string().optional(),
  S3_SECRET_KEY: Joi.string().optional(),
  S3_FORCE_PATH_STYLE: Joi.boolean().default(false),
  S3_MAX_ATTEMPTS: Joi.number().integer().min(1).default(3),
  REGISTRY_API_URL: Joi.string().uri().when("COLLABORATORS", {
    is: "live",
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
  REGISTRY_API_KEY: Joi.string().when("COLLABORATORS", {
    is: "live",
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
  REGISTRY_TIMEOUT_MS: Joi.number().integer().min(1).default(10000),
  REGISTRY_MAX_RETRIES: Joi.number().integer().min(1).default(5),
  REGISTRY_BASE_DELAY_MS: Joi.number().integer().min(0).default(1000),
  FILES_PATH: Joi.string().default("data/files.json"),
}).unknown(true);

interface Env {
  SERVER_PORT: number;
  SERVER_API_KEY?: string;
  TRANSFER_WORKERS: number;
  METADATA_WORKERS: number;
  QUEUE_CAPACITY: number;
  COLLABORATORS: CollaboratorMode;
  S3_ENDPOINT?: string;
  S3_REGION: string;
  S3_ACCESS_KEY?: string;
  S3_SECRET_KEY?: string;
  S3_FORCE_PATH_STYLE: boolean;
  S3_MAX_ATTEMPTS: number;
  REGISTRY_API_URL?: string;
  REGISTRY_API_KEY?: string;
  REGISTRY_TIMEOUT_MS: number;
  REGISTRY_MAX_RETRIES: number;
  REGISTRY_BASE_DELAY_MS: number;
  FILES_PATH: string;
}

/** Validates the environment (after dotenv has loaded it) into AppConfig. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, { convert: true });
  if (error) {
    throw new Error(`Invalid configuration: ${error.message}`);
  }
  const e: Env = value;

  return {
    port: e.SERVER_PORT,
    apiKey: e.SERVER_API_KEY,
    pipeline: {
      transferWorkers: e.TRANSFER_WORKERS,
      metadataWorkers: e.METADATA_WORKERS,
      queueCapacity: e.QUEUE_CAPACITY,
    },
    collaborators: e.COLLABORATORS,
    s3: {
      endpoint: e.S3_ENDPOINT,
      region: e.S3_REGION,
      accessKeyId: e.S3_ACCESS_KEY,
      secretAccessKey: e.S3_SECRET_KEY,
      forcePathStyle: e.S3_FORCE_PATH_STYLE,
      maxAttempts: e.S3_MAX_ATTEMPTS,
    },
    registry: {
      baseUrl: e.REGISTRY_API_URL ?? "",
      apiKey: e.REGISTRY_API_KEY ?? "",
      timeoutMs: e.REGISTRY_TIMEOUT_MS,
      maxRetries: e.REGISTRY_MAX_RETRIES,
      baseDelayMs: e.REGISTRY_BASE_DELAY_MS,
    },
    filesPath: e.FILES_PATH,
  };
}
