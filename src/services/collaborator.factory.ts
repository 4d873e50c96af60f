import logger from "../utils/logger";
import type { AppConfig } from "../config";
import type { PipelineCollaborators } from "../pipeline/pipeline";
import { S3ReplicationService, createS3Client } from "./storage.service";
import {
  HttpRegistrationService,
  createRegistryClient,
} from "./registration.service";
import {
  SimulatedRegistrationService,
  SimulatedReplicationService,
} from "./simulated.service";

export function buildCollaborators(config: AppConfig): PipelineCollaborators {
  if (config.collaborators === "simulated") {
    logger.info("Using simulated replication and registration services");
    return {
      replication: new SimulatedReplicationService(),
      registration: new SimulatedRegistrationService(),
    };
  }

  logger.info(
    `Using S3 replication (endpoint: ${config.s3.endpoint ?? "aws default"}) and registry at ${config.registry.baseUrl}`,
  );
  return {
    replication: new S3ReplicationService(createS3Client(config.s3)),
    registration: new HttpRegistrationService(
      createRegistryClient(config.registry),
      config.registry,
    ),
  };
}
