import type { ObjectLocation } from "./file-task.model";

/** Copies an object into the destination bucket and returns the new key. */
export interface ReplicationService {
  replicate(
    source: ObjectLocation,
    destinationBucket: string,
    signal?: AbortSignal,
  ): Promise<string>;
}

/**
 * Registers file metadata with the remote API and returns the registration
 * id, which is always the uuid embedded in `destination.key`.
 */
export interface RegistrationService {
  register(
    metadata: Record<string, string>,
    destination: ObjectLocation,
    signal?: AbortSignal,
  ): Promise<string>;
}
