/**
 * Error taxonomy for the mirror pipeline.
 *
 * Transport failures from the OSM API surface as ApiError
 * (@sandbox-mirror/clients-core); everything here is raised by the
 * pipeline itself.
 */

/** Malformed or oversized bounding box. Raised before any network call. */
export class InvalidBboxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidBboxError";
  }
}

/** The server refuses further downloads. Never retried. */
export class RateLimitedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RateLimitedError";
  }
}

/** The Overpass donor returned anything other than data. */
export class DonorFetchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DonorFetchError";
  }
}

/** Opening a changeset or uploading into it failed. */
export class ChangesetError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ChangesetError";
  }
}

/** A wire record could not be turned into an element. */
export class MalformedRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedRecordError";
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
