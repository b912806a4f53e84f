/**
 * Error kinds surfaced by the pipeline
 */

import type { ArtifactPaths } from "./types";

export type ErrorKind =
  | "ConfigMissing"
  | "AuthenticationRequired"
  | "NavigationFailed"
  | "CaptureFailed"
  | "GenerationFailed"
  | "PersistenceFailed"
  | "Cancelled";

export class ReportDescriberError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ConfigMissingError extends ReportDescriberError {
  readonly key: string;

  constructor(key: string, detail: string) {
    super("ConfigMissing", `Missing required configuration ${key}: ${detail}`);
    this.key = key;
  }
}

export class AuthenticationRequiredError extends ReportDescriberError {
  constructor(message: string, options?: ErrorOptions) {
    super("AuthenticationRequired", message, options);
  }
}

export class NavigationFailedError extends ReportDescriberError {
  constructor(message: string, options?: ErrorOptions) {
    super("NavigationFailed", message, options);
  }
}

export class CaptureFailedError extends ReportDescriberError {
  constructor(message: string, options?: ErrorOptions) {
    super("CaptureFailed", message, options);
  }
}

export class GenerationFailedError extends ReportDescriberError {
  /** Artifacts already on disk when generation failed; they are kept. */
  readonly artifacts: ArtifactPaths[];

  constructor(message: string, artifacts: ArtifactPaths[], options?: ErrorOptions) {
    super("GenerationFailed", message, options);
    this.artifacts = artifacts;
  }
}

export class PersistenceFailedError extends ReportDescriberError {
  constructor(message: string, options?: ErrorOptions) {
    super("PersistenceFailed", message, options);
  }
}

export class CancelledError extends ReportDescriberError {
  constructor(message: string, options?: ErrorOptions) {
    super("Cancelled", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify an arbitrary failure, using the fallback kind for untyped errors
 */
export function errorKindOf(error: unknown, fallback: ErrorKind): ErrorKind {
  return error instanceof ReportDescriberError ? error.kind : fallback;
}
