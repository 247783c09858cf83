/**
 * Error handling utilities for consistent error management
 */

import type { PipelineErrorKind } from '../types.js';

/**
 * Custom error class for deployment failures
 */
export class DeploymentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DeploymentError';
  }
}

/**
 * Custom error class for configuration errors
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly validationErrors?: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Cloud-side identifiers an operator needs to clean up or resume by hand
 */
export type KnownIdentifiers = {
  uploadedFileCount?: number;
  certificateArn?: string;
  hostedZoneId?: string;
  distributionId?: string;
  distributionDomain?: string;
};

/**
 * Thrown by collaborators and steps when the failure kind is known.
 *
 * `partial` carries identifiers created before the failure inside the same
 * step (e.g. the certificate ARN when its validation records never appear).
 */
export class StepFailure extends Error {
  constructor(
    public readonly kind: PipelineErrorKind,
    message: string,
    public readonly partial: KnownIdentifiers = {}
  ) {
    super(message);
    this.name = 'StepFailure';
  }

  withPartial(partial: KnownIdentifiers): StepFailure {
    return new StepFailure(this.kind, this.message, { ...this.partial, ...partial });
  }
}

/**
 * Final error of a pipeline run: which step failed, why, and what already exists
 */
export class PipelineError extends DeploymentError {
  constructor(
    public readonly stepIndex: number,
    public readonly stepName: string,
    public readonly kind: PipelineErrorKind,
    public readonly reason: string,
    public readonly known: KnownIdentifiers
  ) {
    super(`Step ${stepIndex} (${stepName}) failed [${kind}]: ${reason}`, kind, { ...known });
    this.name = 'PipelineError';
  }
}

/**
 * Formats an error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof PipelineError) {
    return error.message;
  }
  if (error instanceof DeploymentError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
