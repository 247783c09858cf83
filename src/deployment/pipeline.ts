/**
 * Deployment Pipeline - Main Entry Point
 *
 * Drives the fixed step sequence (see steps.ts) through the StepExecutor,
 * holds the cross-step state of one run, and turns the first failure into a
 * PipelineError naming the step and everything already created.
 *
 * Nothing is rolled back on failure. Steps up to the upload are safe to re-run;
 * from `create-distribution` on, a blind retry creates a second distribution.
 */

import { ConfigurationError, PipelineError } from '../lib/errors.js';
import { normalizeDomain, validateDomain } from '../lib/domain-utils.js';
import { systemClock, type Clock } from '../lib/polling.js';
import { createSilentLogger, type StructuredLogger } from '../monitoring/structured-logger.js';
import { PipelineState } from './pipeline-state.js';
import { StepExecutor } from './step-executor.js';
import {
  BUILD_STEPS,
  LOCAL_STEPS,
  PIPELINE_STEPS,
  type PipelineServices,
  type PipelineStep,
  type StepDescriptor,
} from './steps.js';
import type {
  BuildRequest,
  LocalCopySummary,
  LocalDeployRequest,
  PipelineRequest,
  PipelineResult,
  SourceRequest,
  UploadSummary,
} from '../types.js';

/**
 * Receives step lifecycle events (the CLI renders them)
 */
export interface PipelineProgressListener {
  onStepStart?(step: StepDescriptor, total: number): void;
  onStepProgress?(step: StepDescriptor, message: string): void;
  onStepComplete?(step: StepDescriptor, durationMs: number): void;
  onStepFailed?(step: StepDescriptor, error: PipelineError, durationMs: number): void;
}

export interface PipelineOptions {
  logger?: StructuredLogger;
  clock?: Clock;
  listener?: PipelineProgressListener;
}

function describeStep(step: StepDescriptor): StepDescriptor {
  return { index: step.index, name: step.name, title: step.title };
}

/**
 * Main deployment pipeline
 *
 * @example
 * ```typescript
 * const pipeline = new DeploymentPipeline(createAwsServices({ region: 'us-east-1' }));
 * const result = await pipeline.run({
 *   appDir: './site', install: true, bucketName: 'site-bucket', s3Prefix: '', makePublic: true,
 *   domain: 'example.com', certificateTimeoutMs: 30 * 60_000, distributionTimeoutMs: 30 * 60_000,
 * });
 * console.log(result.url); // https://example.com
 * ```
 */
export class DeploymentPipeline {
  private readonly logger: StructuredLogger;
  private readonly executor: StepExecutor;
  private readonly listener: PipelineProgressListener;

  constructor(private readonly services: PipelineServices, options: PipelineOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.executor = new StepExecutor(options.clock ?? systemClock);
    this.listener = options.listener ?? {};
  }

  /**
   * Run all nine steps
   *
   * @throws {ConfigurationError} If the request is invalid (before any step runs)
   * @throws {PipelineError} If a step fails
   */
  async run(request: PipelineRequest): Promise<PipelineResult> {
    const domain = normalizeDomain(request.domain);
    try {
      validateDomain(domain);
    } catch (error) {
      throw new ConfigurationError(error instanceof Error ? error.message : String(error));
    }
    assertPositive('certificate timeout', request.certificateTimeoutMs);
    assertPositive('distribution timeout', request.distributionTimeoutMs);

    if (!request.makePublic) {
      this.logger.warn('Uploading with public-read anyway: the S3 website endpoint only serves public objects');
    }
    const frozen: Readonly<PipelineRequest> = Object.freeze({ ...request, domain, makePublic: true });

    const state = new PipelineState();
    await this.runSteps(PIPELINE_STEPS, frozen, state);

    const result: PipelineResult = {
      url: `https://${domain}`,
      distributionId: state.get('distributionId'),
      distributionDomain: state.get('distributionDomain'),
      certificateArn: state.get('certificateArn'),
    };
    this.logger.info('Deployment complete', { ...result });
    return result;
  }

  /**
   * Run only install, build and upload
   *
   * @throws {PipelineError} If a step fails
   */
  async publish(request: BuildRequest): Promise<UploadSummary> {
    const state = new PipelineState();
    await this.runSteps(BUILD_STEPS, Object.freeze({ ...request }), state);
    return { fileCount: state.get('uploadedFileCount'), keys: [...state.get('uploadedKeys')] };
  }

  /**
   * Install, build and copy the output to a local directory
   *
   * @throws {PipelineError} If a step fails
   */
  async deployLocal(request: LocalDeployRequest): Promise<LocalCopySummary> {
    const state = new PipelineState();
    await this.runSteps(LOCAL_STEPS, Object.freeze({ ...request }), state);
    return { destination: state.get('localPath'), fileCount: state.get('localFileCount') };
  }

  private async runSteps<R extends SourceRequest>(
    steps: readonly PipelineStep<R>[],
    request: Readonly<R>,
    state: PipelineState
  ): Promise<void> {
    const total = steps.length;

    for (const step of steps) {
      state.currentStep = step.index;
      const descriptor = describeStep(step);
      const stepLogger = this.logger.child({ step: step.name });
      this.listener.onStepStart?.(descriptor, total);
      stepLogger.debug(`Step ${step.index}/${total} started`);

      const result = await this.executor.execute(step, {
        request,
        state,
        services: this.services,
        logger: stepLogger,
        progress: message => {
          stepLogger.debug(message);
          this.listener.onStepProgress?.(descriptor, message);
        },
      });

      if (!result.ok) {
        const known = { ...state.known(), ...result.error.partial };
        const error = new PipelineError(step.index, step.name, result.error.kind, result.error.message, known);
        stepLogger.error(`Step ${step.index} (${step.name}) failed`, error, { kind: error.kind, ...known });
        this.listener.onStepFailed?.(descriptor, error, result.durationMs);
        throw error;
      }

      stepLogger.debug(`Step ${step.index}/${total} completed`, { durationMs: result.durationMs });
      this.listener.onStepComplete?.(descriptor, result.durationMs);
    }
  }
}

function assertPositive(label: string, ms: number): void {
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new ConfigurationError(`Invalid ${label}: must be a positive duration`);
  }
}
