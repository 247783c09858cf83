/**
 * Runs one pipeline step and turns whatever it does into a StepResult
 */

import { StepFailure, formatError, type KnownIdentifiers } from '../lib/errors.js';
import { systemClock, type Clock } from '../lib/polling.js';
import type { StructuredLogger } from '../monitoring/structured-logger.js';
import type { PipelineErrorKind, SourceRequest } from '../types.js';
import type { PipelineState, StatePatch } from './pipeline-state.js';
import type { PipelineServices, PipelineStep } from './steps.js';

export type StepResult =
  | { ok: true; patch: StatePatch; durationMs: number }
  | {
      ok: false;
      error: { kind: PipelineErrorKind; message: string; partial: KnownIdentifiers };
      durationMs: number;
    };

export interface StepRunEnvironment<R extends SourceRequest> {
  request: Readonly<R>;
  state: PipelineState;
  services: PipelineServices;
  logger: StructuredLogger;
  progress(message: string): void;
}

/**
 * Fields in `patch` that the step did not declare, and declared fields it left out
 */
export function checkPatch(
  step: { produces: readonly string[] },
  patch: StatePatch
): { undeclared: string[]; missing: string[] } {
  const declared = new Set<string>(step.produces);
  const present = Object.entries(patch)
    .filter(([, value]) => value !== undefined)
    .map(([key]) => key);
  return {
    undeclared: present.filter(key => !declared.has(key)),
    missing: step.produces.filter(field => !present.includes(field)),
  };
}

export class StepExecutor {
  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Run `step` against a view of the state limited to its declared inputs,
   * and commit its outputs on success. Never throws.
   */
  async execute<R extends SourceRequest>(step: PipelineStep<R>, env: StepRunEnvironment<R>): Promise<StepResult> {
    const startedAt = this.clock.now();
    const elapsed = (): number => this.clock.now() - startedAt;

    try {
      const patch = await step.run({
        request: env.request,
        state: env.state.restrictTo(step.requires, step.name),
        services: env.services,
        logger: env.logger,
        progress: env.progress,
      });

      const { undeclared, missing } = checkPatch(step, patch);
      if (undeclared.length > 0 || missing.length > 0) {
        const problems = [
          undeclared.length > 0 ? `wrote undeclared field(s) ${undeclared.join(', ')}` : '',
          missing.length > 0 ? `did not produce ${missing.join(', ')}` : '',
        ].filter(Boolean);
        throw new Error(`Step "${step.name}" ${problems.join(' and ')}`);
      }

      env.state.apply(patch);
      return { ok: true, patch, durationMs: elapsed() };
    } catch (error) {
      if (error instanceof StepFailure) {
        return {
          ok: false,
          error: { kind: error.kind, message: error.message, partial: error.partial },
          durationMs: elapsed(),
        };
      }
      return {
        ok: false,
        error: { kind: step.failureKind, message: formatError(error), partial: {} },
        durationMs: elapsed(),
      };
    }
  }
}
