/**
 * Terminal rendering of pipeline progress
 * One ora spinner per step, with the progress bar after each step
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { DeploymentProgress } from '../../lib/deployment-progress.js';
import type { PipelineError } from '../../lib/errors.js';
import type { PipelineProgressListener } from '../../deployment/pipeline.js';
import type { StepDescriptor } from '../../deployment/steps.js';
import type { StepTiming } from '../../deployment/deployment-printer.js';

export interface SpinnerListenerOptions {
  /** Suppress spinner output (non-TTY runs, tests) */
  silent?: boolean;
  /** Where the progress bar goes */
  write?: (line: string) => void;
}

export class SpinnerProgressListener implements PipelineProgressListener {
  private readonly progress: DeploymentProgress;
  private readonly silent: boolean;
  private readonly write: (line: string) => void;
  private spinner: Ora | null = null;

  constructor(stepTitles: string[], options: SpinnerListenerOptions = {}) {
    this.progress = new DeploymentProgress(stepTitles);
    this.silent = options.silent ?? false;
    this.write = options.write ?? (line => console.log(line));
  }

  onStepStart(step: StepDescriptor): void {
    this.progress.startStep(step.index);
    this.spinner = ora({
      text: this.progress.getStepHeader(step.index),
      color: 'cyan',
      isSilent: this.silent,
    }).start();
  }

  onStepProgress(step: StepDescriptor, message: string): void {
    if (this.spinner) {
      this.spinner.text = `${this.progress.getStepHeader(step.index)} ${chalk.gray(message)}`;
    }
  }

  onStepComplete(step: StepDescriptor, durationMs: number): void {
    this.progress.completeStep(step.index, true);
    this.spinner?.succeed(`${this.progress.getStepHeader(step.index)} ${chalk.gray(`(${(durationMs / 1000).toFixed(1)}s)`)}`);
    this.spinner = null;
    this.printProgressBar();
  }

  onStepFailed(step: StepDescriptor, error: PipelineError): void {
    this.progress.completeStep(step.index, false);
    this.spinner?.fail(`${this.progress.getStepHeader(step.index)} ${chalk.red(error.kind)}`);
    this.spinner = null;
    this.printProgressBar();
    this.write(chalk.red(`❌ ${this.progress.getFailureSummary(step.index)}`));
  }

  timings(): StepTiming[] {
    return this.progress.getTimings();
  }

  private printProgressBar(): void {
    const eta = this.progress.getEstimatedTimeRemaining();
    const suffix = eta !== null && eta > 0 ? chalk.gray(`  ⏱️  ~${eta}s remaining`) : '';
    this.write(`${this.progress.getProgressBar()}${suffix}`);
  }
}
