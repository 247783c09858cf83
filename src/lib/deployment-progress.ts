/**
 * Deployment Progress Tracker
 * Tracks step status, renders the progress bar and estimates time remaining
 */

import chalk from 'chalk';

export type StepStatus = 'pending' | 'running' | 'passed' | 'failed';

export interface TrackedStep {
  number: number;
  total: number;
  title: string;
  status: StepStatus;
  duration?: number;
  startTime?: number;
}

export class DeploymentProgress {
  private readonly steps: TrackedStep[];

  constructor(stepTitles: string[], private readonly now: () => number = Date.now) {
    this.steps = stepTitles.map((title, index) => ({
      number: index + 1,
      total: stepTitles.length,
      title,
      status: 'pending' as const,
    }));
  }

  private step(stepNumber: number): TrackedStep {
    const step = this.steps[stepNumber - 1];
    if (!step) {
      throw new Error(`Unknown step ${stepNumber} (tracking ${this.steps.length})`);
    }
    return step;
  }

  startStep(stepNumber: number): void {
    const step = this.step(stepNumber);
    step.status = 'running';
    step.startTime = this.now();
  }

  /**
   * Mark a step as complete (passed or failed)
   */
  completeStep(stepNumber: number, passed: boolean): void {
    const step = this.step(stepNumber);
    step.status = passed ? 'passed' : 'failed';
    if (step.startTime !== undefined) {
      step.duration = this.now() - step.startTime;
    }
  }

  /**
   * Formatted step header, e.g. "STEP 3/9: Upload to S3"
   */
  getStepHeader(stepNumber: number): string {
    const step = this.step(stepNumber);
    return `STEP ${step.number}/${step.total}: ${step.title}`;
  }

  /**
   * One indicator per step
   * Example: ✅ | ✅ | ⏳ | ⏸️ | ⏸️
   */
  getProgressBar(): string {
    return this.steps
      .map(step => {
        switch (step.status) {
          case 'passed':
            return chalk.green('✅');
          case 'running':
            return chalk.yellow('⏳');
          case 'failed':
            return chalk.red('❌');
          case 'pending':
            return chalk.gray('⏸️');
        }
      })
      .join(' | ');
  }

  /**
   * Seconds remaining, from the average duration of passed steps.
   * Null until at least one step has passed.
   */
  getEstimatedTimeRemaining(): number | null {
    const completed = this.steps.filter(s => s.status === 'passed' && s.duration !== undefined);
    if (completed.length === 0) return null;

    const avgDuration = completed.reduce((sum, s) => sum + (s.duration ?? 0), 0) / completed.length;
    const remaining = this.steps.filter(s => s.status === 'pending').length;

    return Math.round((avgDuration * remaining) / 1000);
  }

  getFailureSummary(failedStepNumber: number): string {
    const step = this.step(failedStepNumber);
    const completed = this.steps.filter(s => s.status === 'passed').length;

    return `Failed at STEP ${step.number}/${step.total}: ${step.title} (${completed}/${step.total - 1} prior steps completed)`;
  }

  /**
   * Durations of every step that finished, in order
   */
  getTimings(): { name: string; duration: number }[] {
    return this.steps
      .filter(s => s.duration !== undefined)
      .map(s => ({ name: s.title, duration: s.duration ?? 0 }));
  }
}
