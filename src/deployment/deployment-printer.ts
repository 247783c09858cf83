/**
 * Deployment Result Formatting
 *
 * Pure functions building the success and failure reports; the print
 * functions write them to stdout.
 */

import chalk from 'chalk';
import type { PipelineError } from '../lib/errors.js';
import type { LocalCopySummary, PipelineResult, UploadSummary } from '../types.js';

export interface StepTiming {
  name: string;
  duration: number;
}

const RULE_WIDTH = 60;

function timingLines(timings: StepTiming[]): string[] {
  if (timings.length === 0) return [];

  const lines = ['⏱️  Step Timing Breakdown:'];
  for (const timing of timings) {
    const seconds = (timing.duration / 1000).toFixed(1);
    // 30s per block, capped at 20
    const bar = '█'.repeat(Math.min(Math.round(timing.duration / 30_000), 20));
    lines.push(`  ${timing.name.padEnd(32)} ${bar.padEnd(20)} ${seconds}s`);
  }
  lines.push('');
  return lines;
}

/**
 * Success report for a full deployment
 *
 * @example
 * ```typescript
 * formatDeploymentSummary(
 *   { url: 'https://example.com', distributionId: 'E1', distributionDomain: 'd1.cloudfront.net', certificateArn: 'arn' },
 *   [{ name: 'Build', duration: 60000 }]
 * );
 * ```
 */
export function formatDeploymentSummary(result: PipelineResult, timings: StepTiming[]): string[] {
  return [
    '',
    chalk.bold.green('═'.repeat(RULE_WIDTH)),
    chalk.bold.green('✨ DEPLOYMENT SUCCESSFUL'),
    chalk.bold.green('═'.repeat(RULE_WIDTH)),
    '',
    '📊 Deployment Summary:',
    chalk.green(`  URL: ${result.url}`),
    chalk.green(`  Distribution: ${result.distributionId} (${result.distributionDomain})`),
    chalk.green(`  Certificate: ${result.certificateArn}`),
    '',
    ...timingLines(timings),
    chalk.gray('   DNS changes can take a few minutes to propagate'),
  ];
}

export function formatPublishSummary(summary: UploadSummary, bucket: string, prefix: string): string[] {
  const target = prefix ? `s3://${bucket}/${prefix}` : `s3://${bucket}`;
  return [
    '',
    chalk.bold.green(`✅ Uploaded ${summary.fileCount} file${summary.fileCount === 1 ? '' : 's'} to ${target}`),
  ];
}

export function formatLocalSummary(summary: LocalCopySummary): string[] {
  return [
    '',
    chalk.bold.green(`✅ Copied ${summary.fileCount} file${summary.fileCount === 1 ? '' : 's'} to ${summary.destination}`),
  ];
}

/**
 * What an operator can do about the resources a failed run left behind
 */
export function recoveryHints(error: PipelineError): string[] {
  const { known } = error;
  const hints: string[] = [];

  if (known.distributionId) {
    hints.push(
      `Distribution ${known.distributionId} already exists; re-running creates a second one. ` +
        'Wait for it in the CloudFront console and point DNS at it by hand, or delete it first.'
    );
  } else if (known.certificateArn) {
    hints.push(`Certificate ${known.certificateArn} was requested; delete it in ACM if you do not re-run.`);
  }
  if (known.hostedZoneId && error.stepIndex < 9) {
    hints.push(`Validation CNAMEs were written to hosted zone ${known.hostedZoneId}; they are safe to leave.`);
  }
  if (error.stepIndex <= 3) {
    hints.push('Nothing was created outside S3; fix the problem and re-run.');
  }
  return hints;
}

export function formatFailureSummary(error: PipelineError, timings: StepTiming[]): string[] {
  const lines = [
    '',
    chalk.bold.red('═'.repeat(RULE_WIDTH)),
    chalk.bold.red('❌ DEPLOYMENT FAILED'),
    chalk.bold.red('═'.repeat(RULE_WIDTH)),
    '',
    chalk.red(`  Step: ${error.stepIndex} (${error.stepName})`),
    chalk.red(`  Kind: ${error.kind}`),
    chalk.red(`  Error: ${error.reason}`),
    '',
  ];

  const known = Object.entries(error.known);
  if (known.length > 0) {
    lines.push('📋 Already created:');
    for (const [key, value] of known) {
      lines.push(`  ${key}: ${String(value)}`);
    }
    lines.push('');
  }

  lines.push(...timingLines(timings));

  const hints = recoveryHints(error);
  if (hints.length > 0) {
    lines.push(chalk.yellow('🔧 Recovery Options:'));
    hints.forEach((hint, i) => lines.push(chalk.yellow(`  ${i + 1}. ${hint}`)));
  }
  return lines;
}

export function printDeploymentSummary(result: PipelineResult, timings: StepTiming[]): void {
  formatDeploymentSummary(result, timings).forEach(line => console.log(line));
}

export function printDeploymentFailureSummary(error: PipelineError, timings: StepTiming[]): void {
  formatFailureSummary(error, timings).forEach(line => console.log(line));
}
