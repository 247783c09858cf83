/**
 * Local dependency install and build
 *
 * Runs the project's package manager in the application directory and finds
 * the static output the build produced.
 */

import { existsSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { execa } from 'execa';
import { StepFailure } from '../lib/errors.js';
import { OUTPUT_DIRECTORIES } from '../lib/constants.js';
import { detectPackageManager, defaultBuildCommand } from '../utils/package-manager.js';
import { createSilentLogger, type StructuredLogger } from '../monitoring/structured-logger.js';
import type { IBuildRunner } from '../lib/interfaces.js';

export interface CommandResult {
  exitCode: number;
  /** Interleaved stdout and stderr */
  output: string;
}

/**
 * Runs a shell command line in a directory
 */
export type CommandExecutor = (command: string, cwd: string) => Promise<CommandResult>;

/**
 * Default executor: the command line goes through the shell so user-supplied
 * build commands like `pnpm build && cp -r public out` work unchanged
 */
export const execaExecutor: CommandExecutor = async (command, cwd) => {
  const result = await execa(command, { cwd, shell: true, reject: false, all: true });
  return {
    exitCode: result.exitCode,
    output: result.all ?? `${result.stdout}${result.stderr}`,
  };
};

/**
 * Last lines of command output, for error messages
 */
export function tailOutput(output: string, lines = 20): string {
  return output.trimEnd().split('\n').slice(-lines).join('\n');
}

/**
 * First existing output folder in precedence order, or null
 */
export function locateOutputDirectory(appDir: string): string | null {
  for (const name of OUTPUT_DIRECTORIES) {
    const candidate = join(appDir, name);
    if (existsSync(candidate) && statSync(candidate).isDirectory()) {
      return candidate;
    }
  }
  return null;
}

export class BuildRunner implements IBuildRunner {
  constructor(
    private readonly exec: CommandExecutor = execaExecutor,
    private readonly logger: StructuredLogger = createSilentLogger()
  ) {}

  async install(appDir: string): Promise<void> {
    const dir = resolve(appDir);
    const { installCommand } = detectPackageManager(dir);
    this.logger.info('Installing dependencies', { command: installCommand, dir });

    const result = await this.run(installCommand, dir, 'InstallFailed');
    if (result.exitCode !== 0) {
      throw new StepFailure(
        'InstallFailed',
        `"${installCommand}" exited with code ${result.exitCode}\n${tailOutput(result.output)}`
      );
    }
  }

  async build(appDir: string, command?: string): Promise<string> {
    const dir = resolve(appDir);
    const buildCommand = command ?? defaultBuildCommand(dir);
    this.logger.info('Building application', { command: buildCommand, dir });

    const result = await this.run(buildCommand, dir, 'BuildFailed');
    if (result.exitCode !== 0) {
      throw new StepFailure(
        'BuildFailed',
        `"${buildCommand}" exited with code ${result.exitCode}\n${tailOutput(result.output)}`
      );
    }

    const outputDir = locateOutputDirectory(dir);
    if (!outputDir) {
      throw new StepFailure(
        'BuildFailed',
        `No build output found in ${dir} (looked for ${OUTPUT_DIRECTORIES.join(', ')})`
      );
    }
    this.logger.debug('Found build output', { outputDir });
    return outputDir;
  }

  private async run(
    command: string,
    cwd: string,
    kind: 'InstallFailed' | 'BuildFailed'
  ): Promise<CommandResult> {
    if (!existsSync(cwd)) {
      throw new StepFailure(kind, `Application directory not found: ${cwd}`);
    }
    try {
      return await this.exec(command, cwd);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StepFailure(kind, `Could not run "${command}": ${reason}`);
    }
  }
}
