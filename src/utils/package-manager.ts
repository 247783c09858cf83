import { existsSync } from 'fs';
import { resolve } from 'path';

export type PackageManager = 'pnpm' | 'yarn' | 'npm' | 'bun';

export interface PackageManagerInfo {
  name: PackageManager;
  installCommand: string;
  runCommand: string;
}

/**
 * Detect which package manager is being used in a project
 * by checking for lock files in order of preference
 */
export function detectPackageManager(projectPath: string = process.cwd()): PackageManagerInfo {
  if (existsSync(resolve(projectPath, 'pnpm-lock.yaml'))) {
    return {
      name: 'pnpm',
      installCommand: 'pnpm install',
      runCommand: 'pnpm',
    };
  }

  if (existsSync(resolve(projectPath, 'yarn.lock'))) {
    return {
      name: 'yarn',
      installCommand: 'yarn install',
      runCommand: 'yarn',
    };
  }

  if (existsSync(resolve(projectPath, 'bun.lockb')) || existsSync(resolve(projectPath, 'bun.lock'))) {
    return {
      name: 'bun',
      installCommand: 'bun install',
      // `bun build` is the bundler, not the package script
      runCommand: 'bun run',
    };
  }

  // Default to npm if no lock file found
  return {
    name: 'npm',
    installCommand: 'npm install',
    runCommand: 'npm run',
  };
}

/**
 * Command that runs the project's `build` script with its own package manager
 */
export function defaultBuildCommand(projectPath: string = process.cwd()): string {
  return `${detectPackageManager(projectPath).runCommand} build`;
}
