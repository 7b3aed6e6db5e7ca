/**
 * Output helpers shared by the commands
 */

/* eslint-disable no-console */

import chalk from 'chalk';
import type { ArtifactValue } from '@ragscaffold/core';

/**
 * An artifact as a list of lines: lists as they are, a string as one entry, and
 * nothing for an absent or empty artifact.
 */
export function artifactLines(value: ArtifactValue | undefined): readonly string[] {
   if (value === undefined) {
      return [];
   }

   if (typeof value === 'string') {
      return value.length > 0 ? [ value ] : [];
   }

   return value;
}

export function errorMessage(error: unknown): string {
   return error instanceof Error ? error.message : String(error);
}

/**
 * Print a failed command's error and mark the process as failed.
 */
export function reportError(error: unknown): void {
   console.error(chalk.red(`\nError: ${errorMessage(error)}`));
   process.exitCode = 1;
}

export function printWarnings(warnings: readonly string[]): void {
   for (const warning of warnings) {
      console.error(chalk.yellow(`⚠ ${warning}`));
   }
}
