/**
 * @ragscaffold/cli - Command-line interface for RAG app scaffolding
 *
 * Validates generation configurations and composes the context the project templates
 * are rendered with.
 */

import { Command } from 'commander';
import { VERSION } from '@ragscaffold/core';
import { createCheckCommand } from './commands/check.ts';
import { createContextCommand } from './commands/context.ts';
import { createFilesCommand } from './commands/files.ts';
import { createListCommand } from './commands/list.ts';

export function createProgram(): Command {
   const program = new Command();

   program
      .name('create-rag-app')
      .description('Compose container-deployable RAG applications from pluggable components')
      .version(VERSION, '-V, --cli-version', 'Output the CLI version');

   // Register commands
   program.addCommand(createContextCommand());
   program.addCommand(createCheckCommand());
   program.addCommand(createListCommand());
   program.addCommand(createFilesCommand());

   return program;
}
