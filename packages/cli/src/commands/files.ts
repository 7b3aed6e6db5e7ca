/**
 * Files command - Print the generated project's file map
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import { PROJECT_FILES } from '@ragscaffold/core';

interface FilesOptions {
   json?: boolean;
}

export function createFilesCommand(): Command {
   return new Command('files')
      .description('Show which template renders each file of the generated project')
      .option('--json', 'Output as JSON')
      .action((options: FilesOptions) => {
         if (options.json) {
            console.log(JSON.stringify(PROJECT_FILES, null, 2));
            return;
         }

         const entries = Object.entries(PROJECT_FILES),
               width = Math.max(...entries.map(([ file ]) => { return file.length; })) + 2;

         console.log(chalk.bold(`\nProject files (${entries.length})\n`));

         for (const [ file, template ] of entries) {
            console.log(`  ${file.padEnd(width)}${chalk.dim(`← ${template}`)}`);
         }

         console.log('');
      });
}
