/**
 * Context command - Compose the generation context for a configuration
 */

/* eslint-disable no-console */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { DEFAULT_CONFIG_FILENAME, generateContext, loadGenerationConfig, resolveConfigPath } from '@ragscaffold/core';
import { artifactLines, printWarnings, reportError } from '../utils/output.ts';

interface ContextOptions {
   output?: string;
   key?: string;
}

export function createContextCommand(): Command {
   return new Command('context')
      .description('Compose the generation context for a configuration and print it as JSON')
      .argument('[config]', `Configuration file (default: $CREATE_RAG_APP_CONFIG or ./${DEFAULT_CONFIG_FILENAME})`)
      .option('-o, --output <file>', 'Write the context to a file instead of stdout')
      .option('-k, --key <key>', 'Print a single artifact (e.g. docker_service.vectorstore)')
      .action(async (configFile: string | undefined, options: ContextOptions) => {
         // Progress goes to stderr so stdout stays pipeable
         const spinner = ora({ stream: process.stderr });

         try {
            const configPath = resolveConfigPath(configFile);

            spinner.start(`Reading ${configPath}`);

            const config = await loadGenerationConfig(configPath);

            spinner.text = 'Composing generation context';

            const context = generateContext(config);

            spinner.succeed('Generation context composed');
            printWarnings(artifactLines(context.warnings));

            if (options.key) {
               const value = context[options.key];

               if (value === undefined) {
                  throw new Error(`No artifact named '${options.key}'`);
               }

               console.log(artifactLines(value).join('\n'));
               return;
            }

            const json = JSON.stringify(context, null, 2);

            if (options.output) {
               const outputPath = path.resolve(options.output);

               await fs.mkdir(path.dirname(outputPath), { recursive: true });
               await fs.writeFile(outputPath, json + '\n');
               console.log(chalk.green(`✓ Wrote ${outputPath}`));
               return;
            }

            console.log(json);
         } catch(error) {
            if (spinner.isSpinning) {
               spinner.fail('Composition failed');
            }
            reportError(error);
         }
      });
}
