/**
 * Check command - Validate a configuration and summarize what it generates
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import {
   DEFAULT_CONFIG_FILENAME,
   describeNextSteps,
   generateContext,
   loadGenerationConfig,
   resolveConfigPath,
} from '@ragscaffold/core';
import type { GenerationContext } from '@ragscaffold/core';
import { artifactLines, printWarnings, reportError } from '../utils/output.ts';

const OUTCOME_COLORS = {
   supported: chalk.green,
   simulated: chalk.yellow,
   unsupported: chalk.red,
};

function text(context: GenerationContext, key: string): string {
   return artifactLines(context[key]).join(', ');
}

function printOutcome(context: GenerationContext): void {
   const outcome = text(context, 'retrieval.outcome'),
         color = outcome === 'supported' || outcome === 'simulated' || outcome === 'unsupported'
            ? OUTCOME_COLORS[outcome]
            : chalk.white;

   console.log(`  ${chalk.dim('Embedding:')}    ${text(context, 'embedding.id')} (${text(context, 'embedding.deployment')})`);
   console.log(`  ${chalk.dim('Vector store:')} ${text(context, 'vectorstore.id')} (${text(context, 'vectorstore.deployment')})`);
   console.log(
      `  ${chalk.dim('Retrieval:')}    ${text(context, 'retrieval.id')} ${color(outcome)}` +
      ` ${chalk.dim(`via ${text(context, 'retrieval.search_method')}`)}`
   );
}

export function createCheckCommand(): Command {
   return new Command('check')
      .description('Validate a configuration and show the compatibility outcome and docker services')
      .argument('[config]', `Configuration file (default: $CREATE_RAG_APP_CONFIG or ./${DEFAULT_CONFIG_FILENAME})`)
      .action(async (configFile: string | undefined) => {
         try {
            const configPath = resolveConfigPath(configFile),
                  config = await loadGenerationConfig(configPath),
                  context = generateContext(config);

            console.log(chalk.green(`✓ ${configPath} is valid`));
            console.log(chalk.bold(`\n${config.project_name}\n`));
            printOutcome(context);

            const services = [ text(context, 'embedding.service_name'), text(context, 'vectorstore.service_name') ]
               .filter((name) => { return name.length > 0; });

            console.log(`  ${chalk.dim('Docker:')}       ${services.length > 0 ? services.join(', ') : 'no local services'}`);
            console.log('');

            printWarnings(artifactLines(context.warnings));

            for (const section of describeNextSteps(config)) {
               console.log(chalk.bold(section.title));
               for (const step of section.steps) {
                  console.log(`  • ${step}`);
               }
            }
         } catch(error) {
            reportError(error);
         }
      });
}
