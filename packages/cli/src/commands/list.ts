/**
 * List command - List registered variants and the retrieval compatibility matrix
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import { compatibilityMatrix, createDefaultRegistries, describeVariants } from '@ragscaffold/core';
import type { CompatibilityResolution, Role, VariantSummary } from '@ragscaffold/core';
import { reportError } from '../utils/output.ts';

interface ListOptions {
   json?: boolean;
}

const ROLE_TITLES: [ Role, string ][] = [
   [ 'embedding', 'Embedding models' ],
   [ 'vectorstore', 'Vector stores' ],
   [ 'retrieval', 'Retrieval methods' ],
];

export function createListCommand(): Command {
   return new Command('list')
      .alias('l')
      .description('List registered variants, their capabilities and retrieval compatibility')
      .option('--json', 'Output as JSON')
      .action((options: ListOptions) => {
         try {
            const registries = createDefaultRegistries(),
                  variants = describeVariants(registries),
                  compatibility = compatibilityMatrix(registries);

            if (options.json) {
               console.log(JSON.stringify({ variants, compatibility }, null, 2));
               return;
            }

            printVariants(variants);
            printMatrix(registries.vectorstore.ids(), compatibility);
         } catch(error) {
            reportError(error);
         }
      });
}

function printVariants(variants: VariantSummary[]): void {
   for (const [ role, title ] of ROLE_TITLES) {
      const forRole = variants.filter((v) => { return v.role === role; });

      if (forRole.length === 0) {
         continue;
      }

      console.log(chalk.bold(`\n${title}\n`));

      for (const variant of forRole) {
         const deployments = variant.deployments.length > 0 ? chalk.dim(` [${variant.deployments.join(', ')}]`) : '';

         console.log(`  ${chalk.bold(variant.id)} ${variant.name}${deployments}`);
         if (variant.description) {
            console.log(`    ${chalk.dim(variant.description)}`);
         }
         console.log(`    ${chalk.dim('Capabilities:')} ${variant.capabilities.join(', ')}`);
      }
   }
}

function printMatrix(storeIds: string[], compatibility: CompatibilityResolution[]): void {
   const width = Math.max(...storeIds.map((id) => { return id.length; }), 'unsupported'.length) + 2;

   console.log(chalk.bold('\nRetrieval compatibility\n'));
   console.log(`  ${''.padEnd(10)}${storeIds.map((id) => { return id.padEnd(width); }).join('')}`);

   const retrievalIds = [ ...new Set(compatibility.map((r) => { return r.retrievalId; })) ];

   for (const retrievalId of retrievalIds) {
      const cells = storeIds.map((storeId) => {
         const resolution = compatibility.find((r) => {
            return r.retrievalId === retrievalId && r.vectorstoreId === storeId;
         });

         return (resolution?.outcome ?? '-').padEnd(width);
      });

      console.log(`  ${retrievalId.padEnd(10)}${cells.join('')}`);
   }
   console.log('');
}
