/**
 * Configuration - validation and loading of the generation configuration record
 *
 * The record comes from the selection step (or a JSON file written by hand):
 *
 *   {
 *     "project_name": "my-rag-app",
 *     "vector_db": { "id": "qdrant", "provider": "Qdrant", "deployment": "local" },
 *     "llm": { "provider": "OpenAI", "deployment": "cloud" },
 *     "embedding": { "id": "jina", "model": "jina-embeddings-v2-base-en", "deployment": "local" },
 *     "chunking_strategy": "Fixed size",
 *     "retrieval_method": "Hybrid Search"
 *   }
 *
 * Environment variables:
 *   CREATE_RAG_APP_CONFIG - Default configuration file when none is given
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CHUNKING_STRATEGIES, DEFAULT_CHUNKING_STRATEGY, DEFAULT_LLM } from './catalog.ts';
import { InvalidConfigurationError } from './errors.ts';
import type { GenerationConfig } from './types.ts';

/** File looked up in the working directory when nothing else names a config */
export const DEFAULT_CONFIG_FILENAME = 'rag-app.json';

const deployment = z.enum([ 'local', 'cloud' ]),
      identifier = z.string().trim().min(1);

/** `localhost:8000` is read as `http://localhost:8000` */
const endpoint = z.string().trim()
   .transform((value) => {
      return /^[a-z][a-z0-9+.-]*:\/\//i.test(value) ? value : `http://${value}`;
   })
   .pipe(z.string().url({ message: 'must be a URL such as http://localhost:8000' }));

const chunkingStrategies = CHUNKING_STRATEGIES.map((s) => {
   return s.name;
});

export const generationConfigSchema = z.object({
   project_name: identifier,
   vector_db: z.object({
      id: identifier,
      provider: z.string().optional(),
      deployment,
   }).passthrough(),
   llm: z.object({
      provider: identifier,
      deployment,
      endpoint: endpoint.optional(),
   }).default(DEFAULT_LLM),
   embedding: z.object({
      id: identifier,
      model: identifier,
      deployment,
   }).passthrough(),
   chunking_strategy: z.string().default(DEFAULT_CHUNKING_STRATEGY).refine((value) => {
      return chunkingStrategies.includes(value);
   }, { message: `must be one of: ${chunkingStrategies.join(', ')}` }),
   retrieval_method: identifier,
});

/**
 * Validate a configuration record, collecting every problem before failing.
 *
 * @throws InvalidConfigurationError listing all missing keys and malformed values
 */
export function parseGenerationConfig(input: unknown): GenerationConfig {
   const result = generationConfigSchema.safeParse(input);

   if (result.success) {
      return result.data;
   }

   const missingKeys: string[] = [],
         problems: string[] = [];

   for (const issue of result.error.issues) {
      const key = issue.path.join('.') || '(root)';

      if (issue.code === 'invalid_type' && issue.received === 'undefined') {
         missingKeys.push(key);
         problems.push(`${key} is required`);
      } else {
         problems.push(`${key}: ${issue.message}`);
      }
   }

   throw new InvalidConfigurationError(problems, missingKeys);
}

/**
 * Which configuration file to read: the explicit path, then CREATE_RAG_APP_CONFIG,
 * then `rag-app.json` in the working directory.
 */
export function resolveConfigPath(explicit?: string, cwd?: string): string {
   if (explicit) {
      return path.resolve(cwd ?? process.cwd(), explicit);
   }

   // eslint-disable-next-line no-process-env
   const envPath = process.env.CREATE_RAG_APP_CONFIG;

   if (envPath) {
      return path.resolve(cwd ?? process.cwd(), envPath);
   }

   return path.join(cwd ?? process.cwd(), DEFAULT_CONFIG_FILENAME);
}

/**
 * Read and validate a JSON configuration file.
 */
export async function loadGenerationConfig(filePath: string): Promise<GenerationConfig> {
   let raw: string;

   try {
      raw = await fs.readFile(filePath, 'utf-8');
   } catch(error) {
      const reason = error instanceof Error ? error.message : String(error);

      throw new InvalidConfigurationError([ `Cannot read configuration file ${filePath}: ${reason}` ]);
   }

   let parsed: unknown;

   try {
      parsed = JSON.parse(raw);
   } catch(error) {
      const reason = error instanceof Error ? error.message : String(error);

      throw new InvalidConfigurationError([ `${filePath} is not valid JSON: ${reason}` ]);
   }

   return parseGenerationConfig(parsed);
}
