/**
 * Tests for configuration validation and loading
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
   DEFAULT_CONFIG_FILENAME,
   loadGenerationConfig,
   parseGenerationConfig,
   resolveConfigPath,
} from '../config.ts';
import { InvalidConfigurationError } from '../errors.ts';
import { makeConfig } from './helpers.ts';

function captureError(fn: () => unknown): InvalidConfigurationError {
   try {
      fn();
   } catch(error) {
      if (error instanceof InvalidConfigurationError) {
         return error;
      }
      throw error;
   }
   throw new Error('Expected InvalidConfigurationError');
}

describe('parseGenerationConfig', () => {
   it('accepts a complete configuration', () => {
      expect(parseGenerationConfig(makeConfig())).toEqual(makeConfig());
   });

   it('defaults the LLM and chunking strategy', () => {
      const { llm: _llm, chunking_strategy: _chunking, ...rest } = makeConfig();

      const config = parseGenerationConfig(rest);

      expect(config.llm).toEqual({ provider: 'OpenAI', deployment: 'cloud' });
      expect(config.chunking_strategy).toBe('Fixed size');
   });

   it('keeps variant-specific keys on component selections', () => {
      const config = parseGenerationConfig(makeConfig({
         vector_db: { id: 'qdrant', deployment: 'local', timeout: 30 },
      }));

      expect(config.vector_db).toEqual({ id: 'qdrant', deployment: 'local', timeout: 30 });
   });

   it('reports every missing top-level key', () => {
      const { vector_db: _vectorDb, retrieval_method: _retrieval, ...rest } = makeConfig();

      const error = captureError(() => { return parseGenerationConfig(rest); });

      expect(error.missingKeys).toEqual([ 'vector_db', 'retrieval_method' ]);
      expect(error.problems).toEqual([ 'vector_db is required', 'retrieval_method is required' ]);
      expect(error.message).toBe('Invalid configuration:\n  - vector_db is required\n  - retrieval_method is required');
   });

   it('reports nested missing keys by dotted path', () => {
      const error = captureError(() => {
         return parseGenerationConfig({
            ...makeConfig(),
            embedding: { id: 'jina', deployment: 'local' },
         });
      });

      expect(error.missingKeys).toEqual([ 'embedding.model' ]);
   });

   it('rejects an unknown deployment mode without calling it missing', () => {
      const error = captureError(() => {
         return parseGenerationConfig({
            ...makeConfig(),
            vector_db: { id: 'qdrant', deployment: 'edge' },
         });
      });

      expect(error.missingKeys).toEqual([]);
      expect(error.problems).toHaveLength(1);
      expect(error.problems[0]).toMatch(/^vector_db\.deployment: /);
   });

   it('reads a scheme-less LLM endpoint as http', () => {
      const config = parseGenerationConfig(makeConfig({
         llm: { provider: 'Local Endpoint', deployment: 'local', endpoint: 'localhost:8000' },
      }));

      expect(config.llm.endpoint).toBe('http://localhost:8000');
   });

   it('keeps an LLM endpoint that names its scheme', () => {
      const config = parseGenerationConfig(makeConfig({
         llm: { provider: 'Local Endpoint', deployment: 'local', endpoint: 'https://llm.internal:9000/v1' },
      }));

      expect(config.llm.endpoint).toBe('https://llm.internal:9000/v1');
   });

   it('explains the expected endpoint format', () => {
      const error = captureError(() => {
         return parseGenerationConfig(makeConfig({
            llm: { provider: 'Local Endpoint', deployment: 'local', endpoint: 'my llm' },
         }));
      });

      expect(error.problems).toEqual([ 'llm.endpoint: must be a URL such as http://localhost:8000' ]);
   });

   it('rejects a blank project name', () => {
      const error = captureError(() => {
         return parseGenerationConfig(makeConfig({ project_name: '   ' }));
      });

      expect(error.missingKeys).toEqual([]);
      expect(error.problems[0]).toMatch(/^project_name: /);
   });

   it('rejects a chunking strategy the catalog does not offer', () => {
      const error = captureError(() => {
         return parseGenerationConfig(makeConfig({ chunking_strategy: 'Recursive' }));
      });

      expect(error.problems).toEqual([ 'chunking_strategy: must be one of: Fixed size, Semantic' ]);
   });

   it('rejects something that is not an object', () => {
      const error = captureError(() => { return parseGenerationConfig('qdrant'); });

      expect(error.problems).toHaveLength(1);
      expect(error.problems[0]).toMatch(/^\(root\): /);
   });
});

describe('loadGenerationConfig', () => {
   let tempDir: string;

   beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rag-config-test-'));
   });

   afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
   });

   it('reads and validates a JSON file', async () => {
      const file = path.join(tempDir, 'rag-app.json');

      await fs.writeFile(file, JSON.stringify(makeConfig()));

      expect(await loadGenerationConfig(file)).toEqual(makeConfig());
   });

   it('rejects a file that is not JSON', async () => {
      const file = path.join(tempDir, 'broken.json');

      await fs.writeFile(file, '{ "project_name": ');

      const error = await loadGenerationConfig(file).catch((e: unknown) => { return e; });

      expect(error).toBeInstanceOf(InvalidConfigurationError);
      expect(error instanceof InvalidConfigurationError && error.problems[0]).toMatch(`${file} is not valid JSON: `);
   });

   it('rejects a file that does not exist', async () => {
      const file = path.join(tempDir, 'missing.json');

      const error = await loadGenerationConfig(file).catch((e: unknown) => { return e; });

      expect(error).toBeInstanceOf(InvalidConfigurationError);
      expect(error instanceof InvalidConfigurationError && error.problems[0]).toMatch(`Cannot read configuration file ${file}: `);
   });
});

describe('resolveConfigPath', () => {
   afterEach(() => {
      vi.unstubAllEnvs();
   });

   it('resolves an explicit path against the working directory', () => {
      expect(resolveConfigPath('configs/app.json', '/work')).toBe(path.resolve('/work', 'configs/app.json'));
   });

   it('falls back to CREATE_RAG_APP_CONFIG', () => {
      vi.stubEnv('CREATE_RAG_APP_CONFIG', 'from-env.json');

      expect(resolveConfigPath(undefined, '/work')).toBe(path.resolve('/work', 'from-env.json'));
   });

   it('falls back to the default file name', () => {
      vi.stubEnv('CREATE_RAG_APP_CONFIG', '');

      expect(resolveConfigPath(undefined, '/work')).toBe(path.join('/work', DEFAULT_CONFIG_FILENAME));
   });
});
