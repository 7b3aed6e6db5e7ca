/**
 * Shared test data
 */

import type { GenerationConfig } from '../types.ts';

/**
 * Local Jina + local Qdrant + hybrid retrieval, the canonical all-local selection.
 */
export function makeConfig(overrides: Partial<GenerationConfig> = {}): GenerationConfig {
   return {
      project_name: 'demo-rag',
      vector_db: { id: 'qdrant', provider: 'Qdrant', deployment: 'local' },
      llm: { provider: 'OpenAI', deployment: 'cloud' },
      embedding: { id: 'jina', model: 'jina-embeddings-v2-base-en', deployment: 'local' },
      chunking_strategy: 'Fixed size',
      retrieval_method: 'Hybrid Search',
      ...overrides,
   };
}
