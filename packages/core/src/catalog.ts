/**
 * Option catalog - what the selection step offers for each choice.
 *
 * The prompt flow itself lives outside the core; this is the data it presents and the
 * rules it applies when turning a pick into a configuration entry.
 */

import { InvalidConfigurationError, UnsupportedDeploymentError } from './errors.ts';
import type { Deployment, LlmSelection, Role } from './types.ts';

export interface CatalogOption {

   /** Display name shown to the user */
   name: string;

   description: string;

   /** Registered variant id */
   id: string;

   role: Role;

   /** Deployments the option can run in; retrieval methods have none */
   deployments: readonly Deployment[];

   /** Model id written to the config for embedding options */
   defaultModel?: string;
}

export const VECTOR_DB_OPTIONS: readonly CatalogOption[] = [
   {
      name: 'Qdrant',
      description: 'Open-source vector search engine with native sparse and hybrid search',
      id: 'qdrant',
      role: 'vectorstore',
      deployments: [ 'local', 'cloud' ],
   },
   {
      name: 'Pinecone',
      description: 'Managed vector database service, scalable',
      id: 'pinecone',
      role: 'vectorstore',
      deployments: [ 'cloud' ],
   },
   {
      name: 'Chroma',
      description: 'Open-source embedding database, great for getting started',
      id: 'chroma',
      role: 'vectorstore',
      deployments: [ 'local', 'cloud' ],
   },
];

export const EMBEDDING_OPTIONS: readonly CatalogOption[] = [
   {
      name: 'Jina',
      description: 'Top performing open source model',
      id: 'jina',
      role: 'embedding',
      deployments: [ 'local', 'cloud' ],
      defaultModel: 'jina-embeddings-v2-base-en',
   },
   {
      name: 'all-MiniLM-L6-v2',
      description: 'Fast, lightweight, good performance',
      id: 'all_minilm_l6_v2',
      role: 'embedding',
      deployments: [ 'local' ],
      defaultModel: 'all-MiniLM-L6-v2',
   },
];

export const RETRIEVAL_OPTIONS: readonly CatalogOption[] = [
   {
      name: 'Basic Vector Search',
      description: 'Simple similarity search',
      id: 'dense',
      role: 'retrieval',
      deployments: [],
   },
   {
      name: 'Sparse Search',
      description: 'Keyword (BM25) search over sparse vectors',
      id: 'sparse',
      role: 'retrieval',
      deployments: [],
   },
   {
      name: 'Hybrid Search',
      description: 'Combined vector + keyword search',
      id: 'hybrid',
      role: 'retrieval',
      deployments: [],
   },
];

export interface ChunkingStrategy {
   name: string;
   description: string;
}

export const CHUNKING_STRATEGIES: readonly ChunkingStrategy[] = [
   { name: 'Fixed size', description: 'Split by character count' },
   { name: 'Semantic', description: 'Split by semantic meaning' },
];

export const DEFAULT_CHUNKING_STRATEGY = 'Fixed size';

export interface LlmProvider {
   name: string;
   description: string;
   deployment: Deployment;
   endpoint?: string;
}

export const LLM_PROVIDERS: readonly LlmProvider[] = [
   { name: 'OpenAI', description: 'GPT-3.5/4 - Production ready', deployment: 'cloud' },
   {
      name: 'HuggingFace',
      description: 'Cloud-hosted open source models',
      deployment: 'cloud',
      endpoint: 'https://api-inference.huggingface.co',
   },
   {
      name: 'Local Endpoint',
      description: 'Your own locally deployed LLM API',
      deployment: 'local',
      endpoint: 'http://localhost:8000',
   },
];

export const DEFAULT_LLM: LlmSelection = { provider: 'OpenAI', deployment: 'cloud' };

/**
 * Find an option by display name or id (case-insensitive).
 */
export function findOption(options: readonly CatalogOption[], nameOrId: string): CatalogOption | undefined {
   const wanted = nameOrId.trim().toLowerCase();

   return options.find((option) => {
      return option.name.toLowerCase() === wanted || option.id === wanted;
   });
}

/**
 * Pick the deployment for an option: the only one it supports, or the preference when
 * it supports several.
 */
export function resolveDeployment(option: CatalogOption, preferred?: Deployment): Deployment {
   if (preferred !== undefined && !option.deployments.includes(preferred)) {
      throw new UnsupportedDeploymentError(option.role, option.id, preferred, option.deployments);
   }

   if (preferred !== undefined) {
      return preferred;
   }

   if (option.deployments.length === 1) {
      return option.deployments[0];
   }

   throw new InvalidConfigurationError([
      `${option.name} supports ${option.deployments.join(' and ')} deployment; choose one`,
   ]);
}

/**
 * The endpoint the generated app talks to for an LLM selection: the explicit one, or
 * the provider's catalog default.
 */
export function resolveLlmEndpoint(llm: LlmSelection): string | undefined {
   if (llm.endpoint) {
      return llm.endpoint;
   }

   const provider = LLM_PROVIDERS.find((p) => {
      return p.name === llm.provider && p.deployment === llm.deployment;
   });

   if (provider) {
      return provider.endpoint;
   }

   return llm.deployment === 'local' ? 'http://localhost:8000' : undefined;
}
