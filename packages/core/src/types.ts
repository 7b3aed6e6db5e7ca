/**
 * Core type definitions for @ragscaffold/core
 */

/** Where a component runs: in a local container, or as a managed cloud service */
export type Deployment = 'local' | 'cloud';

export const DEPLOYMENTS: readonly Deployment[] = [ 'local', 'cloud' ];

/** The pluggable responsibilities a variant can fill */
export type Role = 'embedding' | 'vectorstore' | 'retrieval';

/**
 * Key/value record scoped to one component instance.
 *
 * `id` is always present. `deployment` is present for embedding and vector store
 * components; anything else is variant-specific (e.g. `model`).
 */
export interface ComponentConfig {
   readonly id: string;
   readonly deployment?: Deployment;
   readonly [key: string]: unknown;
}

export interface VectorDbSelection {
   id: string;
   provider?: string;
   deployment: Deployment;
   [key: string]: unknown;
}

export interface EmbeddingSelection {
   id: string;
   model: string;
   deployment: Deployment;
   [key: string]: unknown;
}

export interface LlmSelection {
   provider: string;
   deployment: Deployment;
   endpoint?: string;
}

/**
 * The configuration record produced by the prompt/selection step.
 */
export interface GenerationConfig {

   /** Name of the generated project (also the output directory name) */
   project_name: string;

   vector_db: VectorDbSelection;

   llm: LlmSelection;

   embedding: EmbeddingSelection;

   /** Chunking strategy display name (e.g. "Fixed size") */
   chunking_strategy: string;

   /** Retrieval method id or display name (e.g. "hybrid" or "Hybrid Search") */
   retrieval_method: string;
}

/** A single generated artifact: one string, or an ordered list of lines/blocks */
export type ArtifactValue = string | readonly string[];

/**
 * The merged, role-namespaced set of generated artifacts for one request.
 *
 * Keys look like `embedding.code_logic`, `vectorstore.collection_init_logic`,
 * `docker_service.vectorstore` or the merged `requirements` and `env_vars` lists.
 */
export type GenerationContext = Readonly<Record<string, ArtifactValue>>;
