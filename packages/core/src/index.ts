/**
 * @ragscaffold/core - Component model and composition engine for RAG app scaffolding
 *
 * Turns a configuration record (vector store, embedding model, deployment modes,
 * chunking strategy, retrieval method) into a self-consistent GenerationContext of code
 * fragments, docker services, env vars and requirements for a template renderer.
 */

export const VERSION = '0.1.0';

// ============================================================================
// Composition
// ============================================================================

export { Composer, generateContext } from './composer.ts';

export type {
   ArtifactValue,
   ComponentConfig,
   Deployment,
   EmbeddingSelection,
   GenerationConfig,
   GenerationContext,
   LlmSelection,
   Role,
   VectorDbSelection,
} from './types.ts';
export { DEPLOYMENTS } from './types.ts';

// ============================================================================
// Components & Capabilities
// ============================================================================

export { Component, DeployableComponent } from './component.ts';
export type { ComponentOptions, DeployableComponentOptions } from './component.ts';

export {
   CAPABILITIES,
   providesCodeLogic,
   providesDependencies,
   providesDockerService,
   providesRetrievalLogic,
   providesVectorDimension,
} from './capabilities.ts';
export type {
   Capability,
   CodeLogicProvider,
   DependencyProvider,
   DockerServiceProvider,
   FragmentContract,
   RetrievalBinding,
   RetrievalLogicProvider,
   ServiceSpec,
   VectorDimensionProvider,
} from './capabilities.ts';

export { EmbeddingComponent } from './components/embedding/base.ts';
export { JinaEmbedding, JINA_MODEL_DIMENSIONS } from './components/embedding/jina.ts';
export { AllMiniLMEmbedding } from './components/embedding/all-minilm.ts';

export { VectorStoreComponent, DEFAULT_COLLECTION_NAME } from './components/vectorstore/base.ts';
export type { StoreConfigField } from './components/vectorstore/base.ts';
export { QdrantStore } from './components/vectorstore/qdrant.ts';
export { PineconeStore } from './components/vectorstore/pinecone.ts';
export { ChromaStore } from './components/vectorstore/chroma.ts';

export { RetrievalComponent } from './components/retrieval/base.ts';
export type { StoreSupport, SupportLevel } from './components/retrieval/base.ts';
export { DenseRetrieval } from './components/retrieval/dense.ts';
export { SparseRetrieval } from './components/retrieval/sparse.ts';
export { HybridRetrieval } from './components/retrieval/hybrid.ts';

// ============================================================================
// Registry & Compatibility
// ============================================================================

export { VariantRegistry, createDefaultRegistries, RETRIEVAL_ALIASES } from './registry.ts';
export type { ComponentRegistries, VariantConstructor } from './registry.ts';

export { resolveCompatibility, DENSE_SEARCH_METHOD } from './compatibility.ts';
export type { CompatibilityResolution } from './compatibility.ts';

export { describeVariants, compatibilityMatrix } from './inventory.ts';
export type { VariantSummary } from './inventory.ts';

// ============================================================================
// Configuration & Catalog
// ============================================================================

export {
   generationConfigSchema,
   parseGenerationConfig,
   loadGenerationConfig,
   resolveConfigPath,
   DEFAULT_CONFIG_FILENAME,
} from './config.ts';

export {
   VECTOR_DB_OPTIONS,
   EMBEDDING_OPTIONS,
   RETRIEVAL_OPTIONS,
   CHUNKING_STRATEGIES,
   LLM_PROVIDERS,
   DEFAULT_LLM,
   DEFAULT_CHUNKING_STRATEGY,
   findOption,
   resolveDeployment,
   resolveLlmEndpoint,
} from './catalog.ts';
export type { CatalogOption, ChunkingStrategy, LlmProvider } from './catalog.ts';

export { PROJECT_FILES, describeNextSteps } from './project.ts';
export type { NextStepSection } from './project.ts';

// ============================================================================
// Errors
// ============================================================================

export {
   ScaffoldError,
   InvalidConfigurationError,
   UnknownVariantError,
   UnsupportedDeploymentError,
   CompositionFailureError,
} from './errors.ts';

// ============================================================================
// Utilities
// ============================================================================

export { renderServiceBlock, isServiceBlock, APP_NETWORK } from './docker.ts';
export { envLine, envKey, unique } from './utils.ts';
