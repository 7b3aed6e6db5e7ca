/**
 * Hybrid retrieval: dense and sparse scores fused. Native on Qdrant; on Pinecone it is
 * simulated with maximum marginal relevance search, which trades some relevance for
 * result diversity.
 */

import type { VectorStoreComponent } from '../vectorstore/base.ts';
import { RetrievalComponent } from './base.ts';
import type { NativeAttributes, StoreSupport } from './base.ts';
import { qdrantSparseStoreLogic, QDRANT_SPARSE_ATTRIBUTES, QDRANT_SPARSE_IMPORT, SPARSE_EMBEDDING_UPDATE } from './qdrant-sparse.ts';

export class HybridRetrieval extends RetrievalComponent {

   public readonly label = 'Hybrid';

   public readonly usesSparseVectors = true;

   protected readonly _support = new Map<string, StoreSupport>([
      [ 'qdrant', { level: 'supported' } ],
      [
         'pinecone',
         {
            level: 'simulated',
            strategy: 'maximum marginal relevance diversity search',
            searchMethod: 'max_marginal_relevance_search',
         },
      ],
   ]);

   protected _nativeDescription(): string {
      return 'Retrieve documents using hybrid search (dense + sparse).';
   }

   protected _nativeImports(_store: VectorStoreComponent): string[] {
      return [ QDRANT_SPARSE_IMPORT ];
   }

   protected _nativeRequirements(_store: VectorStoreComponent): string[] {
      return [ 'fastembed' ];
   }

   protected _nativeConfigUpdates(_store: VectorStoreComponent): string {
      return SPARSE_EMBEDDING_UPDATE;
   }

   protected _nativeInitLogic(_store: VectorStoreComponent): string {
      return qdrantSparseStoreLogic('Hybrid', 'HYBRID');
   }

   protected _nativeAttributes(_store: VectorStoreComponent): NativeAttributes {
      return QDRANT_SPARSE_ATTRIBUTES;
   }

}
