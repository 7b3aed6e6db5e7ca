/**
 * Sparse (keyword/BM25) retrieval. Native only on Qdrant, which stores sparse vectors
 * next to the dense ones.
 */

import type { VectorStoreComponent } from '../vectorstore/base.ts';
import { RetrievalComponent } from './base.ts';
import type { NativeAttributes, StoreSupport } from './base.ts';
import { qdrantSparseStoreLogic, QDRANT_SPARSE_ATTRIBUTES, QDRANT_SPARSE_IMPORT, SPARSE_EMBEDDING_UPDATE } from './qdrant-sparse.ts';

export class SparseRetrieval extends RetrievalComponent {

   public readonly label = 'Sparse';

   public readonly usesSparseVectors = true;

   protected readonly _support = new Map<string, StoreSupport>([
      [ 'qdrant', { level: 'supported' } ],
   ]);

   protected _nativeDescription(): string {
      return 'Retrieve documents using sparse vector search.';
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
      return qdrantSparseStoreLogic('Sparse', 'SPARSE');
   }

   protected _nativeAttributes(_store: VectorStoreComponent): NativeAttributes {
      return QDRANT_SPARSE_ATTRIBUTES;
   }

}
