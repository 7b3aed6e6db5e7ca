/**
 * Dense retrieval: plain embedding similarity search. Every store we ship runs it
 * natively.
 */

import { lines } from '../../utils.ts';
import type { VectorStoreComponent } from '../vectorstore/base.ts';
import { RetrievalComponent } from './base.ts';
import type { StoreSupport } from './base.ts';

export class DenseRetrieval extends RetrievalComponent {

   public readonly label = 'Dense';

   public readonly usesSparseVectors = false;

   protected readonly _support = new Map<string, StoreSupport>([
      [ 'qdrant', { level: 'supported' } ],
      [ 'pinecone', { level: 'supported' } ],
      [ 'chroma', { level: 'supported' } ],
   ]);

   protected _nativeDescription(): string {
      return 'Retrieve documents using dense vector similarity search.';
   }

   protected _nativeImports(store: VectorStoreComponent): string[] {
      return store.id === 'qdrant' ? [ 'from langchain_qdrant import RetrievalMode' ] : [];
   }

   protected _nativeInitLogic(store: VectorStoreComponent): string {
      if (store.id === 'qdrant') {
         return lines(
            '# Dense retrieval on Qdrant',
            'self.vector_store.retrieval_mode = RetrievalMode.DENSE'
         );
      }

      return lines(
         `# Dense retrieval is the default mode for ${store.id}`,
         'pass'
      );
   }

}
