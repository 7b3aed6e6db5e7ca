/**
 * Code shared by the retrieval methods that run on Qdrant's sparse vectors.
 *
 * The store is rebuilt with named "dense" and "sparse" vectors, matching the slots the
 * Qdrant collection init creates when sparse vectors are required.
 */

import { lines } from '../../utils.ts';
import type { NativeAttributes } from './base.ts';

export const QDRANT_SPARSE_IMPORT = 'from langchain_qdrant import FastEmbedSparse, RetrievalMode';

export const SPARSE_EMBEDDING_MODEL = 'Qdrant/bm25';

export const SPARSE_EMBEDDING_UPDATE = `sparse_embedding = FastEmbedSparse(model_name="${SPARSE_EMBEDDING_MODEL}")`;

export const QDRANT_SPARSE_ATTRIBUTES: NativeAttributes = {
   reads: [ 'client', 'collection_name', 'embeddings' ],
   provides: [ 'sparse_embeddings', 'vector_store' ],
};

export function qdrantSparseStoreLogic(label: string, mode: 'SPARSE' | 'HYBRID'): string {
   return lines(
      `# ${label} retrieval on Qdrant`,
      `self.sparse_embeddings = FastEmbedSparse(model_name="${SPARSE_EMBEDDING_MODEL}")`,
      'self.vector_store = QdrantVectorStore(',
      '    client=self.client,',
      '    collection_name=self.collection_name,',
      '    embedding=self.embeddings,',
      '    sparse_embedding=self.sparse_embeddings,',
      `    retrieval_mode=RetrievalMode.${mode},`,
      '    vector_name="dense",',
      '    sparse_vector_name="sparse"',
      ')'
   );
}
