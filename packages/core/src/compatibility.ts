/**
 * Compatibility resolver - decides how a retrieval method runs against a vector store.
 *
 * Outcomes:
 *   supported   - the retrieval variant lists the store as native; vendor code path
 *   simulated   - the variant lists a documented analog (e.g. MMR standing in for
 *                 hybrid); generated code falls back to similarity search at runtime
 *   unsupported - the store is not listed; dense similarity search with a warning
 *                 emitted into the generated application
 *
 * Support is looked up per (retrieval, store) pair and never inferred, so registering
 * a new store cannot change what an existing retrieval variant does with it.
 */

import type { RetrievalComponent, SupportLevel } from './components/retrieval/base.ts';

/** Search method used by the dense path and every fallback */
export const DENSE_SEARCH_METHOD = 'similarity_search';

export interface CompatibilityResolution {
   retrievalId: string;
   vectorstoreId: string;
   outcome: SupportLevel;

   /** Name of the vector store method the generated `retrieve()` calls */
   searchMethod: string;

   /** What runs instead of the native path (absent when supported) */
   fallback?: string;

   /** Whether the store must create sparse vector slots next to the dense ones */
   sparseVectorsRequired: boolean;
}

export function resolveCompatibility(retrieval: RetrievalComponent, vectorstoreId: string): CompatibilityResolution {
   const support = retrieval.supportFor(vectorstoreId);

   let resolution: CompatibilityResolution;

   if (!support) {
      resolution = {
         retrievalId: retrieval.id,
         vectorstoreId,
         outcome: 'unsupported',
         searchMethod: DENSE_SEARCH_METHOD,
         fallback: 'dense similarity search',
         sparseVectorsRequired: false,
      };
   } else if (support.level === 'simulated') {
      resolution = {
         retrievalId: retrieval.id,
         vectorstoreId,
         outcome: 'simulated',
         searchMethod: support.searchMethod,
         fallback: support.strategy,
         sparseVectorsRequired: false,
      };
   } else {
      resolution = {
         retrievalId: retrieval.id,
         vectorstoreId,
         outcome: 'supported',
         searchMethod: retrieval.nativeSearchMethod,
         sparseVectorsRequired: retrieval.usesSparseVectors,
      };
   }

   return Object.freeze(resolution);
}
