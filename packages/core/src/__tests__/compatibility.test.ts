/**
 * Tests for the compatibility resolver
 */

import { describe, it, expect } from 'vitest';
import { DENSE_SEARCH_METHOD, resolveCompatibility } from '../compatibility.ts';
import { DenseRetrieval } from '../components/retrieval/dense.ts';
import { HybridRetrieval } from '../components/retrieval/hybrid.ts';
import { SparseRetrieval } from '../components/retrieval/sparse.ts';

const dense = new DenseRetrieval({ id: 'dense' }),
      sparse = new SparseRetrieval({ id: 'sparse' }),
      hybrid = new HybridRetrieval({ id: 'hybrid' });

describe('resolveCompatibility', () => {
   it('supports dense retrieval on every shipped store', () => {
      for (const store of [ 'qdrant', 'pinecone', 'chroma' ]) {
         expect(resolveCompatibility(dense, store)).toEqual({
            retrievalId: 'dense',
            vectorstoreId: store,
            outcome: 'supported',
            searchMethod: DENSE_SEARCH_METHOD,
            sparseVectorsRequired: false,
         });
      }
   });

   it('requires sparse vectors for native sparse and hybrid retrieval', () => {
      expect(resolveCompatibility(sparse, 'qdrant')).toMatchObject({ outcome: 'supported', sparseVectorsRequired: true });
      expect(resolveCompatibility(hybrid, 'qdrant')).toMatchObject({ outcome: 'supported', sparseVectorsRequired: true });
   });

   it('simulates hybrid retrieval on pinecone', () => {
      expect(resolveCompatibility(hybrid, 'pinecone')).toEqual({
         retrievalId: 'hybrid',
         vectorstoreId: 'pinecone',
         outcome: 'simulated',
         searchMethod: 'max_marginal_relevance_search',
         fallback: 'maximum marginal relevance diversity search',
         sparseVectorsRequired: false,
      });
   });

   it('falls back to dense search for undeclared pairs', () => {
      expect(resolveCompatibility(sparse, 'pinecone')).toEqual({
         retrievalId: 'sparse',
         vectorstoreId: 'pinecone',
         outcome: 'unsupported',
         searchMethod: DENSE_SEARCH_METHOD,
         fallback: 'dense similarity search',
         sparseVectorsRequired: false,
      });
      expect(resolveCompatibility(hybrid, 'chroma').outcome).toBe('unsupported');
   });

   it('never infers support for a store it has not seen', () => {
      expect(resolveCompatibility(dense, 'weaviate').outcome).toBe('unsupported');
   });

   it('gives the same answer on every call', () => {
      for (const retrieval of [ dense, sparse, hybrid ]) {
         for (const store of [ 'qdrant', 'pinecone', 'chroma' ]) {
            expect(resolveCompatibility(retrieval, store)).toEqual(resolveCompatibility(retrieval, store));
         }
      }
   });

   it('returns a frozen result', () => {
      expect(Object.isFrozen(resolveCompatibility(hybrid, 'qdrant'))).toBe(true);
   });
});
