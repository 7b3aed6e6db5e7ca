/**
 * Tests for variant registries
 */

import { describe, it, expect } from 'vitest';
import { JinaEmbedding } from '../components/embedding/jina.ts';
import type { RetrievalComponent } from '../components/retrieval/base.ts';
import { DenseRetrieval } from '../components/retrieval/dense.ts';
import { HybridRetrieval } from '../components/retrieval/hybrid.ts';
import { UnknownVariantError } from '../errors.ts';
import { VariantRegistry, createDefaultRegistries } from '../registry.ts';

describe('createDefaultRegistries', () => {
   const registries = createDefaultRegistries();

   it('registers every shipped variant in order', () => {
      expect(registries.embedding.ids()).toEqual([ 'jina', 'all_minilm_l6_v2' ]);
      expect(registries.vectorstore.ids()).toEqual([ 'qdrant', 'pinecone', 'chroma' ]);
      expect(registries.retrieval.ids()).toEqual([ 'dense', 'sparse', 'hybrid' ]);
   });

   it('builds independent registries on each call', () => {
      expect(createDefaultRegistries().retrieval).not.toBe(registries.retrieval);
   });
});

describe('VariantRegistry', () => {
   const registries = createDefaultRegistries();

   it('resolves display names and ids regardless of case', () => {
      expect(registries.retrieval.canonicalId('Hybrid Search')).toBe('hybrid');
      expect(registries.retrieval.canonicalId(' HYBRID ')).toBe('hybrid');
      expect(registries.retrieval.canonicalId('Basic Vector Search')).toBe('dense');
      expect(registries.vectorstore.canonicalId('Qdrant')).toBe('qdrant');
   });

   it('creates the variant with its canonical id', () => {
      const retrieval = registries.retrieval.create({ id: 'Hybrid Search' });

      expect(retrieval).toBeInstanceOf(HybridRetrieval);
      expect(retrieval.id).toBe('hybrid');

      const embedding = registries.embedding.create({ id: 'JINA', model: 'jina-embeddings-v3', deployment: 'cloud' });

      expect(embedding).toBeInstanceOf(JinaEmbedding);
      expect(embedding.id).toBe('jina');
   });

   it('names the role and id of an unknown variant', () => {
      try {
         registries.embedding.resolve('nonexistent');
         expect.unreachable();
      } catch(error) {
         expect(error).toBeInstanceOf(UnknownVariantError);
         if (error instanceof UnknownVariantError) {
            expect(error.role).toBe('embedding');
            expect(error.id).toBe('nonexistent');
            expect(error.message).toBe('Unknown embedding variant \'nonexistent\' (registered: jina, all_minilm_l6_v2)');
         }
      }
   });

   it('reports has() for ids and aliases', () => {
      expect(registries.retrieval.has('Sparse Search')).toBe(true);
      expect(registries.retrieval.has('reranked')).toBe(false);
   });

   it('refuses an alias to an unregistered id', () => {
      expect(() => {
         return new VariantRegistry<RetrievalComponent>('retrieval', { dense: DenseRetrieval }, { 'Hybrid Search': 'hybrid' });
      }).toThrow('Alias \'Hybrid Search\' points at unregistered retrieval variant \'hybrid\'');
   });
});
