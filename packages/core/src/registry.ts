/**
 * Variant registries - map stable ids to the constructor of the matching variant.
 *
 * A registry is built once from a fixed entry table and is read-only afterwards; there
 * is no registration at request time. The composer receives the registries it should
 * use, so tests can hand it a reduced set.
 *
 * To add a variant:
 * 1. Create the class under ./components/<role>/
 * 2. Add it to the matching table in createDefaultRegistries()
 * 3. For a new vector store, decide per retrieval variant whether it is supported
 */

import type { Component } from './component.ts';
import { UnknownVariantError } from './errors.ts';
import type { ComponentConfig, Role } from './types.ts';
import { AllMiniLMEmbedding } from './components/embedding/all-minilm.ts';
import type { EmbeddingComponent } from './components/embedding/base.ts';
import { JinaEmbedding } from './components/embedding/jina.ts';
import type { RetrievalComponent } from './components/retrieval/base.ts';
import { DenseRetrieval } from './components/retrieval/dense.ts';
import { HybridRetrieval } from './components/retrieval/hybrid.ts';
import { SparseRetrieval } from './components/retrieval/sparse.ts';
import type { VectorStoreComponent } from './components/vectorstore/base.ts';
import { ChromaStore } from './components/vectorstore/chroma.ts';
import { PineconeStore } from './components/vectorstore/pinecone.ts';
import { QdrantStore } from './components/vectorstore/qdrant.ts';

export type VariantConstructor<T extends Component> = new (config: ComponentConfig) => T;

function normalize(id: string): string {
   return id.trim().toLowerCase();
}

export class VariantRegistry<T extends Component> {

   private readonly _entries: ReadonlyMap<string, VariantConstructor<T>>;
   private readonly _lookup: ReadonlyMap<string, string>;

   /**
    * @param role - Role every registered variant fills
    * @param entries - Variant id → constructor
    * @param aliases - Alternative names (e.g. display names) → variant id
    */
   public constructor(
      public readonly role: Role,
      entries: Readonly<Record<string, VariantConstructor<T>>>,
      aliases: Readonly<Record<string, string>> = {}
   ) {
      this._entries = new Map(Object.entries(entries));

      const lookup = new Map<string, string>();

      for (const id of this._entries.keys()) {
         lookup.set(normalize(id), id);
      }

      for (const [ alias, id ] of Object.entries(aliases)) {
         if (!this._entries.has(id)) {
            throw new Error(`Alias '${alias}' points at unregistered ${role} variant '${id}'`);
         }
         lookup.set(normalize(alias), id);
      }

      this._lookup = lookup;
   }

   /** Registered ids, in registration order */
   public ids(): string[] {
      return [ ...this._entries.keys() ];
   }

   public has(id: string): boolean {
      return this.canonicalId(id) !== undefined;
   }

   /**
    * The registered id an id or alias refers to. Matching ignores case and surrounding
    * whitespace, so "Hybrid Search" and "hybrid" both find `hybrid`.
    */
   public canonicalId(id: string): string | undefined {
      return this._lookup.get(normalize(id));
   }

   public resolve(id: string): VariantConstructor<T> {
      const canonical = this.canonicalId(id),
            ctor = canonical === undefined ? undefined : this._entries.get(canonical);

      if (!ctor) {
         throw new UnknownVariantError(this.role, id, this.ids());
      }

      return ctor;
   }

   /**
    * Instantiate the variant named by `config.id`. The component receives the
    * canonical id.
    */
   public create(config: ComponentConfig): T {
      const Ctor = this.resolve(config.id);

      return new Ctor({ ...config, id: this.canonicalId(config.id) ?? config.id });
   }

}

export interface ComponentRegistries {
   embedding: VariantRegistry<EmbeddingComponent>;
   vectorstore: VariantRegistry<VectorStoreComponent>;
   retrieval: VariantRegistry<RetrievalComponent>;
}

/** Display names the selection step uses for retrieval methods */
export const RETRIEVAL_ALIASES: Readonly<Record<string, string>> = {
   'Basic Vector Search': 'dense',
   'Dense Search': 'dense',
   'Sparse Search': 'sparse',
   'Hybrid Search': 'hybrid',
};

/**
 * Build the standard registries. Call once at startup and pass the result around.
 */
export function createDefaultRegistries(): ComponentRegistries {
   return {
      embedding: new VariantRegistry<EmbeddingComponent>('embedding', {
         jina: JinaEmbedding,
         all_minilm_l6_v2: AllMiniLMEmbedding,
      }),
      vectorstore: new VariantRegistry<VectorStoreComponent>('vectorstore', {
         qdrant: QdrantStore,
         pinecone: PineconeStore,
         chroma: ChromaStore,
      }),
      retrieval: new VariantRegistry<RetrievalComponent>('retrieval', {
         dense: DenseRetrieval,
         sparse: SparseRetrieval,
         hybrid: HybridRetrieval,
      }, RETRIEVAL_ALIASES),
   };
}
