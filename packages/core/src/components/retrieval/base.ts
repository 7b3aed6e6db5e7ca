/**
 * Retrieval role base class.
 *
 * Retrieval variants have no deployment of their own. They are bound at generation
 * time to the instantiated vector store and the compatibility outcome for the pair,
 * and pick their code path from that outcome:
 *
 *   supported   - the variant's native code for that store
 *   simulated   - the declared analog search method, falling back to similarity search
 *   unsupported - dense similarity search plus a RuntimeWarning in the generated app
 */

import type { FragmentContract, RetrievalBinding, RetrievalLogicProvider } from '../../capabilities.ts';
import { Component } from '../../component.ts';
import { DENSE_SEARCH_METHOD } from '../../compatibility.ts';
import type { ComponentConfig } from '../../types.ts';
import { lines, unique } from '../../utils.ts';
import type { VectorStoreComponent } from '../vectorstore/base.ts';

export type SupportLevel = 'supported' | 'simulated' | 'unsupported';

/** What a retrieval variant declares for one vector store id */
export type StoreSupport =
   | { level: 'supported' }
   | { level: 'simulated'; strategy: string; searchMethod: string };

/** `self.<attr>` usage of a native code path */
export interface NativeAttributes {
   reads: readonly string[];
   provides: readonly string[];
}

interface RetrieveMethodsOptions {
   description: string;
   searchMethod: string;
   errorLabel: string;
   fallbackToSimilarity: boolean;
}

export abstract class RetrievalComponent extends Component implements RetrievalLogicProvider {

   /** Human-readable name used in generated comments and warnings, e.g. "Hybrid" */
   public abstract readonly label: string;

   /** Whether the native path needs sparse vector slots in the collection */
   public abstract readonly usesSparseVectors: boolean;

   public readonly nativeSearchMethod: string = DENSE_SEARCH_METHOD;

   /** Explicit per-store support; any store not listed is unsupported */
   protected abstract readonly _support: ReadonlyMap<string, StoreSupport>;

   public constructor(config: ComponentConfig) {
      super(config, { role: 'retrieval', capabilities: [ 'retrieval-logic' ] });
   }

   public supportFor(vectorstoreId: string): StoreSupport | undefined {
      return this._support.get(vectorstoreId);
   }

   /** Store ids this variant declares, in declaration order */
   public declaredStores(): string[] {
      return [ ...this._support.keys() ];
   }

   public imports(binding: RetrievalBinding): string[] {
      switch (binding.resolution.outcome) {
         case 'supported': {
            return this._nativeImports(binding.store);
         }
         case 'unsupported': {
            return [ 'import warnings' ];
         }
         default: {
            return [];
         }
      }
   }

   public requirements(binding: RetrievalBinding): string[] {
      return binding.resolution.outcome === 'supported' ? this._nativeRequirements(binding.store) : [];
   }

   public configUpdates(binding: RetrievalBinding): string {
      return binding.resolution.outcome === 'supported' ? this._nativeConfigUpdates(binding.store) : '';
   }

   public initLogic(binding: RetrievalBinding): string {
      const { resolution, store } = binding;

      if (resolution.outcome === 'supported') {
         return this._nativeInitLogic(store);
      }

      if (resolution.outcome === 'simulated') {
         return lines(
            `# ${this.label} retrieval is simulated on ${store.id} with ${resolution.fallback ?? resolution.searchMethod}`,
            `# (${resolution.searchMethod}, falling back to ${DENSE_SEARCH_METHOD} if it fails)`,
            'pass'
         );
      }

      return lines(
         `# ${this.label} retrieval is not supported by ${store.id}; using dense similarity search`,
         'warnings.warn(',
         `    "${this.unsupportedWarning(store.id)}",`,
         '    RuntimeWarning',
         ')'
      );
   }

   public retrieveLogic(binding: RetrievalBinding): string {
      const { resolution, store } = binding,
            name = this.label.toLowerCase();

      if (resolution.outcome === 'supported') {
         return this._retrieveMethods({
            description: this._nativeDescription(),
            searchMethod: resolution.searchMethod,
            errorLabel: `${name} retrieval`,
            fallbackToSimilarity: false,
         });
      }

      if (resolution.outcome === 'simulated') {
         return this._retrieveMethods({
            description: `Retrieve documents using ${resolution.fallback ?? resolution.searchMethod} (${name}-like behavior on ${store.id}).`,
            searchMethod: resolution.searchMethod,
            errorLabel: `${name} retrieval (${resolution.searchMethod})`,
            fallbackToSimilarity: true,
         });
      }

      return this._retrieveMethods({
         description: `Retrieve documents using dense search (${name} retrieval is not supported by ${store.id}).`,
         searchMethod: DENSE_SEARCH_METHOD,
         errorLabel: `${name} retrieval fallback`,
         fallbackToSimilarity: false,
      });
   }

   public fragmentContract(binding: RetrievalBinding): FragmentContract {
      const native = binding.resolution.outcome === 'supported'
         ? this._nativeAttributes(binding.store)
         : { reads: [], provides: [] };

      return {
         configKeys: [],
         storeAttributes: unique([ 'vector_store', ...native.reads ]),
         providesAttributes: [ ...native.provides ],
      };
   }

   /** The message the generated application warns with when the pairing is unsupported */
   public unsupportedWarning(vectorstoreId: string): string {
      return `${this.label} retrieval is not supported by the ${vectorstoreId} vector store; ` +
         'falling back to dense similarity search';
   }

   protected abstract _nativeInitLogic(store: VectorStoreComponent): string;

   protected abstract _nativeDescription(): string;

   protected _nativeImports(_store: VectorStoreComponent): string[] {
      return [];
   }

   protected _nativeRequirements(_store: VectorStoreComponent): string[] {
      return [];
   }

   protected _nativeConfigUpdates(_store: VectorStoreComponent): string {
      return '';
   }

   protected _nativeAttributes(_store: VectorStoreComponent): NativeAttributes {
      return { reads: [], provides: [] };
   }

   protected _retrieveMethods(options: RetrieveMethodsOptions): string {
      const onError = options.fallbackToSimilarity
         ? [
            '    except Exception as e:',
            `        print(f"Error during ${options.errorLabel}: {e}")`,
            '        try:',
            `            return self.vector_store.${DENSE_SEARCH_METHOD}(query, k=k)`,
            '        except Exception as fallback_e:',
            '            print(f"Error during fallback retrieval: {fallback_e}")',
            '            return []',
         ]
         : [
            '    except Exception as e:',
            `        print(f"Error during ${options.errorLabel}: {e}")`,
            '        return []',
         ];

      return lines(
         'def retrieve(self, query: str, k: int = 5) -> list:',
         `    """${options.description}"""`,
         '    try:',
         `        return self.vector_store.${options.searchMethod}(query, k=k)`,
         ...onError,
         '',
         'def retrieve_with_score(self, query: str, k: int = 5) -> list:',
         '    """Retrieve documents with similarity scores."""',
         '    try:',
         '        return self.vector_store.similarity_search_with_score(query, k=k)',
         '    except Exception as e:',
         `        print(f"Error during ${options.errorLabel} with scores: {e}")`,
         '        return []'
      );
   }

}
