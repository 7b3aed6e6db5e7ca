/**
 * Vector store role base class.
 *
 * Generated store code lives in the `__init__` of a generated vector store class that
 * receives a `VectorStoreConfig` as `config`. The init fragment sets up `self.client`,
 * `self.collection_name`, `self.embeddings` and `self.vector_store`; the collection
 * init fragment becomes the body of `initialize_collection()`.
 */

import type {
   CodeLogicProvider,
   DependencyProvider,
   FragmentContract,
   VectorDimensionProvider,
} from '../../capabilities.ts';
import { DeployableComponent } from '../../component.ts';
import type { DeployableComponentOptions } from '../../component.ts';
import type { ComponentConfig } from '../../types.ts';

export type VectorStoreComponentOptions = Omit<DeployableComponentOptions, 'role'>;

/**
 * One field of the generated `VectorStoreConfig` pydantic model, defaulted from a
 * `Config` attribute (and therefore from an env var of the same name).
 */
export interface StoreConfigField {
   name: string;
   envKey: string;
   description: string;
}

/** Name of the collection/index every store creates */
export const DEFAULT_COLLECTION_NAME = 'rag-db';

export abstract class VectorStoreComponent extends DeployableComponent implements DependencyProvider, CodeLogicProvider {

   protected constructor(config: ComponentConfig, options: VectorStoreComponentOptions) {
      super(config, { ...options, role: 'vectorstore' });
   }

   public abstract envVars(): string[];

   public abstract requirements(): string[];

   public abstract configFields(): StoreConfigField[];

   public abstract initLogic(): string;

   /**
    * Body of `initialize_collection()`. Must check for the collection before creating
    * it. When `sparseVectorsRequired` is set, creates both dense and sparse slots. Dense
    * slots are sized to `dimension`, the width of the paired embedding.
    */
   public abstract collectionInitLogic(sparseVectorsRequired: boolean, dimension: number): string;

   public abstract fragmentContract(): FragmentContract;

   public imports(): string[] {
      return [
         'from typing import List, Dict, Any',
         'from pydantic import BaseModel, Field',
         'from config import Config',
         'from .utils.embedder import Embedder',
      ];
   }

   /** Stores take their dimension from the embedding they are paired with */
   public vectorDimension(embedding: VectorDimensionProvider): number {
      return embedding.vectorDimension();
   }

   public configClassDefinition(): string {
      const fields = this.configFields().map((field) => {
         return `    ${field.name}: str = Field(default=Config.${field.envKey}, description=${JSON.stringify(field.description)})`;
      });

      return [ 'class VectorStoreConfig(BaseModel):', ...fields ].join('\n');
   }

   public codeLogic(): string {
      return this.initLogic();
   }

}
