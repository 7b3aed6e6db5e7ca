/**
 * Embedding role base class.
 *
 * Generated embedding code runs inside the generated `Embedder` class, where a `data`
 * payload has already been built. Each fragment must assign `result`, and must catch
 * the transport error, report it and fall back to an empty result.
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

export type EmbeddingComponentOptions = Omit<DeployableComponentOptions, 'role'>;

export abstract class EmbeddingComponent extends DeployableComponent
   implements DependencyProvider, VectorDimensionProvider, CodeLogicProvider {

   protected constructor(config: ComponentConfig, options: EmbeddingComponentOptions) {
      super(config, { ...options, role: 'embedding' });
   }

   /** Model identifier from the config */
   public get model(): string {
      return this._stringKey('model');
   }

   public abstract envVars(): string[];

   public abstract requirements(): string[];

   public abstract codeLogic(): string;

   public abstract vectorDimension(): number;

   public abstract fragmentContract(): FragmentContract;

   public imports(): string[] {
      return [
         'import requests',
         'from typing import List, Dict, Any',
         'from config import Config',
      ];
   }

}
