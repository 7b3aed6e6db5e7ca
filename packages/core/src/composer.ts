/**
 * Composer - turns a configuration into a GenerationContext.
 *
 * The composer is the only orchestrator: it instantiates the selected variants, calls
 * their capability methods in a fixed order and merges the results under role-scoped
 * keys. Variants never see each other's output, except the vector store receiving the
 * sparse-vectors flag that the compatibility resolver derived beforehand.
 *
 * Composition is all-or-nothing: artifacts are collected privately and the context is
 * only returned once every step and every consistency check has passed.
 */

import type { FragmentContract, RetrievalBinding } from './capabilities.ts';
import {
   providesCodeLogic,
   providesDependencies,
   providesDockerService,
   providesVectorDimension,
} from './capabilities.ts';
import { resolveLlmEndpoint } from './catalog.ts';
import type { CompatibilityResolution } from './compatibility.ts';
import { resolveCompatibility } from './compatibility.ts';
import type { Component } from './component.ts';
import type { EmbeddingComponent } from './components/embedding/base.ts';
import type { RetrievalComponent } from './components/retrieval/base.ts';
import type { VectorStoreComponent } from './components/vectorstore/base.ts';
import { parseGenerationConfig } from './config.ts';
import { isServiceBlock, renderServiceBlock } from './docker.ts';
import { CompositionFailureError } from './errors.ts';
import type { ComponentRegistries } from './registry.ts';
import { createDefaultRegistries } from './registry.ts';
import type { ArtifactValue, GenerationConfig, GenerationContext } from './types.ts';
import { envKey, unique } from './utils.ts';

const REQUIREMENT_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*(==[A-Za-z0-9.*+!_-]+)?$/;

interface Dependencies {
   envVars: string[];
   requirements: string[];
   imports: string[];
}

const NO_DEPENDENCIES: Dependencies = { envVars: [], requirements: [], imports: [] };

export class Composer {

   private readonly _registries: ComponentRegistries;

   public constructor(registries: ComponentRegistries = createDefaultRegistries()) {
      this._registries = registries;
   }

   public get registries(): ComponentRegistries {
      return this._registries;
   }

   /**
    * Build the generation context for one request.
    *
    * @throws InvalidConfigurationError before any variant is instantiated
    * @throws UnknownVariantError naming the role and id
    * @throws UnsupportedDeploymentError when a variant cannot run as configured
    * @throws CompositionFailureError when a capability method fails or fragments disagree
    */
   public compose(input: unknown): GenerationContext {
      const config = parseGenerationConfig(input);

      // Resolve all three before instantiating anything
      this._registries.embedding.resolve(config.embedding.id);
      this._registries.vectorstore.resolve(config.vector_db.id);
      this._registries.retrieval.resolve(config.retrieval_method);

      const embedding = this._registries.embedding.create(config.embedding),
            vectorstore = this._registries.vectorstore.create(config.vector_db),
            retrieval = this._registries.retrieval.create({ id: config.retrieval_method });

      const resolution = resolveCompatibility(retrieval, vectorstore.id),
            binding: RetrievalBinding = { store: vectorstore, resolution };

      const artifacts = new Map<string, ArtifactValue>();

      this._addSelection(artifacts, config, embedding, vectorstore, retrieval);
      artifacts.set('retrieval.outcome', resolution.outcome);
      artifacts.set('retrieval.search_method', resolution.searchMethod);

      // 1. dependencies
      const embeddingDeps = this._dependencies(embedding),
            vectorstoreDeps = this._dependencies(vectorstore),
            retrievalDeps: Dependencies = {
               envVars: [],
               requirements: this._invoke(retrieval, () => { return retrieval.requirements(binding); }),
               imports: this._invoke(retrieval, () => { return retrieval.imports(binding); }),
            };

      for (const [ role, deps ] of [
         [ 'embedding', embeddingDeps ],
         [ 'vectorstore', vectorstoreDeps ],
         [ 'retrieval', retrievalDeps ],
      ] as const) {
         artifacts.set(`${role}.env_vars`, deps.envVars);
         artifacts.set(`${role}.requirements`, deps.requirements);
         artifacts.set(`${role}.imports`, deps.imports);
      }

      // 2. docker services
      const embeddingService = this._dockerService(embedding),
            vectorstoreService = this._dockerService(vectorstore);

      artifacts.set('docker_service.embedding', embeddingService?.block ?? '');
      artifacts.set('docker_service.vectorstore', vectorstoreService?.block ?? '');
      artifacts.set('embedding.service_name', embeddingService?.serviceName ?? '');
      artifacts.set('vectorstore.service_name', vectorstoreService?.serviceName ?? '');

      // 3. vector dimension, owned by the embedding and delegated to the store
      const embeddingComponent: Component = embedding;

      if (!providesVectorDimension(embeddingComponent)) {
         throw new CompositionFailureError('embedding', embeddingComponent.id, 'variant does not provide a vector dimension');
      }

      const dimension = this._invoke(embedding, () => { return embedding.vectorDimension(); }),
            storeDimension = this._invoke(vectorstore, () => { return vectorstore.vectorDimension(embedding); });

      artifacts.set('embedding.vector_dimension', String(dimension));
      artifacts.set('vectorstore.vector_dimension', String(storeDimension));

      // 4. code logic, config class, init logic
      artifacts.set('embedding.code_logic', providesCodeLogic(embedding)
         ? this._invoke(embedding, () => { return embedding.codeLogic(); })
         : '');
      artifacts.set('vectorstore.config_class', this._invoke(vectorstore, () => { return vectorstore.configClassDefinition(); }));
      artifacts.set('vectorstore.init_logic', this._invoke(vectorstore, () => { return vectorstore.initLogic(); }));
      artifacts.set('retrieval.config_updates', this._invoke(retrieval, () => { return retrieval.configUpdates(binding); }));
      artifacts.set('retrieval.init_logic', this._invoke(retrieval, () => { return retrieval.initLogic(binding); }));
      artifacts.set('retrieval.retrieve_logic', this._invoke(retrieval, () => { return retrieval.retrieveLogic(binding); }));

      // 5. collection init, after the sparse flag and the dimension are settled
      artifacts.set('vectorstore.collection_init_logic', this._invoke(vectorstore, () => {
         return vectorstore.collectionInitLogic(resolution.sparseVectorsRequired, storeDimension);
      }));

      // Merged views
      artifacts.set('env_vars', this._mergeEnvVars([
         [ embedding, embeddingDeps.envVars ],
         [ vectorstore, vectorstoreDeps.envVars ],
      ]));
      artifacts.set('requirements', unique([
         ...embeddingDeps.requirements,
         ...vectorstoreDeps.requirements,
         ...retrievalDeps.requirements,
      ]));
      artifacts.set('docker_services', [ embeddingService?.block, vectorstoreService?.block ].filter((block): block is string => {
         return block !== undefined && block.length > 0;
      }));
      artifacts.set('warnings', this._warnings(retrieval, resolution));

      this._checkDependencies(embedding, embeddingDeps);
      this._checkDependencies(vectorstore, vectorstoreDeps);
      this._checkDependencies(retrieval, retrievalDeps);
      this._checkContracts(embedding, vectorstore, retrieval, binding, [ ...embeddingDeps.envVars, ...vectorstoreDeps.envVars ]);

      return freezeContext(artifacts);
   }

   private _addSelection(
      artifacts: Map<string, ArtifactValue>,
      config: GenerationConfig,
      embedding: EmbeddingComponent,
      vectorstore: VectorStoreComponent,
      retrieval: RetrievalComponent
   ): void {
      artifacts.set('project.name', config.project_name);
      artifacts.set('llm.provider', config.llm.provider);
      artifacts.set('llm.deployment', config.llm.deployment);
      artifacts.set('llm.endpoint', resolveLlmEndpoint(config.llm) ?? '');
      artifacts.set('chunking.strategy', config.chunking_strategy);
      artifacts.set('embedding.id', embedding.id);
      artifacts.set('embedding.model', embedding.model);
      artifacts.set('embedding.deployment', embedding.deployment);
      artifacts.set('vectorstore.id', vectorstore.id);
      artifacts.set('vectorstore.provider', config.vector_db.provider ?? vectorstore.id);
      artifacts.set('vectorstore.deployment', vectorstore.deployment);
      artifacts.set('retrieval.id', retrieval.id);
   }

   private _dependencies(component: Component): Dependencies {
      if (!providesDependencies(component)) {
         return NO_DEPENDENCIES;
      }

      const provider = component;

      return this._invoke(component, () => {
         return {
            envVars: provider.envVars(),
            requirements: provider.requirements(),
            imports: provider.imports(),
         };
      });
   }

   private _dockerService(component: Component): { serviceName: string; block: string } | undefined {
      if (!providesDockerService(component)) {
         return undefined;
      }

      const provider = component,
            spec = this._invoke(component, () => { return provider.dockerService(); });

      if (!spec) {
         return undefined;
      }

      const block = renderServiceBlock(spec);

      if (!isServiceBlock(block, spec.serviceName)) {
         throw new CompositionFailureError(component.role, component.id, `docker service '${spec.serviceName}' is not a valid YAML service mapping`);
      }

      return { serviceName: spec.serviceName, block };
   }

   private _warnings(retrieval: RetrievalComponent, resolution: CompatibilityResolution): string[] {
      if (resolution.outcome === 'simulated') {
         return [
            `${retrieval.label} retrieval on ${resolution.vectorstoreId} is simulated with ` +
            `${resolution.fallback ?? resolution.searchMethod} (${resolution.searchMethod})`,
         ];
      }

      if (resolution.outcome === 'unsupported') {
         return [ retrieval.unsupportedWarning(resolution.vectorstoreId) ];
      }

      return [];
   }

   /**
    * Concatenate env lines, dropping exact repeats. Two components giving the same key
    * different values is a conflict the generated `.env` cannot express.
    */
   private _mergeEnvVars(sources: [ Component, readonly string[] ][]): string[] {
      const seen = new Map<string, string>(),
            merged: string[] = [];

      for (const [ component, envVars ] of sources) {
         for (const line of envVars) {
            const key = envKey(line) ?? line,
                  previous = seen.get(key);

            if (previous === undefined) {
               seen.set(key, line);
               merged.push(line);
            } else if (previous !== line) {
               throw new CompositionFailureError(component.role, component.id, `env var ${key} conflicts with an earlier declaration`);
            }
         }
      }

      return merged;
   }

   private _checkDependencies(component: Component, deps: Dependencies): void {
      for (const line of deps.envVars) {
         if (envKey(line) === undefined) {
            throw new CompositionFailureError(component.role, component.id, `malformed env var line: ${line}`);
         }
      }

      for (const requirement of deps.requirements) {
         if (!REQUIREMENT_PATTERN.test(requirement)) {
            throw new CompositionFailureError(component.role, component.id, `malformed requirement: ${requirement}`);
         }
      }
   }

   /**
    * Cross-fragment consistency: every `Config.X` a fragment reads is declared as an env
    * var, every `config.field` the store reads is in its config class, and every
    * `self.attr` a fragment reads is assigned by the store or the retrieval code.
    */
   private _checkContracts(
      embedding: EmbeddingComponent,
      vectorstore: VectorStoreComponent,
      retrieval: RetrievalComponent,
      binding: RetrievalBinding,
      envVars: readonly string[]
   ): void {
      const declaredEnv = new Set(envVars.map((line) => { return envKey(line); })),
            storeFields = new Set(this._invoke(vectorstore, () => { return vectorstore.configFields(); }).map((f) => { return f.name; }));

      const contracts: [ Component, FragmentContract ][] = [
         [ embedding, this._invoke(embedding, () => { return embedding.fragmentContract(); }) ],
         [ vectorstore, this._invoke(vectorstore, () => { return vectorstore.fragmentContract(); }) ],
         [ retrieval, this._invoke(retrieval, () => { return retrieval.fragmentContract(binding); }) ],
      ];

      const assigned = new Set(contracts.flatMap(([ , contract ]) => {
         return [ ...(contract.providesAttributes ?? []) ];
      }));

      for (const [ component, contract ] of contracts) {
         for (const key of contract.configKeys) {
            if (!declaredEnv.has(key)) {
               throw new CompositionFailureError(component.role, component.id, `code references Config.${key} but no component declares ${key}`);
            }
         }

         for (const field of contract.storeConfigFields ?? []) {
            if (!storeFields.has(field)) {
               throw new CompositionFailureError(component.role, component.id, `code references config.${field} but VectorStoreConfig has no such field`);
            }
         }

         for (const attribute of contract.storeAttributes ?? []) {
            if (!assigned.has(attribute)) {
               throw new CompositionFailureError(component.role, component.id, `code reads self.${attribute} but nothing assigns it`);
            }
         }
      }
   }

   /**
    * Run a capability method, wrapping whatever it throws with the role and id of the
    * variant that raised it.
    */
   private _invoke<T>(component: Component, fn: () => T): T {
      try {
         return fn();
      } catch(error) {
         if (error instanceof CompositionFailureError) {
            throw error;
         }

         const message = error instanceof Error ? error.message : String(error);

         throw new CompositionFailureError(component.role, component.id, message, { cause: error });
      }
   }

}

function freezeContext(artifacts: ReadonlyMap<string, ArtifactValue>): GenerationContext {
   const context: Record<string, ArtifactValue> = {};

   for (const [ key, value ] of artifacts) {
      context[key] = typeof value === 'string' ? value : Object.freeze([ ...value ]);
   }

   return Object.freeze(context);
}

let defaultComposer: Composer | undefined;

/**
 * Public entry point: compose a context with the standard registries.
 */
export function generateContext(config: unknown): GenerationContext {
   if (!defaultComposer) {
      defaultComposer = new Composer();
   }

   return defaultComposer.compose(config);
}
