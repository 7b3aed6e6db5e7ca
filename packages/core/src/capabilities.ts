/**
 * Capability contracts a component variant may implement.
 *
 * A component declares the capability tags it satisfies when it is constructed. The
 * composer asks "does this component satisfy X" through the guard functions below
 * instead of inspecting the class hierarchy.
 */

import type { Component } from './component.ts';
import type { CompatibilityResolution } from './compatibility.ts';
import type { VectorStoreComponent } from './components/vectorstore/base.ts';

export type Capability =
   | 'docker-service'
   | 'dependencies'
   | 'vector-dimension'
   | 'code-logic'
   | 'retrieval-logic';

export const CAPABILITIES: readonly Capability[] = [
   'docker-service',
   'dependencies',
   'vector-dimension',
   'code-logic',
   'retrieval-logic',
];

/**
 * A docker-compose service definition. Rendered to YAML by `renderServiceBlock`.
 */
export interface ServiceSpec {
   serviceName: string;
   image?: string;
   build?: { context: string; dockerfile: string };
   command?: string;
   ports?: string[];
   expose?: number[];
   volumes?: string[];
   environment?: string[];
   networks?: string[];
}

/**
 * The free variables a generated code fragment relies on. The composer checks these
 * against what the other fragments declare before handing the context over.
 */
export interface FragmentContract {

   /** `Config.<KEY>` attributes read by the fragments; each must be a declared env var */
   configKeys: readonly string[];

   /** `config.<field>` fields of the generated `VectorStoreConfig` class that are read */
   storeConfigFields?: readonly string[];

   /** `self.<attr>` attributes of the generated vector store class that are read */
   storeAttributes?: readonly string[];

   /** `self.<attr>` attributes of the generated vector store class that are assigned */
   providesAttributes?: readonly string[];
}

export interface DockerServiceProvider {
   readonly serviceName: string;

   /** The container service, or undefined when nothing runs locally */
   dockerService(): ServiceSpec | undefined;
}

export interface DependencyProvider {

   /** `.env` lines, `KEY="value"` */
   envVars(): string[];

   /** Package requirement strings, optionally pinned with `==version` */
   requirements(): string[];

   /** Import statements needed by the generated code */
   imports(): string[];
}

export interface VectorDimensionProvider {
   vectorDimension(): number;
}

export interface CodeLogicProvider {
   codeLogic(): string;
   fragmentContract(): FragmentContract;
}

/**
 * What a retrieval variant is bound to when it generates code: the instantiated vector
 * store and the resolved compatibility outcome.
 */
export interface RetrievalBinding {
   store: VectorStoreComponent;
   resolution: CompatibilityResolution;
}

export interface RetrievalLogicProvider {
   imports(binding: RetrievalBinding): string[];
   requirements(binding: RetrievalBinding): string[];
   configUpdates(binding: RetrievalBinding): string;
   initLogic(binding: RetrievalBinding): string;
   retrieveLogic(binding: RetrievalBinding): string;
   fragmentContract(binding: RetrievalBinding): FragmentContract;
}

export function providesDockerService<T extends Component>(component: T): component is T & DockerServiceProvider {
   return component.hasCapability('docker-service')
      && 'dockerService' in component
      && typeof component.dockerService === 'function';
}

export function providesDependencies<T extends Component>(component: T): component is T & DependencyProvider {
   return component.hasCapability('dependencies')
      && 'envVars' in component
      && typeof component.envVars === 'function';
}

export function providesVectorDimension<T extends Component>(component: T): component is T & VectorDimensionProvider {
   return component.hasCapability('vector-dimension')
      && 'vectorDimension' in component
      && typeof component.vectorDimension === 'function';
}

export function providesCodeLogic<T extends Component>(component: T): component is T & CodeLogicProvider {
   return component.hasCapability('code-logic')
      && 'codeLogic' in component
      && typeof component.codeLogic === 'function';
}

export function providesRetrievalLogic<T extends Component>(component: T): component is T & RetrievalLogicProvider {
   return component.hasCapability('retrieval-logic')
      && 'retrieveLogic' in component
      && typeof component.retrieveLogic === 'function';
}
