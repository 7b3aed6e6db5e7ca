/**
 * Inventory of the registered variants, for listing and documentation.
 */

import type { Capability } from './capabilities.ts';
import { EMBEDDING_OPTIONS, findOption, RETRIEVAL_OPTIONS, VECTOR_DB_OPTIONS } from './catalog.ts';
import type { CatalogOption } from './catalog.ts';
import type { CompatibilityResolution } from './compatibility.ts';
import { resolveCompatibility } from './compatibility.ts';
import type { Component } from './component.ts';
import type { ComponentRegistries, VariantRegistry } from './registry.ts';
import type { Deployment, Role } from './types.ts';

export interface VariantSummary {
   role: Role;
   id: string;

   /** Catalog display name, or the id for variants the catalog does not offer */
   name: string;
   description?: string;
   deployments: readonly Deployment[];
   capabilities: Capability[];
}

const CATALOGS: Readonly<Record<Role, readonly CatalogOption[]>> = {
   embedding: EMBEDDING_OPTIONS,
   vectorstore: VECTOR_DB_OPTIONS,
   retrieval: RETRIEVAL_OPTIONS,
};

function summarize<T extends Component>(registry: VariantRegistry<T>): VariantSummary[] {
   return registry.ids().map((id) => {
      const option = findOption(CATALOGS[registry.role], id),
            deployments = option?.deployments ?? [];

      // Capabilities are declared per instance; a sample config in the first supported
      // deployment is enough to read them.
      const sample = registry.create({
         id,
         ...(deployments.length > 0 ? { deployment: deployments[0] } : {}),
         ...(option?.defaultModel ? { model: option.defaultModel } : {}),
      });

      return {
         role: registry.role,
         id,
         name: option?.name ?? id,
         ...(option ? { description: option.description } : {}),
         deployments,
         capabilities: sample.capabilities,
      };
   });
}

/**
 * Every registered variant, grouped embedding → vectorstore → retrieval.
 */
export function describeVariants(registries: ComponentRegistries): VariantSummary[] {
   return [
      ...summarize(registries.embedding),
      ...summarize(registries.vectorstore),
      ...summarize(registries.retrieval),
   ];
}

/**
 * The resolved outcome for every (retrieval, vector store) pair, retrieval-major.
 */
export function compatibilityMatrix(registries: ComponentRegistries): CompatibilityResolution[] {
   const storeIds = registries.vectorstore.ids();

   return registries.retrieval.ids().flatMap((retrievalId) => {
      const retrieval = registries.retrieval.create({ id: retrievalId });

      return storeIds.map((storeId) => {
         return resolveCompatibility(retrieval, storeId);
      });
   });
}
