/**
 * Docker service rendering
 *
 * Turns a ServiceSpec into a docker-compose service mapping fragment keyed by the
 * service name, e.g.
 *
 *   qdrant-vectorstore:
 *     image: qdrant/qdrant:v1.12.5
 *     container_name: qdrant-vectorstore
 *     ...
 *
 * The renderer inserts these fragments under `services:` as opaque text.
 */

import { parse, stringify } from 'yaml';
import type { ServiceSpec } from './capabilities.ts';

/** Network every generated service joins */
export const APP_NETWORK = 'app-network';

/**
 * Render a service spec as a YAML mapping with a single key (the service name).
 * Keys are emitted in a fixed order so identical specs give identical text.
 */
export function renderServiceBlock(spec: ServiceSpec): string {
   const body: Record<string, unknown> = {};

   if (spec.build) {
      body.build = { context: spec.build.context, dockerfile: spec.build.dockerfile };
   }
   if (spec.image) {
      body.image = spec.image;
   }

   body.container_name = spec.serviceName;

   if (spec.command) {
      body.command = spec.command;
   }
   if (spec.ports && spec.ports.length > 0) {
      body.ports = [ ...spec.ports ];
   }
   if (spec.expose && spec.expose.length > 0) {
      body.expose = [ ...spec.expose ];
   }
   if (spec.volumes && spec.volumes.length > 0) {
      body.volumes = [ ...spec.volumes ];
   }
   if (spec.environment && spec.environment.length > 0) {
      body.environment = [ ...spec.environment ];
   }
   if (spec.networks && spec.networks.length > 0) {
      body.networks = [ ...spec.networks ];
   }

   return stringify({ [spec.serviceName]: body }, { lineWidth: 0 }).trimEnd();
}

/**
 * Check that a block parses as a YAML mapping with exactly one key, the service name,
 * whose value is itself a mapping.
 */
export function isServiceBlock(block: string, serviceName: string): boolean {
   let doc: unknown;

   try {
      doc = parse(block);
   } catch{
      return false;
   }

   if (typeof doc !== 'object' || doc === null || Array.isArray(doc)) {
      return false;
   }

   const entries = Object.entries(doc);

   if (entries.length !== 1) {
      return false;
   }

   const [ key, value ] = entries[0];

   return key === serviceName && typeof value === 'object' && value !== null && !Array.isArray(value);
}
