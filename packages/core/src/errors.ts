/**
 * Error taxonomy for context generation.
 *
 * Every error raised here is fatal to the current generation request. Nothing is
 * retried internally; the caller decides whether to ask for a different choice.
 */

import type { Deployment, Role } from './types.ts';

/**
 * Base class for all errors raised by the scaffolding core.
 */
export class ScaffoldError extends Error {

   public readonly name: string = 'ScaffoldError';

}

/**
 * Error thrown when the configuration is missing keys or carries malformed values.
 * Lists every problem found, not only the first.
 */
export class InvalidConfigurationError extends ScaffoldError {

   public readonly name = 'InvalidConfigurationError';

   public constructor(
      public readonly problems: readonly string[],
      public readonly missingKeys: readonly string[] = []
   ) {
      super(`Invalid configuration:\n${problems.map((p) => { return `  - ${p}`; }).join('\n')}`);
   }

}

/**
 * Error thrown when an id has no registered variant for its role.
 */
export class UnknownVariantError extends ScaffoldError {

   public readonly name = 'UnknownVariantError';

   public constructor(
      public readonly role: Role,
      public readonly id: string,
      public readonly knownIds: readonly string[] = []
   ) {
      super(
         `Unknown ${role} variant '${id}'` +
         (knownIds.length > 0 ? ` (registered: ${knownIds.join(', ')})` : '')
      );
   }

}

/**
 * Error thrown when a variant is asked to run in a deployment mode it cannot support,
 * e.g. a local container for a managed-only vendor.
 */
export class UnsupportedDeploymentError extends ScaffoldError {

   public readonly name = 'UnsupportedDeploymentError';

   public constructor(
      public readonly role: Role,
      public readonly id: string,
      public readonly deployment: Deployment,
      public readonly supported: readonly Deployment[]
   ) {
      super(
         `The ${role} variant '${id}' does not support ${deployment} deployment ` +
         `(supported: ${supported.join(', ')})`
      );
   }

}

/**
 * Error thrown when a capability method fails during composition. Wraps the original
 * error with the role and variant that raised it.
 */
export class CompositionFailureError extends ScaffoldError {

   public readonly name = 'CompositionFailureError';

   public constructor(
      public readonly role: Role,
      public readonly id: string,
      message: string,
      options?: { cause?: unknown }
   ) {
      super(`Composition failed in ${role} variant '${id}': ${message}`, options);
   }

}
