/**
 * Component - the unit of polymorphism.
 *
 * A component owns a frozen copy of its configuration, validates the keys it needs when
 * it is constructed, and declares the capability tags it satisfies. Components are
 * immutable after construction.
 */

import type { Capability } from './capabilities.ts';
import type { ComponentConfig, Deployment, Role } from './types.ts';
import { DEPLOYMENTS } from './types.ts';
import { InvalidConfigurationError, UnsupportedDeploymentError } from './errors.ts';

export interface ComponentOptions {
   role: Role;
   capabilities: readonly Capability[];

   /** Variant-specific keys that must be present in the config (besides `id`) */
   requiredKeys?: readonly string[];
}

export interface DeployableComponentOptions extends ComponentOptions {

   /** Deployment modes this variant can structurally support */
   supportedDeployments: readonly Deployment[];
}

function isMissing(value: unknown): boolean {
   return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export abstract class Component {

   public readonly id: string;
   public readonly role: Role;
   protected readonly _config: ComponentConfig;
   private readonly _capabilities: ReadonlySet<Capability>;

   protected constructor(config: ComponentConfig, options: ComponentOptions) {
      const missing = [ 'id', ...(options.requiredKeys ?? []) ].filter((key) => {
         return isMissing(config[key]);
      });

      if (missing.length > 0) {
         const keys = missing.map((key) => {
            return `${options.role}.${key}`;
         });

         throw new InvalidConfigurationError(
            keys.map((key) => {
               return `${key} is required`;
            }),
            keys
         );
      }

      this._config = Object.freeze({ ...config });
      this.id = config.id;
      this.role = options.role;
      this._capabilities = new Set(options.capabilities);
   }

   public get capabilities(): Capability[] {
      return [ ...this._capabilities ];
   }

   public hasCapability(capability: Capability): boolean {
      return this._capabilities.has(capability);
   }

   /**
    * Read a string key from the config. Required keys were checked at construction;
    * this only guards against a value of the wrong type.
    */
   protected _stringKey(key: string): string {
      const value = this._config[key];

      if (typeof value !== 'string') {
         throw new InvalidConfigurationError([ `${this.role}.${key} must be a string` ]);
      }

      return value;
   }

}

/**
 * A component that runs either locally or as a managed service.
 */
export abstract class DeployableComponent extends Component {

   public readonly deployment: Deployment;
   public readonly supportedDeployments: readonly Deployment[];

   protected constructor(config: ComponentConfig, options: DeployableComponentOptions) {
      super(config, { ...options, requiredKeys: [ 'deployment', ...(options.requiredKeys ?? []) ] });

      const deployment = DEPLOYMENTS.find((d) => {
         return d === config.deployment;
      });

      if (!deployment) {
         throw new InvalidConfigurationError([
            `${options.role}.deployment must be one of ${DEPLOYMENTS.join(', ')} (got ${String(config.deployment)})`,
         ]);
      }

      if (!options.supportedDeployments.includes(deployment)) {
         throw new UnsupportedDeploymentError(options.role, config.id, deployment, options.supportedDeployments);
      }

      this.deployment = deployment;
      this.supportedDeployments = options.supportedDeployments;
   }

   /** True when the vendor only exists as a managed service */
   public get isCloudOnly(): boolean {
      return !this.supportedDeployments.includes('local');
   }

}
