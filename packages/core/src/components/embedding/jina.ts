/**
 * Jina embeddings, either from a local jina-embeddings container or the Jina cloud API.
 */

import type { DockerServiceProvider, FragmentContract, ServiceSpec } from '../../capabilities.ts';
import { APP_NETWORK } from '../../docker.ts';
import { InvalidConfigurationError } from '../../errors.ts';
import type { ComponentConfig } from '../../types.ts';
import { envLine, lines } from '../../utils.ts';
import { EmbeddingComponent } from './base.ts';

/** Output width of the Jina models we know how to size a collection for */
export const JINA_MODEL_DIMENSIONS: Readonly<Record<string, number>> = {
   'jina-embeddings-v2-small-en': 512,
   'jina-embeddings-v2-base-en': 768,
   'jina-embeddings-v2-base-code': 768,
   'jina-embeddings-v3': 1024,
};

/** Used when the config names the vendor rather than a model */
export const DEFAULT_JINA_MODEL = 'jina-embeddings-v2-base-en';

const JINA_DISPLAY_NAME = 'Jina',
      JINA_IMAGE = 'jinaai/jina-embeddings:0.10.0',
      JINA_PORT = 5656,
      JINA_CLOUD_ENDPOINT = 'https://api.jina.ai/v1/embeddings';

export class JinaEmbedding extends EmbeddingComponent implements DockerServiceProvider {

   public readonly serviceName = 'jina-embedding';

   public constructor(config: ComponentConfig) {
      super(config, {
         capabilities: [ 'docker-service', 'dependencies', 'vector-dimension', 'code-logic' ],
         supportedDeployments: [ 'local', 'cloud' ],
         requiredKeys: [ 'model' ],
      });

      if (!Object.hasOwn(JINA_MODEL_DIMENSIONS, this.model)) {
         throw new InvalidConfigurationError([
            `embedding.model '${this.model}' is not a known Jina model ` +
            `(known: ${Object.keys(JINA_MODEL_DIMENSIONS).join(', ')})`,
         ]);
      }
   }

   public get model(): string {
      const model = super.model;

      return model === JINA_DISPLAY_NAME ? DEFAULT_JINA_MODEL : model;
   }

   public dockerService(): ServiceSpec | undefined {
      if (this.deployment === 'cloud') {
         return undefined;
      }

      return {
         serviceName: this.serviceName,
         image: JINA_IMAGE,
         ports: [ `${JINA_PORT}:${JINA_PORT}` ],
         environment: [ `JINA_EMBEDDINGS_MODEL_NAME=${this.model}` ],
         networks: [ APP_NETWORK ],
      };
   }

   public envVars(): string[] {
      if (this.deployment === 'cloud') {
         return [ envLine('JINA_API_KEY', 'your-jina-api-key') ];
      }

      return [ envLine('JINA_EMBEDDING_URL', `http://${this.serviceName}:${JINA_PORT}/embeddings`) ];
   }

   public requirements(): string[] {
      return [ 'requests' ];
   }

   public vectorDimension(): number {
      return JINA_MODEL_DIMENSIONS[this.model];
   }

   public codeLogic(): string {
      if (this.deployment === 'cloud') {
         return lines(
            '# Jina Cloud API',
            'headers = {',
            '    "Authorization": f"Bearer {Config.JINA_API_KEY}",',
            '    "Content-Type": "application/json"',
            '}',
            'try:',
            '    response = requests.post(',
            `        "${JINA_CLOUD_ENDPOINT}",`,
            '        json=data,',
            '        headers=headers',
            '    )',
            '    response.raise_for_status()',
            '    result = response.json()[\'data\']',
            'except requests.exceptions.RequestException as e:',
            '    print(f"Error calling Jina API: {e}")',
            '    result = []'
         );
      }

      return lines(
         '# Jina local server',
         'try:',
         '    response = requests.post(',
         '        Config.JINA_EMBEDDING_URL,',
         '        json=data,',
         '        headers={"Content-Type": "application/json"}',
         '    )',
         '    response.raise_for_status()',
         '    result = response.json()[\'data\']',
         'except requests.exceptions.RequestException as e:',
         '    print(f"Error calling Jina local embedding server: {e}")',
         '    result = []'
      );
   }

   public fragmentContract(): FragmentContract {
      return {
         configKeys: this.deployment === 'cloud' ? [ 'JINA_API_KEY' ] : [ 'JINA_EMBEDDING_URL' ],
      };
   }

}
