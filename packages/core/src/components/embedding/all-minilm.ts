/**
 * all-MiniLM-L6-v2 served by a local text-embeddings-inference container. There is no
 * hosted variant.
 */

import type { DockerServiceProvider, FragmentContract, ServiceSpec } from '../../capabilities.ts';
import { APP_NETWORK } from '../../docker.ts';
import { InvalidConfigurationError } from '../../errors.ts';
import type { ComponentConfig } from '../../types.ts';
import { envLine, lines } from '../../utils.ts';
import { EmbeddingComponent } from './base.ts';

const MINILM_IMAGE = 'ghcr.io/huggingface/text-embeddings-inference:cpu-1.5',
      MINILM_MODEL = 'all-MiniLM-L6-v2',
      MINILM_HUB_ORG = 'sentence-transformers',
      MINILM_DIMENSION = 384;

export class AllMiniLMEmbedding extends EmbeddingComponent implements DockerServiceProvider {

   public readonly serviceName = 'minilm-embedding';

   public constructor(config: ComponentConfig) {
      super(config, {
         capabilities: [ 'docker-service', 'dependencies', 'vector-dimension', 'code-logic' ],
         supportedDeployments: [ 'local' ],
         requiredKeys: [ 'model' ],
      });

      if (this.model !== MINILM_MODEL && this.model !== `${MINILM_HUB_ORG}/${MINILM_MODEL}`) {
         throw new InvalidConfigurationError([
            `embedding.model '${this.model}' is not served by this variant (expected ${MINILM_MODEL})`,
         ]);
      }
   }

   /** Hugging Face hub id the container downloads */
   public get modelId(): string {
      return this.model.includes('/') ? this.model : `${MINILM_HUB_ORG}/${this.model}`;
   }

   public dockerService(): ServiceSpec {
      return {
         serviceName: this.serviceName,
         image: MINILM_IMAGE,
         command: `--model-id ${this.modelId}`,
         ports: [ '8080:80' ],
         volumes: [ './minilm_data:/data' ],
         networks: [ APP_NETWORK ],
      };
   }

   public envVars(): string[] {
      return [ envLine('MINILM_EMBEDDING_URL', `http://${this.serviceName}:80/embed`) ];
   }

   public requirements(): string[] {
      return [ 'requests' ];
   }

   public vectorDimension(): number {
      return MINILM_DIMENSION;
   }

   public codeLogic(): string {
      return lines(
         '# all-MiniLM-L6-v2 local server',
         'try:',
         '    response = requests.post(',
         '        Config.MINILM_EMBEDDING_URL,',
         '        json=data,',
         '        headers={"Content-Type": "application/json"}',
         '    )',
         '    response.raise_for_status()',
         '    result = response.json()',
         'except requests.exceptions.RequestException as e:',
         '    print(f"Error calling MiniLM embedding server: {e}")',
         '    result = []'
      );
   }

   public fragmentContract(): FragmentContract {
      return { configKeys: [ 'MINILM_EMBEDDING_URL' ] };
   }

}
