/**
 * Qdrant vector store, self-hosted in a container or on Qdrant Cloud. The only store
 * with native sparse vectors, so sparse and hybrid retrieval run natively here.
 */

import type { DockerServiceProvider, FragmentContract, ServiceSpec } from '../../capabilities.ts';
import { APP_NETWORK } from '../../docker.ts';
import type { ComponentConfig } from '../../types.ts';
import { envLine, lines } from '../../utils.ts';
import { DEFAULT_COLLECTION_NAME, VectorStoreComponent } from './base.ts';
import type { StoreConfigField } from './base.ts';

const QDRANT_IMAGE = 'qdrant/qdrant:v1.12.5';

export class QdrantStore extends VectorStoreComponent implements DockerServiceProvider {

   public readonly serviceName = 'qdrant-vectorstore';

   public constructor(config: ComponentConfig) {
      super(config, {
         capabilities: [ 'docker-service', 'dependencies', 'code-logic' ],
         supportedDeployments: [ 'local', 'cloud' ],
      });
   }

   public dockerService(): ServiceSpec | undefined {
      if (this.deployment === 'cloud') {
         return undefined;
      }

      return {
         serviceName: this.serviceName,
         image: QDRANT_IMAGE,
         ports: [ '6333:6333', '6334:6334' ],
         expose: [ 6333, 6334, 6335 ],
         volumes: [ './qdrant_data:/qdrant/storage' ],
         networks: [ APP_NETWORK ],
      };
   }

   public envVars(): string[] {
      if (this.deployment === 'cloud') {
         return [
            envLine('QDRANT_URL', 'your-qdrant-cloud-url'),
            envLine('QDRANT_API_KEY', 'your-qdrant-api-key'),
            envLine('QDRANT_COLLECTION_NAME', DEFAULT_COLLECTION_NAME),
         ];
      }

      return [
         envLine('QDRANT_URL', `http://${this.serviceName}:6333`),
         envLine('QDRANT_COLLECTION_NAME', DEFAULT_COLLECTION_NAME),
      ];
   }

   public requirements(): string[] {
      return [ 'qdrant-client', 'langchain-qdrant' ];
   }

   public imports(): string[] {
      return [
         ...super.imports(),
         'from qdrant_client import QdrantClient, models',
         'from qdrant_client.http.models import Distance, VectorParams',
         'from langchain_qdrant import QdrantVectorStore',
      ];
   }

   public configFields(): StoreConfigField[] {
      const where = this.deployment === 'cloud' ? 'Qdrant Cloud cluster' : 'local Qdrant server';

      return [
         { name: 'qdrant_url', envKey: 'QDRANT_URL', description: `URL of the ${where}` },
         ...(this.deployment === 'cloud'
            ? [ { name: 'qdrant_api_key', envKey: 'QDRANT_API_KEY', description: 'API key for Qdrant Cloud' } ]
            : []),
         { name: 'collection_name', envKey: 'QDRANT_COLLECTION_NAME', description: 'Name of the collection in Qdrant' },
      ];
   }

   public initLogic(): string {
      const client = this.deployment === 'cloud'
         ? [
            '# Qdrant Cloud client',
            'self.client = QdrantClient(',
            '    url=config.qdrant_url,',
            '    api_key=config.qdrant_api_key',
            ')',
         ]
         : [
            '# Local Qdrant client',
            'self.client = QdrantClient(url=config.qdrant_url)',
         ];

      return lines(
         'self.embeddings = Embedder()',
         '',
         ...client,
         '',
         'self.collection_name = config.collection_name',
         'self.initialize_collection()',
         '',
         'self.vector_store = QdrantVectorStore(',
         '    client=self.client,',
         '    collection_name=self.collection_name,',
         '    embedding=self.embeddings,',
         '    vector_name=self.vector_name',
         ')'
      );
   }

   public collectionInitLogic(sparseVectorsRequired: boolean, dimension: number): string {
      const create = sparseVectorsRequired
         ? [
            '    self.client.create_collection(',
            '        collection_name=self.collection_name,',
            '        vectors_config={',
            '            "dense": VectorParams(',
            `                size=${dimension},`,
            '                distance=Distance.COSINE',
            '            )',
            '        },',
            '        sparse_vectors_config={',
            '            "sparse": models.SparseVectorParams(',
            '                index=models.SparseIndexParams(on_disk=False)',
            '            )',
            '        }',
            '    )',
            '    print(f"Collection \'{self.collection_name}\' created with dense and sparse vectors.")',
         ]
         : [
            '    self.client.create_collection(',
            '        collection_name=self.collection_name,',
            '        vectors_config=VectorParams(',
            `            size=${dimension},`,
            '            distance=Distance.COSINE',
            '        )',
            '    )',
            '    print(f"Collection \'{self.collection_name}\' created with dense vectors.")',
         ];

      return lines(
         `self.vector_name = "${sparseVectorsRequired ? 'dense' : ''}"`,
         'collections = [c.name for c in self.client.get_collections().collections]',
         'if self.collection_name not in collections:',
         ...create,
         'else:',
         '    print(f"Collection \'{self.collection_name}\' already exists.")'
      );
   }

   public fragmentContract(): FragmentContract {
      const fields = this.configFields();

      return {
         configKeys: fields.map((f) => { return f.envKey; }),
         storeConfigFields: fields.map((f) => { return f.name; }),
         storeAttributes: [ 'vector_name' ],
         providesAttributes: [ 'embeddings', 'client', 'collection_name', 'vector_name', 'vector_store' ],
      };
   }

}
