/**
 * Chroma, self-hosted in a container or on Chroma Cloud.
 */

import type { DockerServiceProvider, FragmentContract, ServiceSpec } from '../../capabilities.ts';
import { APP_NETWORK } from '../../docker.ts';
import type { ComponentConfig } from '../../types.ts';
import { envLine, lines } from '../../utils.ts';
import { DEFAULT_COLLECTION_NAME, VectorStoreComponent } from './base.ts';
import type { StoreConfigField } from './base.ts';

const CHROMA_IMAGE = 'chromadb/chroma:0.5.23';

export class ChromaStore extends VectorStoreComponent implements DockerServiceProvider {

   public readonly serviceName = 'chroma-vectorstore';

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

      // 8001 on the host: 8000 is the default local LLM endpoint
      return {
         serviceName: this.serviceName,
         image: CHROMA_IMAGE,
         ports: [ '8001:8000' ],
         volumes: [ './chroma_data:/chroma/chroma' ],
         environment: [ 'IS_PERSISTENT=TRUE', 'ANONYMIZED_TELEMETRY=FALSE' ],
         networks: [ APP_NETWORK ],
      };
   }

   public envVars(): string[] {
      if (this.deployment === 'cloud') {
         return [
            envLine('CHROMA_API_KEY', 'your-chroma-api-key'),
            envLine('CHROMA_TENANT', 'your-chroma-tenant'),
            envLine('CHROMA_DATABASE', 'your-chroma-database'),
            envLine('CHROMA_COLLECTION_NAME', DEFAULT_COLLECTION_NAME),
         ];
      }

      return [
         envLine('CHROMA_HOST', this.serviceName),
         envLine('CHROMA_PORT', '8000'),
         envLine('CHROMA_COLLECTION_NAME', DEFAULT_COLLECTION_NAME),
      ];
   }

   public requirements(): string[] {
      return [ 'chromadb', 'langchain-chroma' ];
   }

   public imports(): string[] {
      return [
         ...super.imports(),
         'import chromadb',
         'from langchain_chroma import Chroma',
      ];
   }

   public configFields(): StoreConfigField[] {
      const collection = {
         name: 'collection_name',
         envKey: 'CHROMA_COLLECTION_NAME',
         description: 'Name of the collection in Chroma',
      };

      if (this.deployment === 'cloud') {
         return [
            { name: 'chroma_api_key', envKey: 'CHROMA_API_KEY', description: 'API key for Chroma Cloud' },
            { name: 'chroma_tenant', envKey: 'CHROMA_TENANT', description: 'Chroma Cloud tenant' },
            { name: 'chroma_database', envKey: 'CHROMA_DATABASE', description: 'Chroma Cloud database' },
            collection,
         ];
      }

      return [
         { name: 'chroma_host', envKey: 'CHROMA_HOST', description: 'Host of the local Chroma server' },
         { name: 'chroma_port', envKey: 'CHROMA_PORT', description: 'Port of the local Chroma server' },
         collection,
      ];
   }

   public initLogic(): string {
      const client = this.deployment === 'cloud'
         ? [
            'self.client = chromadb.CloudClient(',
            '    tenant=config.chroma_tenant,',
            '    database=config.chroma_database,',
            '    api_key=config.chroma_api_key',
            ')',
         ]
         : [
            'self.client = chromadb.HttpClient(host=config.chroma_host, port=int(config.chroma_port))',
         ];

      return lines(
         'self.embeddings = Embedder()',
         ...client,
         'self.collection_name = config.collection_name',
         '',
         'self.initialize_collection()',
         '',
         'self.vector_store = Chroma(',
         '    client=self.client,',
         '    collection_name=self.collection_name,',
         '    embedding_function=self.embeddings',
         ')'
      );
   }

   /** Chroma has no sparse index and takes its width from the first insert */
   public collectionInitLogic(_sparseVectorsRequired: boolean, _dimension: number): string {
      return lines(
         'existing = [c.name for c in self.client.list_collections()]',
         'if self.collection_name not in existing:',
         '    self.client.create_collection(',
         '        name=self.collection_name,',
         '        metadata={"hnsw:space": "cosine"}',
         '    )',
         '    print(f"Collection \'{self.collection_name}\' created successfully!")',
         'else:',
         '    print(f"Collection \'{self.collection_name}\' already exists.")'
      );
   }

   public fragmentContract(): FragmentContract {
      const fields = this.configFields();

      return {
         configKeys: fields.map((f) => { return f.envKey; }),
         storeConfigFields: fields.map((f) => { return f.name; }),
         providesAttributes: [ 'embeddings', 'client', 'collection_name', 'vector_store' ],
      };
   }

}
