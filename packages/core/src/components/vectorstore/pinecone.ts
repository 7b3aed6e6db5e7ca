/**
 * Pinecone serverless index. Managed-only: there is no local container, whatever the
 * deployment, and asking for a local deployment fails at construction.
 */

import type { DockerServiceProvider, FragmentContract } from '../../capabilities.ts';
import type { ComponentConfig } from '../../types.ts';
import { envLine, lines } from '../../utils.ts';
import { DEFAULT_COLLECTION_NAME, VectorStoreComponent } from './base.ts';
import type { StoreConfigField } from './base.ts';

export class PineconeStore extends VectorStoreComponent implements DockerServiceProvider {

   public readonly serviceName = 'pinecone-vectorstore';

   public constructor(config: ComponentConfig) {
      super(config, {
         capabilities: [ 'docker-service', 'dependencies', 'code-logic' ],
         supportedDeployments: [ 'cloud' ],
      });
   }

   public dockerService(): undefined {
      return undefined;
   }

   public envVars(): string[] {
      return [
         envLine('PINECONE_API_KEY', 'your-pinecone-api-key'),
         envLine('PINECONE_INDEX_NAME', DEFAULT_COLLECTION_NAME),
      ];
   }

   public requirements(): string[] {
      return [ 'langchain-pinecone', 'pinecone-client' ];
   }

   public imports(): string[] {
      return [
         ...super.imports(),
         'from langchain_pinecone import PineconeVectorStore',
         'from pinecone import Pinecone, ServerlessSpec',
      ];
   }

   public configFields(): StoreConfigField[] {
      return [
         { name: 'pinecone_api_key', envKey: 'PINECONE_API_KEY', description: 'Pinecone API key' },
         { name: 'index_name', envKey: 'PINECONE_INDEX_NAME', description: 'Name of the index in Pinecone' },
      ];
   }

   public initLogic(): string {
      return lines(
         'self.embeddings = Embedder()',
         'self.client = Pinecone(api_key=config.pinecone_api_key)',
         'self.collection_name = config.index_name',
         '',
         'self.initialize_collection()',
         '',
         'index = self.client.Index(self.collection_name)',
         'self.vector_store = PineconeVectorStore(',
         '    index=index,',
         '    embedding=self.embeddings',
         ')'
      );
   }

   /** Pinecone has no sparse slots here; the flag never changes the index layout */
   public collectionInitLogic(_sparseVectorsRequired: boolean, dimension: number): string {
      return lines(
         'if self.collection_name not in self.client.list_indexes().names():',
         '    self.client.create_index(',
         '        name=self.collection_name,',
         `        dimension=${dimension},`,
         '        metric="cosine",',
         '        spec=ServerlessSpec(cloud="aws", region="us-east-1"),',
         '    )',
         '    print(f"Index \'{self.collection_name}\' created successfully!")',
         'else:',
         '    print(f"Index \'{self.collection_name}\' already exists.")'
      );
   }

   public fragmentContract(): FragmentContract {
      return {
         configKeys: [ 'PINECONE_API_KEY', 'PINECONE_INDEX_NAME' ],
         storeConfigFields: [ 'pinecone_api_key', 'index_name' ],
         providesAttributes: [ 'embeddings', 'client', 'collection_name', 'vector_store' ],
      };
   }

}
