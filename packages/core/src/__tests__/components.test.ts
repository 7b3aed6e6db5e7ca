/**
 * Tests for the embedding and vector store variants
 */

import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import {
   providesCodeLogic,
   providesDependencies,
   providesDockerService,
   providesRetrievalLogic,
   providesVectorDimension,
} from '../capabilities.ts';
import { AllMiniLMEmbedding } from '../components/embedding/all-minilm.ts';
import { DEFAULT_JINA_MODEL, JinaEmbedding } from '../components/embedding/jina.ts';
import { DenseRetrieval } from '../components/retrieval/dense.ts';
import { ChromaStore } from '../components/vectorstore/chroma.ts';
import { PineconeStore } from '../components/vectorstore/pinecone.ts';
import { QdrantStore } from '../components/vectorstore/qdrant.ts';
import { renderServiceBlock } from '../docker.ts';
import { InvalidConfigurationError, UnsupportedDeploymentError } from '../errors.ts';

const JINA_MODEL = 'jina-embeddings-v2-base-en';

function jina(deployment: 'local' | 'cloud', model = JINA_MODEL): JinaEmbedding {
   return new JinaEmbedding({ id: 'jina', model, deployment });
}

describe('Component construction', () => {
   it('reports a missing variant key with its role', () => {
      expect(() => { return new JinaEmbedding({ id: 'jina', deployment: 'local' }); })
         .toThrow(new InvalidConfigurationError([ 'embedding.model is required' ]));
   });

   it('treats a blank value as missing', () => {
      try {
         new JinaEmbedding({ id: 'jina', model: '  ', deployment: 'local' });
         expect.unreachable();
      } catch(error) {
         expect(error).toBeInstanceOf(InvalidConfigurationError);
         expect(error instanceof InvalidConfigurationError && error.missingKeys).toEqual([ 'embedding.model' ]);
      }
   });

   it('reports every missing key at once', () => {
      try {
         new JinaEmbedding({ id: 'jina' });
         expect.unreachable();
      } catch(error) {
         expect(error instanceof InvalidConfigurationError && error.missingKeys)
            .toEqual([ 'embedding.deployment', 'embedding.model' ]);
      }
   });

   it('rejects a deployment the vendor cannot run in', () => {
      expect(() => { return new AllMiniLMEmbedding({ id: 'all_minilm_l6_v2', model: 'all-MiniLM-L6-v2', deployment: 'cloud' }); })
         .toThrow(UnsupportedDeploymentError);
      expect(() => { return new PineconeStore({ id: 'pinecone', deployment: 'local' }); })
         .toThrow('The vectorstore variant \'pinecone\' does not support local deployment (supported: cloud)');
   });

   it('exposes its role, id and deployment', () => {
      const store = new QdrantStore({ id: 'qdrant', deployment: 'cloud' });

      expect(store.role).toBe('vectorstore');
      expect(store.id).toBe('qdrant');
      expect(store.deployment).toBe('cloud');
      expect(store.isCloudOnly).toBe(false);
      expect(new PineconeStore({ id: 'pinecone', deployment: 'cloud' }).isCloudOnly).toBe(true);
   });
});

describe('capability guards', () => {
   it('follow the declared capability tags', () => {
      const embedding = jina('local'),
            store = new QdrantStore({ id: 'qdrant', deployment: 'local' }),
            retrieval = new DenseRetrieval({ id: 'dense' });

      expect(embedding.capabilities).toEqual([ 'docker-service', 'dependencies', 'vector-dimension', 'code-logic' ]);
      expect(providesDockerService(embedding)).toBe(true);
      expect(providesVectorDimension(embedding)).toBe(true);
      expect(providesRetrievalLogic(embedding)).toBe(false);

      expect(providesDependencies(store)).toBe(true);
      expect(providesCodeLogic(store)).toBe(true);
      expect(providesVectorDimension(store)).toBe(false);

      expect(providesRetrievalLogic(retrieval)).toBe(true);
      expect(providesDockerService(retrieval)).toBe(false);
      expect(providesDependencies(retrieval)).toBe(false);
   });
});

describe('JinaEmbedding', () => {
   it('knows the dimension of each supported model', () => {
      expect(jina('local', 'jina-embeddings-v2-small-en').vectorDimension()).toBe(512);
      expect(jina('local').vectorDimension()).toBe(768);
      expect(jina('cloud', 'jina-embeddings-v3').vectorDimension()).toBe(1024);
   });

   it('rejects an unknown model when constructed', () => {
      expect(() => { return jina('local', 'jina-clip-v1'); }).toThrow(InvalidConfigurationError);
      expect(() => { return jina('local', 'constructor'); }).toThrow(InvalidConfigurationError);
   });

   it('reads the vendor name as the default model', () => {
      const embedding = jina('cloud', 'Jina');

      expect(embedding.model).toBe(DEFAULT_JINA_MODEL);
      expect(embedding.vectorDimension()).toBe(768);
   });

   it('runs a local container serving the configured model', () => {
      const spec = jina('local').dockerService();

      expect(spec).toEqual({
         serviceName: 'jina-embedding',
         image: 'jinaai/jina-embeddings:0.10.0',
         ports: [ '5656:5656' ],
         environment: [ `JINA_EMBEDDINGS_MODEL_NAME=${JINA_MODEL}` ],
         networks: [ 'app-network' ],
      });
   });

   it('runs nothing locally in the cloud', () => {
      expect(jina('cloud').dockerService()).toBeUndefined();
   });

   it('declares the endpoint or the API key', () => {
      expect(jina('local').envVars()).toEqual([ 'JINA_EMBEDDING_URL="http://jina-embedding:5656/embeddings"' ]);
      expect(jina('cloud').envVars()).toEqual([ 'JINA_API_KEY="your-jina-api-key"' ]);
      expect(jina('cloud').requirements()).toEqual([ 'requests' ]);
   });

   it('generates code that assigns result and handles transport errors', () => {
      for (const embedding of [ jina('local'), jina('cloud') ]) {
         const code = embedding.codeLogic().split('\n');

         expect(code).toContain('    response.raise_for_status()');
         expect(code).toContain('except requests.exceptions.RequestException as e:');
         expect(code[code.length - 1]).toBe('    result = []');
      }

      expect(jina('cloud').codeLogic().split('\n')[0]).toBe('# Jina Cloud API');
      expect(jina('cloud').codeLogic()).toContain('"Authorization": f"Bearer {Config.JINA_API_KEY}"');
      expect(jina('local').codeLogic()).toContain('        Config.JINA_EMBEDDING_URL,');
   });
});

describe('AllMiniLMEmbedding', () => {
   const minilm = new AllMiniLMEmbedding({ id: 'all_minilm_l6_v2', model: 'all-MiniLM-L6-v2', deployment: 'local' });

   it('has a fixed dimension of 384', () => {
      expect(minilm.vectorDimension()).toBe(384);
   });

   it('serves the model from a text-embeddings-inference container', () => {
      expect(parse(renderServiceBlock(minilm.dockerService()))).toEqual({
         'minilm-embedding': {
            image: 'ghcr.io/huggingface/text-embeddings-inference:cpu-1.5',
            container_name: 'minilm-embedding',
            command: '--model-id sentence-transformers/all-MiniLM-L6-v2',
            ports: [ '8080:80' ],
            volumes: [ './minilm_data:/data' ],
            networks: [ 'app-network' ],
         },
      });
   });

   it('serves the configured model under its hub id', () => {
      const hub = new AllMiniLMEmbedding({ id: 'all_minilm_l6_v2', model: 'sentence-transformers/all-MiniLM-L6-v2', deployment: 'local' });

      expect(minilm.modelId).toBe('sentence-transformers/all-MiniLM-L6-v2');
      expect(hub.dockerService().command).toBe('--model-id sentence-transformers/all-MiniLM-L6-v2');
   });

   it('rejects a model it does not serve', () => {
      expect(() => { return new AllMiniLMEmbedding({ id: 'all_minilm_l6_v2', model: 'all-mpnet-base-v2', deployment: 'local' }); })
         .toThrow(new InvalidConfigurationError([
            'embedding.model \'all-mpnet-base-v2\' is not served by this variant (expected all-MiniLM-L6-v2)',
         ]));
   });

   it('reads its endpoint from Config', () => {
      expect(minilm.envVars()).toEqual([ 'MINILM_EMBEDDING_URL="http://minilm-embedding:80/embed"' ]);
      expect(minilm.fragmentContract()).toEqual({ configKeys: [ 'MINILM_EMBEDDING_URL' ] });
   });
});

describe('QdrantStore', () => {
   const local = new QdrantStore({ id: 'qdrant', deployment: 'local' }),
         cloud = new QdrantStore({ id: 'qdrant', deployment: 'cloud' });

   it('takes its dimension from the embedding', () => {
      expect(local.vectorDimension(jina('local'))).toBe(768);
   });

   it('renders a config class with one field per setting', () => {
      expect(local.configClassDefinition()).toBe([
         'class VectorStoreConfig(BaseModel):',
         '    qdrant_url: str = Field(default=Config.QDRANT_URL, description="URL of the local Qdrant server")',
         '    collection_name: str = Field(default=Config.QDRANT_COLLECTION_NAME, description="Name of the collection in Qdrant")',
      ].join('\n'));
   });

   it('adds the API key in the cloud', () => {
      expect(cloud.envVars()).toEqual([
         'QDRANT_URL="your-qdrant-cloud-url"',
         'QDRANT_API_KEY="your-qdrant-api-key"',
         'QDRANT_COLLECTION_NAME="rag-db"',
      ]);
      expect(cloud.initLogic()).toContain('    api_key=config.qdrant_api_key');
      expect(cloud.initLogic().split('\n').slice(-2)).toEqual([ '    vector_name=self.vector_name', ')' ]);
      expect(cloud.dockerService()).toBeUndefined();
   });

   it('exposes the gRPC and HTTP ports locally', () => {
      expect(local.dockerService()).toMatchObject({
         serviceName: 'qdrant-vectorstore',
         ports: [ '6333:6333', '6334:6334' ],
         expose: [ 6333, 6334, 6335 ],
      });
   });

   it('creates a dense-only collection when sparse vectors are not required', () => {
      const code = local.collectionInitLogic(false, 768);

      expect(code).not.toContain('sparse');
      expect(code.split('\n')[0]).toBe('self.vector_name = ""');
      expect(code).toContain('        vectors_config=VectorParams(');
      expect(code).toContain('            size=768,');
   });

   it('creates dense and sparse slots when sparse vectors are required', () => {
      const code = local.collectionInitLogic(true, 384).split('\n');

      expect(code.slice(0, 3)).toEqual([
         'self.vector_name = "dense"',
         'collections = [c.name for c in self.client.get_collections().collections]',
         'if self.collection_name not in collections:',
      ]);
      expect(code).toContain('            "dense": VectorParams(');
      expect(code).toContain('                size=384,');
      expect(code).toContain('            "sparse": models.SparseVectorParams(');
      expect(code[code.length - 1]).toBe('    print(f"Collection \'{self.collection_name}\' already exists.")');
   });
});

describe('PineconeStore', () => {
   const store = new PineconeStore({ id: 'pinecone', deployment: 'cloud' });

   it('never runs a container', () => {
      expect(store.dockerService()).toBeUndefined();
   });

   it('ignores the sparse flag', () => {
      expect(store.collectionInitLogic(true, 768)).toBe(store.collectionInitLogic(false, 768));
   });

   it('sizes the index to the embedding width', () => {
      expect(store.collectionInitLogic(false, 1024)).toContain('        dimension=1024,');
   });

   it('names its index from Config', () => {
      expect(store.envVars()).toEqual([ 'PINECONE_API_KEY="your-pinecone-api-key"', 'PINECONE_INDEX_NAME="rag-db"' ]);
      expect(store.initLogic()).toContain('self.collection_name = config.index_name');
   });
});

describe('ChromaStore', () => {
   it('uses an HTTP client against the local container', () => {
      const store = new ChromaStore({ id: 'chroma', deployment: 'local' });

      expect(store.initLogic()).toContain('self.client = chromadb.HttpClient(host=config.chroma_host, port=int(config.chroma_port))');
      expect(store.envVars()).toEqual([
         'CHROMA_HOST="chroma-vectorstore"',
         'CHROMA_PORT="8000"',
         'CHROMA_COLLECTION_NAME="rag-db"',
      ]);
      expect(store.dockerService()?.ports).toEqual([ '8001:8000' ]);
   });

   it('uses a cloud client in the cloud', () => {
      const store = new ChromaStore({ id: 'chroma', deployment: 'cloud' });

      expect(store.initLogic()).toContain('self.client = chromadb.CloudClient(');
      expect(store.dockerService()).toBeUndefined();
      expect(store.fragmentContract().storeConfigFields)
         .toEqual([ 'chroma_api_key', 'chroma_tenant', 'chroma_database', 'collection_name' ]);
   });
});

describe('collection initialization', () => {
   const stores = [
      new QdrantStore({ id: 'qdrant', deployment: 'local' }),
      new PineconeStore({ id: 'pinecone', deployment: 'cloud' }),
      new ChromaStore({ id: 'chroma', deployment: 'local' }),
   ];

   it('is a pure function of the configuration', () => {
      for (const store of stores) {
         for (const sparse of [ false, true ]) {
            expect(store.collectionInitLogic(sparse, 512)).toBe(store.collectionInitLogic(sparse, 512));
         }
      }
   });

   it('checks for an existing collection before creating one', () => {
      for (const store of stores) {
         for (const sparse of [ false, true ]) {
            const code = store.collectionInitLogic(sparse, 512),
                  check = code.indexOf('if self.collection_name not in'),
                  create = code.indexOf('self.client.create_');

            expect(check).toBeGreaterThanOrEqual(0);
            expect(create).toBeGreaterThan(check);
         }
      }
   });
});
