/**
 * Project layout handed to the rendering layer, and the post-generation checklist.
 */

import { resolveLlmEndpoint } from './catalog.ts';
import type { GenerationConfig } from './types.ts';

/**
 * Output path (relative to the project directory) → template name. The renderer
 * renders each template with the GenerationContext and writes it to the path.
 */
export const PROJECT_FILES: Readonly<Record<string, string>> = {
   'config.py': 'config.py.j2',
   'src/utils/embedder.py': 'src/utils/embedder.py.j2',
   'src/vectorstore.py': 'src/vectorstore.py.j2',
   'app.py': 'app.py.j2',
   'frontend.py': 'frontend.py.j2',
   'requirements.txt': 'requirements.txt.j2',
   'docker-compose.yml': 'docker-compose.yml.j2',
   '.env': 'env.j2',
   'Dockerfile.backend': 'Dockerfile.backend.j2',
   'Dockerfile.frontend': 'Dockerfile.frontend.j2',
};

export interface NextStepSection {
   title: string;
   steps: string[];
}

/**
 * What the operator has to do before the generated project runs.
 */
export function describeNextSteps(config: GenerationConfig): NextStepSection[] {
   const sections: NextStepSection[] = [];

   if (config.llm.deployment === 'local') {
      sections.push({
         title: 'LLM Setup',
         steps: [ `Ensure your LLM API is running at ${resolveLlmEndpoint(config.llm) ?? 'your local endpoint'}` ],
      });
   }

   const cloudComponents: string[] = [];

   if (config.vector_db.deployment === 'cloud') {
      cloudComponents.push(`${config.vector_db.provider ?? config.vector_db.id} (Vector DB)`);
   }
   if (config.llm.deployment === 'cloud') {
      cloudComponents.push(`${config.llm.provider} (LLM)`);
   }
   if (config.embedding.deployment === 'cloud') {
      cloudComponents.push(`${config.embedding.model} (Embedding)`);
   }

   if (cloudComponents.length > 0) {
      sections.push({
         title: 'API Keys',
         steps: cloudComponents.map((component) => {
            return `Set up ${component} API key in .env`;
         }),
      });
   }

   sections.push({
      title: 'Docker',
      steps: [
         'Make sure Docker and docker-compose are installed',
         'Run docker-compose up to start the application',
      ],
   });

   return sections;
}
