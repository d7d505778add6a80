import 'dotenv/config';
import { createToolRegistry } from '../lib/assistant';
import { createEmbedder } from '../lib/ai';
import { loadConfig, type AssistantConfig } from '../lib/config';
import { createDb } from '../lib/db';
import { errorMessage } from '../lib/errors';
import { PgVectorStore } from '../lib/search/pg-vector-store';

function report(ok: boolean, label: string, detail?: string) {
  console.log(`${ok ? '✅' : '❌'} ${label}${detail ? `: ${detail}` : ''}`);
}

async function main(): Promise<boolean> {
  let config: AssistantConfig;
  try {
    config = loadConfig();
    report(true, 'Configuration');
  } catch (error) {
    report(false, 'Configuration', errorMessage(error));
    return false;
  }

  report(Boolean(config.apiKey), 'OPENROUTER_API_KEY', config.apiKey ? 'set' : 'missing');
  report(Boolean(config.databaseUrl), 'DATABASE_URL', config.databaseUrl ? 'set' : 'missing');
  console.log(`   Chat model: ${config.chatModel}`);
  console.log(`   Embedding model: ${config.embeddingModel}`);

  if (!config.apiKey || !config.databaseUrl) {
    return false;
  }

  const store = new PgVectorStore({
    db: createDb(config.databaseUrl),
    embed: createEmbedder({ apiKey: config.apiKey, model: config.embeddingModel }),
    courseMatchThreshold: config.courseMatchThreshold,
  });

  const tools = createToolRegistry(store, config.searchTopK).names();
  report(tools.length > 0, 'Tools registered', tools.join(', '));

  try {
    const count = await store.getCourseCount();
    report(count > 0, 'Course catalog', `${count} course(s)`);
    return count > 0;
  } catch (error) {
    report(false, 'Course catalog', errorMessage(error));
    return false;
  }
}

main()
  .then((healthy) => process.exit(healthy ? 0 : 1))
  .catch((error) => {
    console.error('Diagnosis failed:', error);
    process.exit(1);
  });
