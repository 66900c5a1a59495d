import { join } from 'path';
import { ClipboardAgent } from './agents/clipboardAgent.js';
import { CoreMemory } from './agents/coreMemory.js';
import type { Config } from './config.js';
import { GrokProvider } from './llm/providers/grok.js';
import { MockProvider } from './llm/providers/mock.js';
import { LLMRouter } from './llm/router.js';
import { createUsageLogger } from './llm/usage-logger.js';
import { createEmbedder, MemoryStore, openVectorDatabase } from './memory/index.js';
import { ToolExecutor } from './tools/executor.js';
import { GitHubClient } from './tools/github.js';

export interface Container {
  config: Config;
  memoryStore: MemoryStore;
  chat: LLMRouter;
  agent: ClipboardAgent;
  close(): Promise<void>;
}

/** Wires every component explicitly: embedder → store → model router → tools → agent. */
export async function createContainer(config: Config): Promise<Container> {
  const embedder = createEmbedder(config);
  const database = await openVectorDatabase(config);
  const memoryStore = new MemoryStore(database, embedder);

  const chat = new LLMRouter({
    live: new GrokProvider({
      apiKey: config.grokApiKey,
      baseURL: config.grokBaseUrl,
      defaultModel: config.grokModel,
      timeoutMs: config.modelTimeoutMs,
    }),
    mock: new MockProvider(),
    maxRetries: config.modelMaxRetries,
    logUsage: createUsageLogger(join(config.dataDir, 'logs', 'usage')),
  });

  const tools = new ToolExecutor(new GitHubClient({
    token: config.githubToken,
    timeoutMs: config.toolTimeoutMs,
  }));

  const agent = new ClipboardAgent({
    memory: memoryStore,
    chat,
    tools,
    coreMemory: new CoreMemory(),
    models: {
      chat: config.grokModel,
      fast: config.grokFastModel,
      vision: config.grokVisionModel,
    },
  });

  return {
    config,
    memoryStore,
    chat,
    agent,
    close: () => memoryStore.close(),
  };
}
