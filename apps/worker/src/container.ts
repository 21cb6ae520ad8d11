import type { Env, PipelinePolicy } from '@mailpilot/config';
import { createRepositories, UnitOfWork, type DatabaseExecutor } from '@mailpilot/database';
import { GroqClient, OpenAIEmbedder, OutlookClient } from '@mailpilot/integrations';
import {
  Chunker,
  KnowledgeBase,
  createDispatcherService,
  createInboxService,
  createOrchestratorService,
  createPipelineService,
  type InboxService,
  type OrchestratorService,
} from '@mailpilot/core';

export interface Container {
  knowledgeBase: KnowledgeBase;
  orchestrator: OrchestratorService;
  inbox: InboxService;
}

/**
 * Wire clients, repositories and services from validated configuration.
 * Nothing here touches the network; the knowledge base still needs `open()`.
 */
export function createContainer(env: Env, policy: PipelinePolicy, db: DatabaseExecutor): Container {
  const repos = createRepositories(db);
  const unitOfWork = new UnitOfWork(db);

  const generator = new GroqClient({
    apiKey: env.GROQ_API_KEY,
    model: env.GROQ_MODEL,
    temperature: policy.generation.temperature,
    maxResponseWords: policy.generation.maxResponseWords,
  });
  const embedder = new OpenAIEmbedder({
    apiKey: env.OPENAI_API_KEY,
    model: env.EMBEDDING_MODEL,
    dimension: env.EMBEDDING_DIMENSION,
  });
  const mailbox = new OutlookClient({
    userId: env.OUTLOOK_USER_ID,
    mailQuery: policy.ingestion.mailQuery,
    credentials: {
      tenantId: env.OUTLOOK_TENANT_ID,
      clientId: env.OUTLOOK_CLIENT_ID,
      clientSecret: env.OUTLOOK_CLIENT_SECRET,
    },
  });

  const knowledgeBase = new KnowledgeBase({
    rootPath: env.KNOWLEDGE_BASE_PATH,
    dimension: env.EMBEDDING_DIMENSION,
    embedder,
    chunker: new Chunker(policy.knowledge.chunkSize, policy.knowledge.chunkOverlap),
    timeoutMs: policy.timeouts.embeddingMs,
  });

  const dispatcher = createDispatcherService(repos, unitOfWork, mailbox, {
    autoSendThreshold: policy.dispatch.autoSendThreshold,
    autoSendEnabled: policy.dispatch.autoRespondEnabled,
    sendTimeoutMs: policy.timeouts.sendMs,
  });

  const pipeline = createPipelineService(
    { repos, unitOfWork, generator, knowledge: knowledgeBase, dispatcher, mailSource: mailbox },
    {
      autoRespondEnabled: policy.dispatch.autoRespondEnabled,
      searchTopK: policy.knowledge.searchTopK,
      fallbackConfidence: policy.generation.fallbackConfidence,
      classifyTimeoutMs: policy.timeouts.generationMs,
      generateTimeoutMs: policy.timeouts.generationMs,
      sourceTimeoutMs: policy.timeouts.fetchMs,
    }
  );

  const orchestrator = createOrchestratorService(
    { repos, pipeline, mailSource: mailbox, knowledgeBase },
    {
      maxBatchSize: policy.ingestion.maxBatchSize,
      concurrency: policy.ingestion.concurrency,
      fetchTimeoutMs: policy.timeouts.fetchMs,
      retentionDays: policy.retention.days,
      exemptPriorities: policy.retention.exemptPriorities,
      lookbackDays: policy.knowledgeRefresh.lookbackDays,
    }
  );

  const inbox = createInboxService({ repos, pipeline, dispatcher, orchestrator, knowledgeBase });

  return { knowledgeBase, orchestrator, inbox };
}
