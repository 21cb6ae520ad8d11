// Service implementations
export {
  PipelineService,
  createPipelineService,
  FALLBACK_CLASSIFICATION,
  FALLBACK_RESPONSE_TEXT,
  type KnowledgeRetriever,
  type PipelineDependencies,
} from './pipeline-service.js';
export { DispatcherService, createDispatcherService, toReply } from './dispatcher-service.js';
export {
  OrchestratorService,
  createOrchestratorService,
  type OrchestratorDependencies,
  type OrchestratorOptions,
} from './orchestrator-service.js';
export { InboxService, createInboxService, type InboxDependencies } from './inbox-service.js';
