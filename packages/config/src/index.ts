export { type Env, type PartialEnv, getEnv, getPartialEnv, parseEnv, clearEnvCache } from './env.js';
export {
  type PipelinePolicy,
  type DispatchPolicy,
  type IngestionPolicy,
  type RetentionPolicy,
  type KnowledgeRefreshPolicy,
  type KnowledgePolicy,
  type GenerationPolicy,
  type TimeoutPolicy,
  PRIORITY_LEVELS,
  loadPipelinePolicy,
  parsePipelinePolicy,
  getDefaultPipelinePolicy,
  clearPipelinePolicyCache,
} from './pipeline-policy.js';
