import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import YAML from 'yaml';

export const PRIORITY_LEVELS = ['low', 'medium', 'high', 'urgent'] as const;
const prioritySchema = z.enum(PRIORITY_LEVELS);

// Five-field cron expression, seconds are not supported
const cronSchema = z
  .string()
  .regex(/^\S+(\s+\S+){4}$/, 'Expected a five-field cron expression');

// Dispatch
const dispatchSchema = z
  .object({
    autoSendThreshold: z.number().min(0).max(1).default(0.8),
    autoRespondEnabled: z.boolean().default(true),
  })
  .default({});
export type DispatchPolicy = z.infer<typeof dispatchSchema>;

// Ingestion sweep
const ingestionSchema = z
  .object({
    maxBatchSize: z.number().int().positive().default(10),
    intervalSeconds: z.number().int().positive().default(300),
    concurrency: z.number().int().positive().default(1),
    mailQuery: z.string().default('isRead eq false'),
  })
  .default({});
export type IngestionPolicy = z.infer<typeof ingestionSchema>;

// Retention cleanup
const retentionSchema = z
  .object({
    days: z.number().int().positive().default(30),
    cron: cronSchema.default('0 2 * * *'),
    exemptPriorities: z.array(prioritySchema).default(['urgent']),
  })
  .default({})
  .refine((retention) => retention.exemptPriorities.includes('urgent'), {
    message: 'retention.exemptPriorities must include "urgent"',
    path: ['exemptPriorities'],
  });
export type RetentionPolicy = z.infer<typeof retentionSchema>;

// Knowledge refresh
const knowledgeRefreshSchema = z
  .object({
    lookbackDays: z.number().int().positive().default(7),
    cron: cronSchema.default('0 3 * * 0'),
  })
  .default({});
export type KnowledgeRefreshPolicy = z.infer<typeof knowledgeRefreshSchema>;

// Chunking and retrieval
const knowledgeSchema = z
  .object({
    chunkSize: z.number().int().positive().default(1000),
    chunkOverlap: z.number().int().nonnegative().default(100),
    searchTopK: z.number().int().positive().default(5),
  })
  .default({})
  .refine((knowledge) => knowledge.chunkOverlap < knowledge.chunkSize, {
    message: 'knowledge.chunkOverlap must be smaller than knowledge.chunkSize',
    path: ['chunkOverlap'],
  });
export type KnowledgePolicy = z.infer<typeof knowledgeSchema>;

// Response generation
const generationSchema = z
  .object({
    maxResponseWords: z.number().int().positive().default(500),
    temperature: z.number().min(0).max(2).default(0.7),
    fallbackConfidence: z.number().min(0).max(1).default(0.3),
  })
  .default({});
export type GenerationPolicy = z.infer<typeof generationSchema>;

// Upper bounds on every external call
const timeoutsSchema = z
  .object({
    embeddingMs: z.number().int().positive().default(15000),
    generationMs: z.number().int().positive().default(60000),
    sendMs: z.number().int().positive().default(30000),
    fetchMs: z.number().int().positive().default(30000),
  })
  .default({});
export type TimeoutPolicy = z.infer<typeof timeoutsSchema>;

// Full policy
const pipelinePolicySchema = z.object({
  version: z.string().default('1.0'),
  dispatch: dispatchSchema,
  ingestion: ingestionSchema,
  retention: retentionSchema,
  knowledgeRefresh: knowledgeRefreshSchema,
  knowledge: knowledgeSchema,
  generation: generationSchema,
  timeouts: timeoutsSchema,
});
export type PipelinePolicy = z.infer<typeof pipelinePolicySchema>;

let cachedPolicy: PipelinePolicy | undefined;

export function parsePipelinePolicy(raw: unknown): PipelinePolicy {
  const result = pipelinePolicySchema.safeParse(raw ?? {});
  if (!result.success) {
    console.error('Invalid pipeline policy configuration:');
    console.error(result.error.format());
    throw new Error('Invalid pipeline policy configuration');
  }
  return result.data;
}

export function loadPipelinePolicy(configPath?: string): PipelinePolicy {
  if (cachedPolicy) {
    return cachedPolicy;
  }

  const policyPath =
    configPath ?? path.resolve(process.cwd(), 'config', 'pipeline-policy.yaml');

  if (!fs.existsSync(policyPath)) {
    console.warn(`Pipeline policy file not found at ${policyPath}, using default policy`);
    return getDefaultPipelinePolicy();
  }

  const fileContent = fs.readFileSync(policyPath, 'utf-8');
  const parsed: unknown = YAML.parse(fileContent);

  cachedPolicy = parsePipelinePolicy(parsed);
  return cachedPolicy;
}

export function getDefaultPipelinePolicy(): PipelinePolicy {
  return pipelinePolicySchema.parse({});
}

export function clearPipelinePolicyCache(): void {
  cachedPolicy = undefined;
}
