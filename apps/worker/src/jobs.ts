import type { PipelinePolicy } from '@mailpilot/config';
import type { IOrchestratorService } from '@mailpilot/core';
import type { ScheduledJobDefinition } from './scheduler/types.js';

export const JobName = {
  INGESTION: 'ingestion-sweep',
  RETENTION: 'retention-cleanup',
  KNOWLEDGE_REFRESH: 'knowledge-refresh',
} as const;
export type JobName = (typeof JobName)[keyof typeof JobName];

export interface JobTableOptions {
  timezone?: string;
}

/**
 * The worker's jobs. A run that could not do its work throws, so the
 * scheduler records it as failed.
 */
export function buildJobTable(
  orchestrator: IOrchestratorService,
  policy: Pick<PipelinePolicy, 'ingestion' | 'retention' | 'knowledgeRefresh'>,
  options: JobTableOptions = {}
): ScheduledJobDefinition[] {
  const zone = options.timezone ? { timezone: options.timezone } : {};

  return [
    {
      name: JobName.INGESTION,
      trigger: { kind: 'interval', everyMs: policy.ingestion.intervalSeconds * 1000 },
      active: true,
      handler: async ({ signal }) => {
        const summary = await orchestrator.runIngestionSweep({ signal });
        if (summary.fetchError !== undefined) {
          throw new Error(`Fetch failed: ${summary.fetchError}`);
        }
      },
    },
    {
      name: JobName.RETENTION,
      trigger: { kind: 'cron', expression: policy.retention.cron, ...zone },
      active: true,
      handler: async ({ now }) => {
        const result = await orchestrator.runRetentionCleanup(now);
        if (!result.ok) {
          throw new Error(result.error.message);
        }
      },
    },
    {
      name: JobName.KNOWLEDGE_REFRESH,
      trigger: { kind: 'cron', expression: policy.knowledgeRefresh.cron, ...zone },
      active: true,
      handler: async ({ now }) => {
        const result = await orchestrator.runKnowledgeRefresh(now);
        if (!result.ok) {
          throw new Error(result.error.message);
        }
      },
    },
  ];
}
