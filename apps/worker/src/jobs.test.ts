import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ok, err } from '@mailpilot/utils';
import { getDefaultPipelinePolicy } from '@mailpilot/config';
import type { IOrchestratorService, IngestionSweepSummary } from '@mailpilot/core';
import { buildJobTable, JobName } from './jobs.js';
import type { ScheduledJobDefinition } from './scheduler/types.js';

const NOW = new Date('2026-03-10T02:00:00Z');

const SWEEP: IngestionSweepSummary = {
  fetched: 0,
  processed: 0,
  responded: 0,
  read: 0,
  failed: 0,
  skipped: 0,
  cancelled: 0,
};

describe('buildJobTable', () => {
  let orchestrator: IOrchestratorService;
  let jobs: ScheduledJobDefinition[];
  const signal = new AbortController().signal;

  const find = (name: string): ScheduledJobDefinition => {
    const found = jobs.find((job) => job.name === name);
    if (!found) throw new Error(`no job ${name}`);
    return found;
  };

  beforeEach(() => {
    orchestrator = {
      runIngestionSweep: vi.fn(async () => SWEEP),
      runRetentionCleanup: vi.fn(async () => ok({ deleted: 2, cutoff: NOW })),
      runKnowledgeRefresh: vi.fn(async () => ok({ scanned: 1, added: 1, skipped: 0, failed: 0 })),
    };
    jobs = buildJobTable(orchestrator, getDefaultPipelinePolicy(), { timezone: 'UTC' });
  });

  it('derives triggers from the policy', () => {
    expect(jobs.map((job) => [job.name, job.trigger])).toEqual([
      [JobName.INGESTION, { kind: 'interval', everyMs: 300_000 }],
      [JobName.RETENTION, { kind: 'cron', expression: '0 2 * * *', timezone: 'UTC' }],
      [JobName.KNOWLEDGE_REFRESH, { kind: 'cron', expression: '0 3 * * 0', timezone: 'UTC' }],
    ]);
    expect(jobs.every((job) => job.active)).toBe(true);
  });

  it('leaves the zone out when none is configured', () => {
    const table = buildJobTable(orchestrator, getDefaultPipelinePolicy());
    expect(table[1]?.trigger).toEqual({ kind: 'cron', expression: '0 2 * * *' });
  });

  it('passes the stop signal to the ingestion sweep', async () => {
    await find(JobName.INGESTION).handler({ signal, now: NOW });
    expect(orchestrator.runIngestionSweep).toHaveBeenCalledWith({ signal });
  });

  it('fails the ingestion run when the mailbox could not be read', async () => {
    vi.mocked(orchestrator.runIngestionSweep).mockResolvedValueOnce({ ...SWEEP, fetchError: 'unauthorized' });

    await expect(find(JobName.INGESTION).handler({ signal, now: NOW })).rejects.toThrow(
      'Fetch failed: unauthorized'
    );
  });

  it('runs retention for the scheduled time', async () => {
    await find(JobName.RETENTION).handler({ signal, now: NOW });
    expect(orchestrator.runRetentionCleanup).toHaveBeenCalledWith(NOW);
  });

  it('fails the retention run on a repository error', async () => {
    vi.mocked(orchestrator.runRetentionCleanup).mockResolvedValueOnce(
      err({ code: 'QUERY_FAILED', message: 'connection refused' })
    );

    await expect(find(JobName.RETENTION).handler({ signal, now: NOW })).rejects.toThrow('connection refused');
  });

  it('runs the knowledge refresh for the scheduled time', async () => {
    await find(JobName.KNOWLEDGE_REFRESH).handler({ signal, now: NOW });
    expect(orchestrator.runKnowledgeRefresh).toHaveBeenCalledWith(NOW);
  });
});
