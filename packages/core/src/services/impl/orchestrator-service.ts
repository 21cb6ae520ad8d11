import { randomUUID } from 'node:crypto';
import { ok, type Result, createLogger, type Logger, runBounded, toError } from '@mailpilot/utils';
import type { EmailPriority, Repositories, RepositoryError } from '@mailpilot/database';
import type { InboundMessage } from '@mailpilot/integrations';
import type { MailSource } from '../../ports.js';
import type { KnowledgeBase } from '../../knowledge/knowledge-base.js';
import { callWithTimeout } from '../../bounded-call.js';
import type { IPipelineService, PipelineOutcome } from '../pipeline.js';
import type {
  IOrchestratorService,
  IngestionSweepSummary,
  KnowledgeRefreshSummary,
  RetentionSummary,
  SweepOptions,
} from '../orchestrator.js';

const logger = createLogger({ service: 'orchestrator' });

const DAY_MS = 24 * 60 * 60 * 1000;

export interface OrchestratorDependencies {
  repos: Repositories;
  pipeline: IPipelineService;
  mailSource: MailSource;
  knowledgeBase: Pick<KnowledgeBase, 'addInteraction' | 'hasInteraction'>;
}

export interface OrchestratorOptions {
  maxBatchSize: number;
  concurrency: number;
  fetchTimeoutMs: number;
  retentionDays: number;
  exemptPriorities: readonly EmailPriority[];
  lookbackDays: number;
}

type ItemStatus = PipelineOutcome['status'];

const emptySweep = (): IngestionSweepSummary => ({
  fetched: 0,
  processed: 0,
  responded: 0,
  read: 0,
  failed: 0,
  skipped: 0,
  cancelled: 0,
});

/**
 * The scheduled jobs. Every per-item failure is logged and counted; none of
 * them ends a run early.
 */
export class OrchestratorService implements IOrchestratorService {
  private sweeping = false;

  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly options: OrchestratorOptions
  ) {}

  async runIngestionSweep(options: SweepOptions = {}): Promise<IngestionSweepSummary> {
    const log = logger.child({ job: 'ingestion', runId: randomUUID() });
    if (this.sweeping) {
      log.warn('Ingestion sweep already running, not starting another');
      return { ...emptySweep(), overlapped: true };
    }

    this.sweeping = true;
    try {
      return await this.sweep(log, options.signal);
    } finally {
      this.sweeping = false;
    }
  }

  async runRetentionCleanup(now: Date = new Date()): Promise<Result<RetentionSummary, RepositoryError>> {
    const log = logger.child({ job: 'retention' });
    const cutoff = new Date(now.getTime() - this.options.retentionDays * DAY_MS);
    // Urgent records are never deleted, whatever the configuration says
    const exempt: EmailPriority[] = this.options.exemptPriorities.includes('urgent')
      ? [...this.options.exemptPriorities]
      : [...this.options.exemptPriorities, 'urgent'];

    const deleted = await this.deps.repos.emails.deleteProcessedBefore(cutoff, exempt);
    if (!deleted.ok) {
      log.error({ error: deleted.error.message }, 'Retention cleanup failed');
      return deleted;
    }

    log.info({ deleted: deleted.value.length, cutoff: cutoff.toISOString(), exempt }, 'Retention cleanup done');
    return ok({ deleted: deleted.value.length, cutoff });
  }

  async runKnowledgeRefresh(
    now: Date = new Date()
  ): Promise<Result<KnowledgeRefreshSummary, RepositoryError>> {
    const log = logger.child({ job: 'knowledge-refresh' });
    const since = new Date(now.getTime() - this.options.lookbackDays * DAY_MS);

    const responded = await this.deps.repos.emails.findRespondedSince(since);
    if (!responded.ok) {
      log.error({ error: responded.error.message }, 'Knowledge refresh failed');
      return responded;
    }

    const summary: KnowledgeRefreshSummary = {
      scanned: responded.value.length,
      added: 0,
      skipped: 0,
      failed: 0,
    };
    for (const email of responded.value) {
      const itemLog = log.child({ emailId: email.id, externalId: email.externalId });
      // Lookback windows overlap between runs; each exchange is indexed once
      if (this.deps.knowledgeBase.hasInteraction(email.id)) {
        summary.skipped++;
        continue;
      }
      try {
        const sent = await this.deps.repos.responses.findSentByEmailId(email.id);
        if (!sent.ok) {
          itemLog.warn({ error: sent.error.message }, 'Could not load sent response');
          summary.failed++;
          continue;
        }
        if (!sent.value) {
          continue;
        }

        const added = await this.deps.knowledgeBase.addInteraction(
          email.id,
          email.subject,
          email.body,
          sent.value.responseText
        );
        if (added.ok) {
          summary.added++;
        } else {
          itemLog.warn({ code: added.error.code, error: added.error.message }, 'Interaction not indexed');
          summary.failed++;
        }
      } catch (error) {
        itemLog.error({ error: toError(error).message }, 'Interaction not indexed');
        summary.failed++;
      }
    }

    log.info(summary, 'Knowledge refresh done');
    return ok(summary);
  }

  private async sweep(log: Logger, signal: AbortSignal | undefined): Promise<IngestionSweepSummary> {
    const summary = emptySweep();
    if (signal?.aborted) {
      log.info('Sweep cancelled before start');
      return summary;
    }

    const fetched = await callWithTimeout(
      () => this.deps.mailSource.fetchNew(this.options.maxBatchSize),
      this.options.fetchTimeoutMs,
      'fetch'
    );
    if (!fetched.ok) {
      log.error({ error: fetched.error.message, timedOut: fetched.error.timedOut }, 'Fetch failed');
      return { ...summary, fetchError: fetched.error.message };
    }

    const messages = fetched.value.slice(0, this.options.maxBatchSize);
    summary.fetched = messages.length;
    if (messages.length === 0) {
      log.debug('No new messages');
      return summary;
    }

    const run = await runBounded(messages, (message) => this.processIsolated(message, log), {
      concurrency: this.options.concurrency,
      ...(signal ? { signal } : {}),
    });

    for (const status of run.results) {
      summary[status]++;
    }
    summary.processed = summary.read + summary.responded;
    summary.cancelled = run.notStarted;

    log.info(summary, 'Ingestion sweep done');
    return summary;
  }

  // Never throws: whatever happens to one message is counted and logged
  private async processIsolated(message: InboundMessage, log: Logger): Promise<ItemStatus> {
    let reason: string;
    try {
      const result = await this.deps.pipeline.process(message);
      if (result.ok) {
        return result.value.status;
      }
      reason = result.error.message;
    } catch (error) {
      reason = toError(error).message;
    }

    log.error({ externalId: message.externalId, error: reason }, 'Message processing failed');
    await this.markFailedIfProcessing(message.externalId, reason, log);
    return 'failed';
  }

  private async markFailedIfProcessing(externalId: string, reason: string, log: Logger): Promise<void> {
    try {
      const record = await this.deps.repos.emails.findByExternalId(externalId);
      if (!record.ok || !record.value || record.value.status !== 'processing') {
        return;
      }
      const marked = await this.deps.repos.emails.markFailed(record.value.id, reason);
      if (!marked.ok) {
        log.error({ externalId, error: marked.error.message }, 'Could not mark record failed');
      }
    } catch (error) {
      log.error({ externalId, error: toError(error).message }, 'Could not mark record failed');
    }
  }
}

export function createOrchestratorService(
  deps: OrchestratorDependencies,
  options: OrchestratorOptions
): OrchestratorService {
  return new OrchestratorService(deps, options);
}
