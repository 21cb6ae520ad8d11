import type { Result } from '@mailpilot/utils';
import type { RepositoryError } from '@mailpilot/database';

export interface IngestionSweepSummary {
  fetched: number;
  // Messages that reached read or responded
  processed: number;
  responded: number;
  read: number;
  failed: number;
  skipped: number;
  // Fetched but not started because the sweep was cancelled
  cancelled: number;
  fetchError?: string;
  // Set when another sweep was still running and this one did nothing
  overlapped?: boolean;
}

export interface RetentionSummary {
  deleted: number;
  cutoff: Date;
}

export interface KnowledgeRefreshSummary {
  scanned: number;
  added: number;
  // Already indexed by an earlier run
  skipped: number;
  failed: number;
}

export interface SweepOptions {
  signal?: AbortSignal;
}

export interface IOrchestratorService {
  runIngestionSweep(options?: SweepOptions): Promise<IngestionSweepSummary>;
  runRetentionCleanup(now?: Date): Promise<Result<RetentionSummary, RepositoryError>>;
  runKnowledgeRefresh(now?: Date): Promise<Result<KnowledgeRefreshSummary, RepositoryError>>;
}
