import type { Result } from '@mailpilot/utils';
import type { InboundMessage } from '@mailpilot/integrations';
import type { DispatchDecision } from './dispatcher.js';

export const PipelineErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
} as const;
export type PipelineErrorCode = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

export interface PipelineError {
  code: PipelineErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type PipelineOutcome =
  // Already recorded; nothing was called or written
  | { status: 'skipped'; externalId: string }
  | {
      status: 'read';
      emailId: string;
      externalId: string;
      responseId: string | null;
      dispatch: DispatchDecision | null;
    }
  | {
      status: 'responded';
      emailId: string;
      externalId: string;
      responseId: string;
      dispatch: DispatchDecision;
    }
  // The record was kept with status failed and a reason
  | { status: 'failed'; emailId: string; externalId: string; reason: string };

export interface PipelineOptions {
  autoRespondEnabled: boolean;
  searchTopK: number;
  fallbackConfidence: number;
  classifyTimeoutMs: number;
  generateTimeoutMs: number;
  // Deadline for marking the message consumed at the mail source
  sourceTimeoutMs: number;
  now?: () => Date;
}

export interface IPipelineService {
  /**
   * Run one inbound message through dedup, classification, generation and
   * dispatch. Provider failures end in a `failed` outcome; an `err` result
   * means the record itself could not be written.
   */
  process(message: InboundMessage): Promise<Result<PipelineOutcome, PipelineError>>;

  /**
   * Re-run classification and generation for a read or failed record.
   */
  regenerate(emailId: string): Promise<Result<PipelineOutcome, PipelineError>>;
}
