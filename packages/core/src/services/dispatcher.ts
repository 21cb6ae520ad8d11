import type { Result } from '@mailpilot/utils';
import type { Email, EmailResponse } from '@mailpilot/database';

export const DispatchErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  INVALID_STATE: 'INVALID_STATE',
  SEND_FAILED: 'SEND_FAILED',
  DRAFT_FAILED: 'DRAFT_FAILED',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
} as const;
export type DispatchErrorCode = (typeof DispatchErrorCode)[keyof typeof DispatchErrorCode];

export interface DispatchError {
  code: DispatchErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type HeldReason = 'low_confidence' | 'auto_send_disabled' | 'send_failed' | 'persist_failed';

export type DispatchDecision =
  | {
      kind: 'sent';
      responseId: string;
      sentMessageId: string | null;
      // True when the response had been sent before this call
      alreadySent: boolean;
    }
  | { kind: 'held'; responseId: string; reason: HeldReason; error?: string };

export interface DispatchOptions {
  autoSendThreshold: number;
  autoSendEnabled: boolean;
  sendTimeoutMs: number;
  now?: () => Date;
}

export interface IDispatcherService {
  /**
   * Send the response when its confidence clears the threshold, otherwise
   * hold it for review. Never throws; send failures come back as held.
   */
  decide(email: Email, response: EmailResponse): Promise<DispatchDecision>;

  /**
   * Send a held response regardless of its confidence.
   */
  dispatchManually(responseId: string): Promise<Result<DispatchDecision, DispatchError>>;

  /**
   * Store the response as a mailbox draft; returns the draft id.
   */
  saveDraft(responseId: string): Promise<Result<string, DispatchError>>;
}
