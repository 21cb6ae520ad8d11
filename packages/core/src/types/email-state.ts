import { ok, err, type Result } from '@mailpilot/utils';
import type { EmailStatus, EmailPriority } from '@mailpilot/database';

export type { EmailStatus, EmailPriority };

export const EmailStatusValue = {
  UNREAD: 'unread',
  PROCESSING: 'processing',
  READ: 'read',
  RESPONDED: 'responded',
  FAILED: 'failed',
} as const satisfies Record<string, EmailStatus>;

// Allowed status moves. read/failed -> processing is only taken on an explicit re-trigger.
const TRANSITIONS: Record<EmailStatus, readonly EmailStatus[]> = {
  unread: ['processing'],
  processing: ['read', 'responded', 'failed'],
  read: ['responded', 'processing'],
  responded: [],
  failed: ['processing'],
};

// Categories that never get an automatic reply
export const NO_RESPONSE_CATEGORIES: readonly string[] = [
  'spam',
  'newsletter',
  'notification',
  'no_reply',
];

export const EmailStateErrorCode = {
  INVALID_TRANSITION: 'INVALID_TRANSITION',
} as const;
export type EmailStateErrorCode = (typeof EmailStateErrorCode)[keyof typeof EmailStateErrorCode];

export interface EmailStateError {
  code: EmailStateErrorCode;
  message: string;
  details: { from: EmailStatus; to: EmailStatus };
}

export function canTransition(from: EmailStatus, to: EmailStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(
  from: EmailStatus,
  to: EmailStatus
): Result<void, EmailStateError> {
  if (canTransition(from, to)) {
    return ok(undefined);
  }
  return err({
    code: EmailStateErrorCode.INVALID_TRANSITION,
    message: `Cannot move email from ${from} to ${to}`,
    details: { from, to },
  });
}

// Statuses that may be moved back to processing for a fresh attempt
export const RETRIGGERABLE_STATUSES: readonly EmailStatus[] = ['read', 'failed'];

export const isTerminalStatus = (status: EmailStatus): boolean => TRANSITIONS[status].length === 0;
