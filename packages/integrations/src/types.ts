// Types shared by the provider clients; core consumes them through its ports

export type Priority = 'low' | 'medium' | 'high' | 'urgent';

export const IntegrationErrorCode = {
  FETCH_ERROR: 'FETCH_ERROR',
  UPDATE_ERROR: 'UPDATE_ERROR',
  SEND_ERROR: 'SEND_ERROR',
  DRAFT_ERROR: 'DRAFT_ERROR',
  LLM_ERROR: 'LLM_ERROR',
  EMBEDDING_ERROR: 'EMBEDDING_ERROR',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  CIRCUIT_OPEN: 'CIRCUIT_OPEN',
} as const;
export type IntegrationErrorCode = (typeof IntegrationErrorCode)[keyof typeof IntegrationErrorCode];

export interface IntegrationError {
  code: IntegrationErrorCode;
  message: string;
  retryable: boolean;
}

// Message as delivered by the mail source
export interface InboundMessage {
  externalId: string;
  threadId: string | null;
  subject: string;
  sender: string;
  recipient: string;
  body: string;
  receivedAt: Date;
  labels: string[];
}

export interface OutgoingMessage {
  to: string;
  subject: string;
  body: string;
  replyToExternalId?: string;
}

export interface Classification {
  category: string;
  priority: Priority;
  confidence: number;
  keywords: string[];
}

export type ResponseType = 'reply' | 'new' | 'none';

export interface GeneratedReply {
  responseText: string;
  responseType: ResponseType;
  suggestedActions: string[];
  // Present only when the model reports one
  confidence?: number;
}

export interface GenerationRequest {
  text: string;
  sender: string;
  category: string;
  priority: Priority;
  context: string;
}

/**
 * Outcome of reading structured fields out of model output. Anything that
 * is not exactly the expected JSON is `unparseable`; callers decide the
 * fallback.
 */
export type StructuredOutput<T> =
  | { kind: 'parsed'; value: T }
  | { kind: 'unparseable'; raw: string; reason: string };
