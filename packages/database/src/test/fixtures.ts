import type { NewEmail, NewEmailResponse, NewKnowledgeDocument } from '../schema/index.js';

let sequence = 0;

/**
 * Create a test email with default values
 */
export function createTestEmail(overrides: Partial<NewEmail> = {}): NewEmail {
  sequence++;
  return {
    externalId: `msg-${sequence}`,
    threadId: `thread-${sequence}`,
    subject: 'Question about my order',
    sender: 'customer@example.com',
    recipient: 'support@example.com',
    body: 'Hi, when will my order ship?',
    receivedAt: new Date('2024-03-01T09:00:00Z'),
    labels: ['INBOX'],
    status: 'processing',
    priority: 'medium',
    ...overrides,
  };
}

/**
 * Create a processed email, handled at `processedAt`
 */
export function createProcessedEmail(
  processedAt: Date,
  overrides: Partial<NewEmail> = {}
): NewEmail {
  return createTestEmail({ status: 'read', processedAt, ...overrides });
}

/**
 * Create a held (unsent) response for an email
 */
export function createTestResponse(
  emailId: string,
  overrides: Partial<NewEmailResponse> = {}
): NewEmailResponse {
  return {
    emailId,
    responseText: 'Thanks for reaching out. Your order ships tomorrow.',
    confidenceScore: 0.75,
    modelUsed: 'test-model',
    responseType: 'answer',
    suggestedActions: [],
    ...overrides,
  };
}

export function createTestDocument(
  overrides: Partial<NewKnowledgeDocument> = {}
): NewKnowledgeDocument {
  return {
    title: 'Shipping policy',
    content: 'Orders ship within two business days.',
    category: 'policy',
    tags: ['shipping'],
    ...overrides,
  };
}
