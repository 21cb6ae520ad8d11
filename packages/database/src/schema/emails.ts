import {
  pgTable,
  uuid,
  varchar,
  text,
  boolean,
  timestamp,
  doublePrecision,
  jsonb,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// Email status enum values
export const emailStatusValues = ['unread', 'processing', 'read', 'responded', 'failed'] as const;
export type EmailStatus = (typeof emailStatusValues)[number];

// Priority enum values, lowest first
export const emailPriorityValues = ['low', 'medium', 'high', 'urgent'] as const;
export type EmailPriority = (typeof emailPriorityValues)[number];

export const emails = pgTable(
  'emails',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    // Dedup key from the mail provider
    externalId: varchar('external_id', { length: 255 }).unique().notNull(),
    threadId: varchar('thread_id', { length: 255 }),
    subject: text('subject').notNull(),
    sender: varchar('sender', { length: 255 }).notNull(),
    recipient: varchar('recipient', { length: 255 }).notNull(),
    body: text('body').notNull().default(''),
    receivedAt: timestamp('received_at', { withTimezone: true }).notNull(),
    labels: jsonb('labels').$type<string[]>().notNull().default([]),

    // Processing state
    status: varchar('status', { length: 20, enum: emailStatusValues }).notNull().default('unread'),
    priority: varchar('priority', { length: 20, enum: emailPriorityValues })
      .notNull()
      .default('medium'),
    category: varchar('category', { length: 50 }),
    requiresResponse: boolean('requires_response').notNull().default(false),
    classificationConfidence: doublePrecision('classification_confidence'),
    failureReason: text('failure_reason'),

    // Metadata
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    processedAt: timestamp('processed_at', { withTimezone: true }),
  },
  (table) => ({
    statusIdx: index('idx_emails_status').on(table.status),
    priorityIdx: index('idx_emails_priority').on(table.priority),
    receivedAtIdx: index('idx_emails_received_at').on(table.receivedAt),
    processedAtIdx: index('idx_emails_processed_at').on(table.processedAt),
    statusCheck: check(
      'valid_status',
      sql`${table.status} IN ('unread', 'processing', 'read', 'responded', 'failed')`
    ),
    priorityCheck: check(
      'valid_priority',
      sql`${table.priority} IN ('low', 'medium', 'high', 'urgent')`
    ),
  })
);

export type Email = typeof emails.$inferSelect;
export type NewEmail = typeof emails.$inferInsert;
