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
import { emails } from './emails.js';

export const emailResponses = pgTable(
  'email_responses',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    emailId: uuid('email_id')
      .notNull()
      .references(() => emails.id, { onDelete: 'cascade' }),
    responseText: text('response_text').notNull(),
    confidenceScore: doublePrecision('confidence_score').notNull(),
    modelUsed: varchar('model_used', { length: 100 }).notNull(),
    responseType: varchar('response_type', { length: 50 }),
    suggestedActions: jsonb('suggested_actions').$type<string[]>().notNull().default([]),
    generatedAt: timestamp('generated_at', { withTimezone: true }).notNull().defaultNow(),

    // Delivery state; is_sent only ever moves from false to true
    isSent: boolean('is_sent').notNull().default(false),
    sentAt: timestamp('sent_at', { withTimezone: true }),
    sentMessageId: varchar('sent_message_id', { length: 255 }),
    draftId: varchar('draft_id', { length: 255 }),
  },
  (table) => ({
    emailIdIdx: index('idx_email_responses_email_id').on(table.emailId),
    confidenceCheck: check(
      'valid_confidence',
      sql`${table.confidenceScore} >= 0 AND ${table.confidenceScore} <= 1`
    ),
    sentAtCheck: check(
      'sent_at_iff_sent',
      sql`(${table.isSent} AND ${table.sentAt} IS NOT NULL) OR (NOT ${table.isSent} AND ${table.sentAt} IS NULL)`
    ),
  })
);

export type EmailResponse = typeof emailResponses.$inferSelect;
export type NewEmailResponse = typeof emailResponses.$inferInsert;
