import { ok, err, type Result, createLogger, type Logger } from '@mailpilot/utils';
import {
  RepositoryErrorCode,
  type Email,
  type EmailStatePatch,
  type IUnitOfWork,
  type Repositories,
  type RepositoryError,
} from '@mailpilot/database';
import type { Classification, InboundMessage, ResponseType } from '@mailpilot/integrations';
import type { TextGenerator, MailSource } from '../../ports.js';
import type { KnowledgeBase } from '../../knowledge/knowledge-base.js';
import { callWithTimeout } from '../../bounded-call.js';
import { scoreResponse, clampConfidence } from '../../confidence.js';
import {
  NO_RESPONSE_CATEGORIES,
  RETRIGGERABLE_STATUSES,
  assertTransition,
} from '../../types/email-state.js';
import type { IDispatcherService } from '../dispatcher.js';
import {
  PipelineErrorCode,
  type IPipelineService,
  type PipelineError,
  type PipelineOptions,
  type PipelineOutcome,
} from '../pipeline.js';

const logger = createLogger({ service: 'pipeline' });

// Used when the classifier answers with something other than the expected JSON
export const FALLBACK_CLASSIFICATION: Classification = {
  category: 'other',
  priority: 'medium',
  confidence: 0.5,
  keywords: [],
};

export const FALLBACK_RESPONSE_TEXT =
  "Thank you for your email. I'll review it and get back to you soon.";

const MAX_CATEGORY_LENGTH = 50;

export type KnowledgeRetriever = Pick<KnowledgeBase, 'searchRelevant' | 'formatContext'>;

export interface PipelineDependencies {
  repos: Repositories;
  unitOfWork: IUnitOfWork;
  generator: TextGenerator;
  knowledge: KnowledgeRetriever;
  dispatcher: IDispatcherService;
  mailSource: MailSource;
}

interface DraftReply {
  responseText: string;
  responseType: ResponseType;
  suggestedActions: string[];
  confidenceScore: number;
}

const persistenceFailed = (error: RepositoryError, emailId?: string): PipelineError => ({
  code: PipelineErrorCode.PERSISTENCE_FAILED,
  message: error.message,
  details: { repositoryCode: error.code, emailId },
});

const messageText = (email: Pick<Email, 'subject' | 'body'>): string =>
  `Subject: ${email.subject}\n\n${email.body}`;

/**
 * Per-message processing: dedup, classify, ground and generate a reply,
 * then hand it to the dispatcher. Each message's response and status change
 * commit together.
 */
export class PipelineService implements IPipelineService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async process(message: InboundMessage): Promise<Result<PipelineOutcome, PipelineError>> {
    const log = logger.child({ externalId: message.externalId });

    const existing = await this.deps.repos.emails.findByExternalId(message.externalId);
    if (!existing.ok) {
      return err(persistenceFailed(existing.error));
    }
    if (existing.value) {
      // An earlier mark may have failed; left unread, the message would come back on every fetch
      log.debug('Message already recorded, skipping');
      await this.markConsumed(message.externalId, log);
      return ok({ status: 'skipped', externalId: message.externalId });
    }

    const created = await this.deps.repos.emails.create({
      externalId: message.externalId,
      threadId: message.threadId,
      subject: message.subject,
      sender: message.sender,
      recipient: message.recipient,
      body: message.body,
      receivedAt: message.receivedAt,
      labels: message.labels,
      status: 'processing',
    });
    if (!created.ok) {
      // Lost an insert race against another worker
      if (created.error.code === RepositoryErrorCode.DUPLICATE) {
        log.info('Message recorded concurrently, skipping');
        await this.markConsumed(message.externalId, log);
        return ok({ status: 'skipped', externalId: message.externalId });
      }
      return err(persistenceFailed(created.error));
    }

    const outcome = await this.run(created.value, log.child({ emailId: created.value.id }));
    await this.markConsumed(message.externalId, log);
    return outcome;
  }

  async regenerate(emailId: string): Promise<Result<PipelineOutcome, PipelineError>> {
    const log = logger.child({ emailId });

    const found = await this.deps.repos.emails.findById(emailId);
    if (!found.ok) {
      return err(persistenceFailed(found.error, emailId));
    }
    if (!found.value) {
      return err({ code: PipelineErrorCode.NOT_FOUND, message: `Email not found: ${emailId}` });
    }

    const allowed = assertTransition(found.value.status, 'processing');
    if (!allowed.ok) {
      return err({
        code: PipelineErrorCode.INVALID_TRANSITION,
        message: allowed.error.message,
        details: allowed.error.details,
      });
    }

    const moved = await this.deps.repos.emails.transition(
      emailId,
      RETRIGGERABLE_STATUSES,
      'processing',
      { failureReason: null }
    );
    if (!moved.ok) {
      if (moved.error.code === RepositoryErrorCode.CONFLICT) {
        return err({
          code: PipelineErrorCode.INVALID_TRANSITION,
          message: moved.error.message,
          details: moved.error.details,
        });
      }
      return err(persistenceFailed(moved.error, emailId));
    }

    log.info({ externalId: moved.value.externalId }, 'Regenerating response');
    return this.run(moved.value, log);
  }

  private async run(email: Email, log: Logger): Promise<Result<PipelineOutcome, PipelineError>> {
    const text = messageText(email);

    const classified = await callWithTimeout(
      () => this.deps.generator.classify(text, email.sender),
      this.options.classifyTimeoutMs,
      'classification'
    );
    if (!classified.ok) {
      return this.fail(email, `Classification failed: ${classified.error.message}`, {}, log);
    }

    let classification = FALLBACK_CLASSIFICATION;
    if (classified.value.kind === 'parsed') {
      classification = classified.value.value;
    } else {
      log.warn({ reason: classified.value.reason }, 'Unparseable classification, using defaults');
    }

    const category = classification.category.slice(0, MAX_CATEGORY_LENGTH);
    const requiresResponse =
      this.options.autoRespondEnabled && !NO_RESPONSE_CATEGORIES.includes(category);
    const patch: EmailStatePatch = {
      priority: classification.priority,
      category,
      requiresResponse,
      classificationConfidence: clampConfidence(classification.confidence),
    };

    if (!requiresResponse) {
      return this.markRead(email, patch, log);
    }

    const relevant = await this.deps.knowledge.searchRelevant(
      `${email.subject} ${email.body}`,
      this.options.searchTopK
    );

    const generated = await callWithTimeout(
      () =>
        this.deps.generator.generateResponse({
          text,
          sender: email.sender,
          category,
          priority: classification.priority,
          context: this.deps.knowledge.formatContext(relevant),
        }),
      this.options.generateTimeoutMs,
      'generation'
    );
    if (!generated.ok) {
      return this.fail(email, `Generation failed: ${generated.error.message}`, patch, log);
    }

    let reply: DraftReply;
    if (generated.value.kind === 'unparseable') {
      log.warn({ reason: generated.value.reason }, 'Unparseable reply, using fallback response');
      reply = {
        responseText: FALLBACK_RESPONSE_TEXT,
        responseType: 'reply',
        suggestedActions: [],
        confidenceScore: clampConfidence(this.options.fallbackConfidence),
      };
    } else {
      const output = generated.value.value;
      if (output.responseType === 'none') {
        log.info('Model declined to reply');
        return this.markRead(email, { ...patch, requiresResponse: false }, log);
      }
      const scoreInput = { responseText: output.responseText, inboundBody: email.body };
      reply = {
        responseText: output.responseText,
        responseType: output.responseType,
        suggestedActions: output.suggestedActions,
        confidenceScore: scoreResponse(
          output.confidence === undefined
            ? scoreInput
            : { ...scoreInput, providerConfidence: output.confidence }
        ),
      };
    }

    const processedAt = this.now();
    const saved = await this.deps.unitOfWork.run(async (repos) => {
      const response = await repos.responses.create({
        emailId: email.id,
        responseText: reply.responseText,
        confidenceScore: reply.confidenceScore,
        modelUsed: this.deps.generator.model,
        responseType: reply.responseType,
        suggestedActions: reply.suggestedActions,
        generatedAt: processedAt,
      });
      if (!response.ok) {
        return response;
      }
      const updated = await repos.emails.transition(email.id, 'processing', 'read', {
        ...patch,
        processedAt,
      });
      if (!updated.ok) {
        return updated;
      }
      return ok({ email: updated.value, response: response.value });
    });
    if (!saved.ok) {
      log.error({ error: saved.error.message }, 'Could not store response');
      const failed = await this.fail(email, `Could not store response: ${saved.error.message}`, patch, log);
      return failed.ok ? err(persistenceFailed(saved.error, email.id)) : failed;
    }

    const { email: stored, response } = saved.value;
    const dispatch = await this.deps.dispatcher.decide(stored, response);
    log.info(
      { responseId: response.id, confidence: response.confidenceScore, dispatch: dispatch.kind },
      'Message processed'
    );

    if (dispatch.kind === 'sent') {
      return ok({
        status: 'responded',
        emailId: email.id,
        externalId: email.externalId,
        responseId: response.id,
        dispatch,
      });
    }
    return ok({
      status: 'read',
      emailId: email.id,
      externalId: email.externalId,
      responseId: response.id,
      dispatch,
    });
  }

  // Failures are logged only; the record already holds the outcome
  private async markConsumed(externalId: string, log: Logger): Promise<void> {
    const consumed = await callWithTimeout(
      () => this.deps.mailSource.markConsumed(externalId),
      this.options.sourceTimeoutMs,
      'mark consumed'
    );
    if (!consumed.ok) {
      log.warn({ error: consumed.error.message }, 'Could not mark message as read at the source');
    }
  }

  private async markRead(
    email: Email,
    patch: EmailStatePatch,
    log: Logger
  ): Promise<Result<PipelineOutcome, PipelineError>> {
    const read = await this.deps.repos.emails.transition(email.id, 'processing', 'read', {
      ...patch,
      processedAt: this.now(),
    });
    if (!read.ok) {
      return err(persistenceFailed(read.error, email.id));
    }
    log.info({ category: patch.category }, 'No response required');
    return ok({
      status: 'read',
      emailId: email.id,
      externalId: email.externalId,
      responseId: null,
      dispatch: null,
    });
  }

  private async fail(
    email: Email,
    reason: string,
    patch: EmailStatePatch,
    log: Logger
  ): Promise<Result<PipelineOutcome, PipelineError>> {
    log.warn({ reason }, 'Message failed');
    const failed = await this.deps.repos.emails.transition(email.id, 'processing', 'failed', {
      ...patch,
      failureReason: reason,
      processedAt: this.now(),
    });
    if (!failed.ok) {
      return err(persistenceFailed(failed.error, email.id));
    }
    return ok({ status: 'failed', emailId: email.id, externalId: email.externalId, reason });
  }
}

export function createPipelineService(
  deps: PipelineDependencies,
  options: PipelineOptions
): PipelineService {
  return new PipelineService(deps, options);
}
