import { ok, err, type Result, createLogger } from '@mailpilot/utils';
import type {
  Email,
  EmailResponse,
  IUnitOfWork,
  Repositories,
  RepositoryError,
} from '@mailpilot/database';
import type { OutgoingMessage } from '@mailpilot/integrations';
import type { MailSink } from '../../ports.js';
import { callWithTimeout } from '../../bounded-call.js';
import { assertTransition } from '../../types/email-state.js';
import {
  DispatchErrorCode,
  type DispatchDecision,
  type DispatchError,
  type DispatchOptions,
  type IDispatcherService,
} from '../dispatcher.js';

const logger = createLogger({ service: 'dispatcher' });

const persistenceFailed = (error: RepositoryError): DispatchError => ({
  code: DispatchErrorCode.PERSISTENCE_FAILED,
  message: error.message,
  details: { repositoryCode: error.code },
});

export function toReply(email: Email, response: EmailResponse): OutgoingMessage {
  return {
    to: email.sender,
    subject: `Re: ${email.subject}`,
    body: response.responseText,
    replyToExternalId: email.externalId,
  };
}

/**
 * Confidence-gated delivery of generated responses.
 */
export class DispatcherService implements IDispatcherService {
  private readonly now: () => Date;

  constructor(
    private readonly repos: Repositories,
    private readonly unitOfWork: IUnitOfWork,
    private readonly mailSink: MailSink,
    private readonly options: DispatchOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async decide(email: Email, response: EmailResponse): Promise<DispatchDecision> {
    if (response.isSent) {
      return {
        kind: 'sent',
        responseId: response.id,
        sentMessageId: response.sentMessageId,
        alreadySent: true,
      };
    }

    if (!this.options.autoSendEnabled) {
      return { kind: 'held', responseId: response.id, reason: 'auto_send_disabled' };
    }

    if (response.confidenceScore < this.options.autoSendThreshold) {
      logger.info(
        {
          emailId: email.id,
          responseId: response.id,
          confidence: response.confidenceScore,
          threshold: this.options.autoSendThreshold,
        },
        'Response held for review'
      );
      return { kind: 'held', responseId: response.id, reason: 'low_confidence' };
    }

    return this.send(email, response);
  }

  async dispatchManually(responseId: string): Promise<Result<DispatchDecision, DispatchError>> {
    const loaded = await this.load(responseId);
    if (!loaded.ok) {
      return loaded;
    }
    const { email, response } = loaded.value;

    if (response.isSent) {
      return ok(await this.decide(email, response));
    }

    const allowed = assertTransition(email.status, 'responded');
    if (!allowed.ok) {
      return err({
        code: DispatchErrorCode.INVALID_STATE,
        message: allowed.error.message,
        details: { emailId: email.id, status: email.status },
      });
    }

    const decision = await this.send(email, response);
    if (decision.kind === 'held') {
      return err({
        code:
          decision.reason === 'persist_failed'
            ? DispatchErrorCode.PERSISTENCE_FAILED
            : DispatchErrorCode.SEND_FAILED,
        message: decision.error ?? `Response ${responseId} was not sent`,
        details: { responseId },
      });
    }
    return ok(decision);
  }

  async saveDraft(responseId: string): Promise<Result<string, DispatchError>> {
    const loaded = await this.load(responseId);
    if (!loaded.ok) {
      return loaded;
    }
    const { email, response } = loaded.value;

    const draft = await callWithTimeout(
      () => this.mailSink.saveDraft(toReply(email, response)),
      this.options.sendTimeoutMs,
      'save draft'
    );
    if (!draft.ok) {
      logger.warn({ responseId, error: draft.error.message }, 'Draft not saved');
      return err({
        code: DispatchErrorCode.DRAFT_FAILED,
        message: draft.error.message,
        details: { responseId, timedOut: draft.error.timedOut },
      });
    }

    const stored = await this.repos.responses.setDraftId(response.id, draft.value);
    if (!stored.ok) {
      return err(persistenceFailed(stored.error));
    }
    return ok(draft.value);
  }

  private async send(email: Email, response: EmailResponse): Promise<DispatchDecision> {
    const log = logger.child({
      emailId: email.id,
      externalId: email.externalId,
      responseId: response.id,
    });

    const sent = await callWithTimeout(
      () => this.mailSink.send(toReply(email, response)),
      this.options.sendTimeoutMs,
      'send'
    );
    if (!sent.ok) {
      log.warn({ error: sent.error.message, timedOut: sent.error.timedOut }, 'Send failed, response held');
      return { kind: 'held', responseId: response.id, reason: 'send_failed', error: sent.error.message };
    }

    const sentAt = this.now();
    const recorded = await this.unitOfWork.run(async (repos) => {
      const marked = await repos.responses.markSent(response.id, sentAt, sent.value);
      if (!marked.ok) {
        return marked;
      }
      return repos.emails.transition(email.id, 'read', 'responded');
    });
    if (!recorded.ok) {
      log.error(
        { error: recorded.error.message, sentMessageId: sent.value },
        'Message sent but delivery was not recorded'
      );
      return {
        kind: 'held',
        responseId: response.id,
        reason: 'persist_failed',
        error: recorded.error.message,
      };
    }

    log.info({ sentMessageId: sent.value }, 'Response sent');
    return { kind: 'sent', responseId: response.id, sentMessageId: sent.value, alreadySent: false };
  }

  private async load(
    responseId: string
  ): Promise<Result<{ email: Email; response: EmailResponse }, DispatchError>> {
    const response = await this.repos.responses.findById(responseId);
    if (!response.ok) {
      return err(persistenceFailed(response.error));
    }
    if (!response.value) {
      return err({ code: DispatchErrorCode.NOT_FOUND, message: `Response not found: ${responseId}` });
    }

    const email = await this.repos.emails.findById(response.value.emailId);
    if (!email.ok) {
      return err(persistenceFailed(email.error));
    }
    if (!email.value) {
      return err({
        code: DispatchErrorCode.NOT_FOUND,
        message: `Email not found: ${response.value.emailId}`,
      });
    }
    return ok({ email: email.value, response: response.value });
  }
}

export function createDispatcherService(
  repos: Repositories,
  unitOfWork: IUnitOfWork,
  mailSink: MailSink,
  options: DispatchOptions
): DispatcherService {
  return new DispatcherService(repos, unitOfWork, mailSink, options);
}
