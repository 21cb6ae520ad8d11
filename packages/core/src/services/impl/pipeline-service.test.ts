import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ok, err } from '@mailpilot/utils';
import { createInMemoryDatabase, type InMemoryDatabase } from '../../test/in-memory-repositories.js';
import {
  LONG_REPLY,
  classification,
  createFakeGenerator,
  createFakeMailSink,
  createFakeMailSource,
  createFakeRetriever,
  inboundMessage,
  parsed,
  reply,
  unparseable,
  type FakeGenerator,
  type FakeMailSink,
  type FakeMailSource,
  type FakeRetriever,
} from '../../test/fakes.js';
import { DispatcherService } from './dispatcher-service.js';
import { FALLBACK_RESPONSE_TEXT, PipelineService } from './pipeline-service.js';
import type { PipelineOptions } from '../pipeline.js';

const NOW = new Date('2026-03-01T09:30:00Z');

describe('PipelineService', () => {
  let db: InMemoryDatabase;
  let generator: FakeGenerator;
  let retriever: FakeRetriever;
  let source: FakeMailSource;
  let sink: FakeMailSink;

  const createPipeline = (overrides: Partial<PipelineOptions> = {}) => {
    const dispatcher = new DispatcherService(db.repos, db.unitOfWork, sink, {
      autoSendThreshold: 0.8,
      autoSendEnabled: true,
      sendTimeoutMs: 1000,
      now: () => NOW,
    });
    return new PipelineService(
      {
        repos: db.repos,
        unitOfWork: db.unitOfWork,
        generator,
        knowledge: retriever,
        dispatcher,
        mailSource: source,
      },
      {
        autoRespondEnabled: true,
        searchTopK: 3,
        fallbackConfidence: 0.5,
        classifyTimeoutMs: 1000,
        generateTimeoutMs: 1000,
        sourceTimeoutMs: 1000,
        now: () => NOW,
        ...overrides,
      }
    );
  };

  const load = async (externalId: string) => {
    const found = await db.repos.emails.findByExternalId(externalId);
    if (!found.ok || !found.value) throw new Error(`email ${externalId} not stored`);
    return found.value;
  };

  const responsesFor = async (emailId: string) => {
    const found = await db.repos.responses.findByEmailId(emailId);
    return found.ok ? found.value : [];
  };

  beforeEach(() => {
    db = createInMemoryDatabase();
    generator = createFakeGenerator();
    retriever = createFakeRetriever();
    source = createFakeMailSource();
    sink = createFakeMailSink();
  });

  describe('process', () => {
    it('classifies, answers and sends a confident reply', async () => {
      const message = inboundMessage();
      retriever.formatContext.mockReturnValue("Relevant information:\n\nFrom 'Refunds':\nFive days.\n\n");

      const result = await createPipeline().process(message);

      const email = await load(message.externalId);
      const [response] = await responsesFor(email.id);
      expect(result).toEqual({
        ok: true,
        value: {
          status: 'responded',
          emailId: email.id,
          externalId: message.externalId,
          responseId: response?.id,
          dispatch: {
            kind: 'sent',
            responseId: response?.id,
            sentMessageId: 'sent-1',
            alreadySent: false,
          },
        },
      });
      expect(email).toMatchObject({
        status: 'responded',
        category: 'support',
        priority: 'high',
        requiresResponse: true,
        classificationConfidence: 0.9,
        processedAt: NOW,
        failureReason: null,
      });
      expect(response).toMatchObject({
        responseText: LONG_REPLY,
        confidenceScore: 0.8,
        modelUsed: 'test-model',
        responseType: 'reply',
        isSent: true,
      });
    });

    it('passes the message and its grounding context to the generator', async () => {
      const message = inboundMessage();
      retriever.formatContext.mockReturnValue('context block');

      await createPipeline().process(message);

      expect(generator.classify).toHaveBeenCalledWith(
        'Subject: Refund request\n\nWhere is my refund?',
        'customer@example.com'
      );
      expect(retriever.searchRelevant).toHaveBeenCalledWith('Refund request Where is my refund?', 3);
      expect(generator.generateResponse).toHaveBeenCalledWith({
        text: 'Subject: Refund request\n\nWhere is my refund?',
        sender: 'customer@example.com',
        category: 'support',
        priority: 'high',
        context: 'context block',
      });
      expect(source.markConsumed).toHaveBeenCalledWith(message.externalId);
    });

    it('keeps a low-confidence reply for review', async () => {
      const message = inboundMessage();
      generator.generateResponse.mockResolvedValueOnce(ok(parsed(reply({ responseText: 'Will check.' }))));

      const result = await createPipeline().process(message);

      expect(result.ok && result.value).toMatchObject({
        status: 'read',
        dispatch: { kind: 'held', reason: 'low_confidence' },
      });
      const email = await load(message.externalId);
      expect(email.status).toBe('read');
      const [response] = await responsesFor(email.id);
      expect(response).toMatchObject({ confidenceScore: 0.5, isSent: false });
      expect(sink.send).not.toHaveBeenCalled();
    });

    it('lets a lower provider confidence win over the length heuristic', async () => {
      const message = inboundMessage();
      generator.generateResponse.mockResolvedValueOnce(ok(parsed(reply({ confidence: 0.6 }))));

      await createPipeline().process(message);

      const [response] = await responsesFor((await load(message.externalId)).id);
      expect(response?.confidenceScore).toBe(0.6);
    });

    it('skips a message that was already recorded', async () => {
      const message = inboundMessage();
      const pipeline = createPipeline();
      await pipeline.process(message);

      const second = await pipeline.process(message);

      expect(second).toEqual({ ok: true, value: { status: 'skipped', externalId: message.externalId } });
      expect(generator.classify).toHaveBeenCalledTimes(1);
      expect(source.markConsumed).toHaveBeenCalledTimes(2);
    });

    it('marks a skipped message read again when the earlier mark failed', async () => {
      const message = inboundMessage();
      source.markConsumed.mockResolvedValueOnce(
        err({ code: 'UPDATE_ERROR', message: 'throttled', retryable: true })
      );
      const pipeline = createPipeline();
      await pipeline.process(message);
      const stored = await load(message.externalId);

      const second = await pipeline.process(message);

      expect(second).toEqual({ ok: true, value: { status: 'skipped', externalId: message.externalId } });
      expect(source.markConsumed).toHaveBeenCalledTimes(2);
      expect(source.markConsumed).toHaveBeenLastCalledWith(message.externalId);
      expect(generator.classify).toHaveBeenCalledTimes(1);
      expect(generator.generateResponse).toHaveBeenCalledTimes(1);
      expect(await load(message.externalId)).toEqual(stored);
      expect(await responsesFor(stored.id)).toHaveLength(1);
    });

    it('still skips when marking the message read fails again', async () => {
      const message = inboundMessage();
      const pipeline = createPipeline();
      await pipeline.process(message);
      source.markConsumed.mockResolvedValueOnce(
        err({ code: 'UPDATE_ERROR', message: 'throttled', retryable: true })
      );

      const second = await pipeline.process(message);

      expect(second).toEqual({ ok: true, value: { status: 'skipped', externalId: message.externalId } });
    });

    it('skips when another worker records the message first', async () => {
      const message = inboundMessage();
      await db.repos.emails.create({ ...message, status: 'processing' });
      vi.spyOn(db.repos.emails, 'findByExternalId').mockResolvedValueOnce(ok(null));

      const result = await createPipeline().process(message);

      expect(result).toEqual({ ok: true, value: { status: 'skipped', externalId: message.externalId } });
      expect(generator.classify).not.toHaveBeenCalled();
      expect(source.markConsumed).toHaveBeenCalledWith(message.externalId);
    });

    it('records a classification failure and carries on', async () => {
      const message = inboundMessage();
      generator.classify.mockResolvedValueOnce(
        err({ code: 'LLM_ERROR', message: 'model down', retryable: true })
      );

      const result = await createPipeline().process(message);

      const email = await load(message.externalId);
      expect(result).toEqual({
        ok: true,
        value: {
          status: 'failed',
          emailId: email.id,
          externalId: message.externalId,
          reason: 'Classification failed: model down',
        },
      });
      expect(email).toMatchObject({
        status: 'failed',
        failureReason: 'Classification failed: model down',
        processedAt: NOW,
      });
      expect(await responsesFor(email.id)).toEqual([]);
      expect(source.markConsumed).toHaveBeenCalledWith(message.externalId);
    });

    it('falls back to default classification when the output is unparseable', async () => {
      const message = inboundMessage();
      generator.classify.mockResolvedValueOnce(ok(unparseable('I think this is support')));

      await createPipeline().process(message);

      const email = await load(message.externalId);
      expect(email).toMatchObject({ category: 'other', priority: 'medium', classificationConfidence: 0.5 });
      expect(generator.generateResponse).toHaveBeenCalledWith(
        expect.objectContaining({ category: 'other', priority: 'medium' })
      );
    });

    it('marks categories that never get replies as read without generating', async () => {
      const message = inboundMessage();
      generator.classify.mockResolvedValueOnce(ok(parsed(classification({ category: 'newsletter', priority: 'low' }))));

      const result = await createPipeline().process(message);

      const email = await load(message.externalId);
      expect(result).toEqual({
        ok: true,
        value: {
          status: 'read',
          emailId: email.id,
          externalId: message.externalId,
          responseId: null,
          dispatch: null,
        },
      });
      expect(email).toMatchObject({ status: 'read', requiresResponse: false, category: 'newsletter' });
      expect(generator.generateResponse).not.toHaveBeenCalled();
    });

    it('only classifies when auto-respond is off', async () => {
      const message = inboundMessage();

      const result = await createPipeline({ autoRespondEnabled: false }).process(message);

      expect(result.ok && result.value.status).toBe('read');
      expect(generator.generateResponse).not.toHaveBeenCalled();
      expect((await load(message.externalId)).requiresResponse).toBe(false);
    });

    it('stores the fallback reply when the generated output is unparseable', async () => {
      const message = inboundMessage();
      generator.generateResponse.mockResolvedValueOnce(ok(unparseable('Sure thing!')));

      const result = await createPipeline().process(message);

      expect(result.ok && result.value.status).toBe('read');
      const [response] = await responsesFor((await load(message.externalId)).id);
      expect(response).toMatchObject({
        responseText: FALLBACK_RESPONSE_TEXT,
        confidenceScore: 0.5,
        responseType: 'reply',
        isSent: false,
      });
    });

    it('stores nothing when the model declines to reply', async () => {
      const message = inboundMessage();
      generator.generateResponse.mockResolvedValueOnce(
        ok(parsed(reply({ responseType: 'none', responseText: '' })))
      );

      const result = await createPipeline().process(message);

      const email = await load(message.externalId);
      expect(result.ok && result.value).toMatchObject({ status: 'read', responseId: null });
      expect(email).toMatchObject({ status: 'read', requiresResponse: false });
      expect(await responsesFor(email.id)).toEqual([]);
    });

    it('keeps the classification when generation fails', async () => {
      const message = inboundMessage();
      generator.generateResponse.mockResolvedValueOnce(
        err({ code: 'LLM_ERROR', message: 'rate limited', retryable: true })
      );

      const result = await createPipeline().process(message);

      expect(result.ok && result.value).toMatchObject({
        status: 'failed',
        reason: 'Generation failed: rate limited',
      });
      expect(await load(message.externalId)).toMatchObject({
        status: 'failed',
        category: 'support',
        priority: 'high',
      });
    });

    it('marks the record failed when the response cannot be stored', async () => {
      const message = inboundMessage();
      vi.spyOn(db.repos.responses, 'create').mockResolvedValueOnce(
        err({ code: 'QUERY_FAILED', message: 'disk full' })
      );

      const result = await createPipeline().process(message);

      const email = await load(message.externalId);
      expect(result).toEqual({
        ok: false,
        error: {
          code: 'PERSISTENCE_FAILED',
          message: 'disk full',
          details: { repositoryCode: 'QUERY_FAILED', emailId: email.id },
        },
      });
      expect(email).toMatchObject({ status: 'failed', failureReason: 'Could not store response: disk full' });
      expect(await responsesFor(email.id)).toEqual([]);
    });

    it('still reports the outcome when the source cannot mark the message read', async () => {
      const message = inboundMessage();
      source.markConsumed.mockResolvedValueOnce(
        err({ code: 'UPDATE_ERROR', message: 'forbidden', retryable: false })
      );

      const result = await createPipeline().process(message);

      expect(result.ok && result.value.status).toBe('responded');
    });
  });

  describe('regenerate', () => {
    it('answers a previously failed message and clears the failure', async () => {
      const message = inboundMessage();
      generator.classify.mockResolvedValueOnce(
        err({ code: 'LLM_ERROR', message: 'model down', retryable: true })
      );
      const pipeline = createPipeline();
      await pipeline.process(message);
      const failed = await load(message.externalId);

      const result = await pipeline.regenerate(failed.id);

      expect(result.ok && result.value.status).toBe('responded');
      expect(await load(message.externalId)).toMatchObject({ status: 'responded', failureReason: null });
      expect(source.markConsumed).toHaveBeenCalledTimes(1);
    });

    it('adds another response to a read message', async () => {
      const message = inboundMessage();
      generator.generateResponse.mockResolvedValueOnce(ok(parsed(reply({ responseText: 'Will check.' }))));
      const pipeline = createPipeline();
      await pipeline.process(message);
      const email = await load(message.externalId);

      await pipeline.regenerate(email.id);

      expect(await responsesFor(email.id)).toHaveLength(2);
    });

    it('refuses to regenerate a message that was already answered', async () => {
      const message = inboundMessage();
      const pipeline = createPipeline();
      await pipeline.process(message);
      const email = await load(message.externalId);

      const result = await pipeline.regenerate(email.id);

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'INVALID_TRANSITION',
          message: 'Cannot move email from responded to processing',
          details: { from: 'responded', to: 'processing' },
        },
      });
    });

    it('returns NOT_FOUND for an unknown email', async () => {
      const result = await createPipeline().regenerate('missing');
      expect(result).toEqual({
        ok: false,
        error: { code: 'NOT_FOUND', message: 'Email not found: missing' },
      });
    });
  });
});
