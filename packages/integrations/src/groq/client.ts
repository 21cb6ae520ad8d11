import Groq from 'groq-sdk';
import { z } from 'zod';
import {
  ok,
  err,
  type Result,
  withRetry,
  retryPresets,
  type CircuitBreaker,
  createCircuitBreaker,
  circuitBreakerPresets,
  isCircuitOpenError,
  createLogger,
} from '@mailpilot/utils';
import { parseStructuredOutput } from '../parsing/structured-output.js';
import {
  IntegrationErrorCode,
  type Classification,
  type GeneratedReply,
  type GenerationRequest,
  type IntegrationError,
  type StructuredOutput,
} from '../types.js';

const logger = createLogger({ service: 'groq-client' });

export interface CompletionRequest {
  prompt: string;
  system: string;
  maxTokens: number;
  temperature: number;
}

// Returns the assistant message text
export type CompletionFn = (request: CompletionRequest) => Promise<string>;

export interface GroqClientOptions {
  apiKey: string;
  // Using llama-3.3-70b-versatile for best quality, or llama-3.1-8b-instant for speed
  model?: string;
  temperature?: number;
  maxResponseWords?: number;
  complete?: CompletionFn;
  circuitBreaker?: CircuitBreaker;
}

// Classification output schema
const ClassificationOutputSchema = z.object({
  category: z.string().min(1),
  priority: z.enum(['low', 'medium', 'high', 'urgent']),
  confidence: z.number().min(0).max(1),
  keywords: z.array(z.string()).default([]),
  reasoning: z.string().optional(),
});

// Response output schema
const ReplyOutputSchema = z.object({
  response: z.string(),
  response_type: z.enum(['reply', 'new', 'none']),
  suggested_actions: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1).optional(),
});

export function createGroqCompletion(apiKey: string, model: string): CompletionFn {
  const client = new Groq({ apiKey });
  return async (request) => {
    const response = await client.chat.completions.create({
      model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('No content in response');
    }
    return content;
  };
}

export class GroqClient {
  readonly model: string;
  private readonly complete: CompletionFn;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly temperature: number;
  private readonly maxResponseWords: number;

  constructor(options: GroqClientOptions) {
    this.model = options.model ?? 'llama-3.3-70b-versatile';
    this.temperature = options.temperature ?? 0.7;
    this.maxResponseWords = options.maxResponseWords ?? 500;
    this.complete = options.complete ?? createGroqCompletion(options.apiKey, this.model);
    this.circuitBreaker =
      options.circuitBreaker ?? createCircuitBreaker('groq', circuitBreakerPresets.groq);
  }

  /**
   * Categorize a message. A reply that is not the expected JSON comes back as
   * `unparseable` rather than an error.
   */
  async classify(
    text: string,
    sender: string
  ): Promise<Result<StructuredOutput<Classification>, IntegrationError>> {
    const raw = await this.call({
      system: 'You are an email triage assistant. Respond with only valid JSON.',
      prompt: this.buildClassificationPrompt(text, sender),
      maxTokens: 500,
      temperature: 0.3,
    });
    if (!raw.ok) {
      return raw;
    }

    const parsed = parseStructuredOutput(raw.value, ClassificationOutputSchema);
    if (parsed.kind === 'unparseable') {
      logger.warn({ reason: parsed.reason }, 'Classification output unparseable');
      return ok(parsed);
    }

    return ok({
      kind: 'parsed',
      value: {
        category: parsed.value.category.toLowerCase(),
        priority: parsed.value.priority,
        confidence: parsed.value.confidence,
        keywords: parsed.value.keywords,
      },
    });
  }

  async generateResponse(
    request: GenerationRequest
  ): Promise<Result<StructuredOutput<GeneratedReply>, IntegrationError>> {
    const raw = await this.call({
      system: 'You are a professional email assistant. Respond with only valid JSON.',
      prompt: this.buildResponsePrompt(request),
      maxTokens: this.maxResponseWords * 2,
      temperature: this.temperature,
    });
    if (!raw.ok) {
      return raw;
    }

    const parsed = parseStructuredOutput(raw.value, ReplyOutputSchema);
    if (parsed.kind === 'unparseable') {
      logger.warn({ reason: parsed.reason }, 'Response output unparseable');
      return ok(parsed);
    }

    const reply: GeneratedReply = {
      responseText: parsed.value.response.trim(),
      responseType: parsed.value.response_type,
      suggestedActions: parsed.value.suggested_actions,
    };
    if (parsed.value.confidence !== undefined) {
      reply.confidence = parsed.value.confidence;
    }
    return ok({ kind: 'parsed', value: reply });
  }

  private async call(request: CompletionRequest): Promise<Result<string, IntegrationError>> {
    const cbResult = await this.circuitBreaker.execute(async () => {
      const result = await withRetry(() => this.complete(request), retryPresets.llm);

      if (!result.ok) {
        throw new Error(result.error.message);
      }

      return result.value;
    });

    if (!cbResult.ok) {
      const error = cbResult.error;
      if (isCircuitOpenError(error)) {
        return err({ code: IntegrationErrorCode.CIRCUIT_OPEN, message: error.message, retryable: true });
      }
      return err({ code: IntegrationErrorCode.LLM_ERROR, message: error.message, retryable: true });
    }

    return ok(cbResult.value);
  }

  private buildClassificationPrompt(text: string, sender: string): string {
    return `Analyze this email and categorize it.

Email from: ${sender}
Email content:
${text}

Categorize the email into one of these categories:
- business: Business inquiries, partnerships, work-related
- personal: Personal messages from friends or family
- support: Technical support requests, bug reports
- sales: Sales inquiries, product questions
- invoice: Invoices, billing, payment-related
- newsletter: Newsletters, marketing emails
- notification: Automated notifications and alerts
- no_reply: Messages from addresses that do not accept replies
- spam: Spam or unwanted emails
- urgent: Urgent matters requiring immediate attention
- other: Anything that doesn't fit above categories

Also assign a priority: low, medium, high or urgent.

Respond with ONLY valid JSON (no markdown, no explanation) matching this schema:
{
  "category": "category_name",
  "priority": "low|medium|high|urgent",
  "confidence": 0.0-1.0,
  "keywords": ["keyword1", "keyword2"],
  "reasoning": "Brief explanation of categorization"
}`;
  }

  private buildResponsePrompt(request: GenerationRequest): string {
    const context = request.context ? `${request.context}\n\n` : '';
    return `${context}Generate a professional email response for this email.

Original email from: ${request.sender}
Email category: ${request.category}
Priority: ${request.priority}

Original email content:
${request.text}

Guidelines:
- Be professional and helpful
- Address the main points
- Keep it concise (max ${this.maxResponseWords} words)
- Include relevant information from the context above if applicable
- For spam and newsletters, response_type should be "none"
- Generate only the response body, no subject line

Respond with ONLY valid JSON (no markdown, no explanation) matching this schema:
{
  "response": "The email response text",
  "response_type": "reply|new|none",
  "suggested_actions": ["action1", "action2"],
  "confidence": 0.0-1.0
}`;
  }
}
