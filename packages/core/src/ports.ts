import type { Result } from '@mailpilot/utils';
import type {
  Classification,
  GeneratedReply,
  GenerationRequest,
  InboundMessage,
  IntegrationError,
  OutgoingMessage,
  StructuredOutput,
} from '@mailpilot/integrations';

// Collaborators the core talks to. The integration clients satisfy these structurally.

export interface Embedder {
  readonly dimension: number;
  embed(text: string): Promise<Result<number[], IntegrationError>>;
}

export interface TextGenerator {
  readonly model: string;
  classify(
    text: string,
    sender: string
  ): Promise<Result<StructuredOutput<Classification>, IntegrationError>>;
  generateResponse(
    request: GenerationRequest
  ): Promise<Result<StructuredOutput<GeneratedReply>, IntegrationError>>;
}

export interface MailSource {
  fetchNew(maxCount: number): Promise<Result<InboundMessage[], IntegrationError>>;
  markConsumed(externalId: string): Promise<Result<void, IntegrationError>>;
}

export interface MailSink {
  // Resolves to the provider's id for the sent message
  send(message: OutgoingMessage): Promise<Result<string, IntegrationError>>;
  saveDraft(message: OutgoingMessage): Promise<Result<string, IntegrationError>>;
}
