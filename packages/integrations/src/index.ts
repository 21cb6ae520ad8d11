// Shared types
export * from './types.js';

// Strict parsing of model output
export { parseStructuredOutput } from './parsing/structured-output.js';

// Outlook (Microsoft Graph) mail
export {
  OutlookClient,
  createGraphTransport,
  mapGraphMessage,
  stripHtml,
  type GraphTransport,
  type GraphMessage,
  type OutlookClientOptions,
  type OutlookCredentials,
} from './outlook/client.js';

// Groq text generation
export {
  GroqClient,
  createGroqCompletion,
  type CompletionFn,
  type CompletionRequest,
  type GroqClientOptions,
} from './groq/client.js';

// OpenAI embeddings
export {
  OpenAIEmbedder,
  createOpenAIEmbed,
  type EmbedFn,
  type OpenAIEmbedderOptions,
} from './openai/embedder.js';
