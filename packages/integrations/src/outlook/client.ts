import { Client } from '@microsoft/microsoft-graph-client';
import { ClientSecretCredential } from '@azure/identity';
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
import {
  IntegrationErrorCode,
  type InboundMessage,
  type IntegrationError,
  type OutgoingMessage,
} from '../types.js';

const logger = createLogger({ service: 'outlook-client' });

/**
 * The slice of Microsoft Graph the mail client needs. Bodies come back
 * untyped and are validated before use.
 */
export interface GraphTransport {
  get(path: string, query?: Record<string, string | number>): Promise<unknown>;
  post(path: string, body?: unknown): Promise<unknown>;
  patch(path: string, body: unknown): Promise<unknown>;
}

export interface OutlookCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface OutlookClientOptions {
  userId?: string;
  // Graph $filter used to select new inbox messages
  mailQuery?: string;
  credentials?: OutlookCredentials;
  transport?: GraphTransport;
  circuitBreaker?: CircuitBreaker;
}

const MESSAGE_FIELDS =
  'id,conversationId,subject,from,toRecipients,receivedDateTime,body,categories';

const emailAddressSchema = z.object({
  emailAddress: z.object({
    address: z.string().default(''),
    name: z.string().nullish(),
  }),
});

// Raw email from Graph API
const graphMessageSchema = z.object({
  id: z.string(),
  conversationId: z.string().nullish(),
  subject: z.string().nullish(),
  from: emailAddressSchema.nullish(),
  toRecipients: z.array(emailAddressSchema).default([]),
  receivedDateTime: z.string(),
  body: z
    .object({
      contentType: z.string(),
      content: z.string(),
    })
    .nullish(),
  categories: z.array(z.string()).default([]),
});
export type GraphMessage = z.infer<typeof graphMessageSchema>;

const messagePageSchema = z.object({ value: z.array(graphMessageSchema) });
const createdItemSchema = z.object({ id: z.string() });

export function createGraphTransport(credentials: OutlookCredentials): GraphTransport {
  const credential = new ClientSecretCredential(
    credentials.tenantId,
    credentials.clientId,
    credentials.clientSecret
  );

  const client = Client.initWithMiddleware({
    authProvider: {
      getAccessToken: async () => {
        const token = await credential.getToken('https://graph.microsoft.com/.default');
        return token.token;
      },
    },
  });

  return {
    get: async (path, query) => {
      const request = client.api(path);
      return query ? request.query(query).get() : request.get();
    },
    post: async (path, body) => client.api(path).post(body ?? {}),
    patch: async (path, body) => client.api(path).patch(body),
  };
}

export function stripHtml(html: string): string {
  return html
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/[ \t]+/g, ' ')
    .trim();
}

export function mapGraphMessage(msg: GraphMessage): InboundMessage {
  const body = msg.body;
  return {
    externalId: msg.id,
    threadId: msg.conversationId ?? null,
    subject: msg.subject ?? '',
    sender: msg.from?.emailAddress.address ?? '',
    recipient: msg.toRecipients[0]?.emailAddress.address ?? '',
    body: !body ? '' : body.contentType.toLowerCase() === 'html' ? stripHtml(body.content) : body.content,
    receivedAt: new Date(msg.receivedDateTime),
    labels: msg.categories,
  };
}

/**
 * Mailbox access over Microsoft Graph: inbox polling, read flags, replies
 * and drafts. Sending goes through a draft so the sent message id is known.
 */
export class OutlookClient {
  private readonly transport: GraphTransport;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly userId: string;
  private readonly mailQuery: string;

  constructor(options: OutlookClientOptions) {
    const transport =
      options.transport ?? (options.credentials ? createGraphTransport(options.credentials) : undefined);
    if (!transport) {
      throw new Error('OutlookClient needs either credentials or a transport');
    }
    this.transport = transport;
    this.userId = options.userId ?? 'me';
    this.mailQuery = options.mailQuery ?? 'isRead eq false';
    this.circuitBreaker =
      options.circuitBreaker ?? createCircuitBreaker('outlook', circuitBreakerPresets.outlook);
  }

  private get base(): string {
    return this.userId === 'me' ? '/me' : `/users/${this.userId}`;
  }

  /**
   * Oldest unread inbox messages first, at most `maxCount`.
   */
  async fetchNew(maxCount: number): Promise<Result<InboundMessage[], IntegrationError>> {
    const raw = await this.execute(IntegrationErrorCode.FETCH_ERROR, () =>
      this.transport.get(`${this.base}/mailFolders/inbox/messages`, {
        $filter: this.mailQuery,
        $top: maxCount,
        $orderby: 'receivedDateTime asc',
        $select: MESSAGE_FIELDS,
      })
    );
    if (!raw.ok) {
      return raw;
    }

    const page = messagePageSchema.safeParse(raw.value);
    if (!page.success) {
      logger.warn({ issues: page.error.issues.length }, 'Unexpected message page shape');
      return err({
        code: IntegrationErrorCode.INVALID_RESPONSE,
        message: 'Graph returned an unexpected message page',
        retryable: false,
      });
    }

    return ok(page.data.value.slice(0, maxCount).map(mapGraphMessage));
  }

  async markConsumed(externalId: string): Promise<Result<void, IntegrationError>> {
    const result = await this.execute(IntegrationErrorCode.UPDATE_ERROR, () =>
      this.transport.patch(`${this.base}/messages/${externalId}`, { isRead: true })
    );
    return result.ok ? ok(undefined) : result;
  }

  /**
   * Send a message and return the id of the sent item.
   */
  async send(message: OutgoingMessage): Promise<Result<string, IntegrationError>> {
    const draft = await this.createDraft(message, IntegrationErrorCode.SEND_ERROR);
    if (!draft.ok) {
      return draft;
    }

    const sent = await this.execute(IntegrationErrorCode.SEND_ERROR, () =>
      this.transport.post(`${this.base}/messages/${draft.value}/send`)
    );
    if (!sent.ok) {
      return sent;
    }

    logger.info({ externalId: message.replyToExternalId, sentId: draft.value }, 'Message sent');
    return ok(draft.value);
  }

  async saveDraft(message: OutgoingMessage): Promise<Result<string, IntegrationError>> {
    return this.createDraft(message, IntegrationErrorCode.DRAFT_ERROR);
  }

  private async createDraft(
    message: OutgoingMessage,
    code: IntegrationErrorCode
  ): Promise<Result<string, IntegrationError>> {
    const content = {
      subject: message.subject,
      body: { contentType: 'Text', content: message.body },
      toRecipients: [{ emailAddress: { address: message.to } }],
    };

    const replyTo = message.replyToExternalId;
    const raw = await this.execute(code, () =>
      replyTo
        ? this.transport.post(`${this.base}/messages/${replyTo}/createReply`, { message: content })
        : this.transport.post(`${this.base}/messages`, content)
    );
    if (!raw.ok) {
      return raw;
    }

    const created = createdItemSchema.safeParse(raw.value);
    if (!created.success) {
      return err({
        code: IntegrationErrorCode.INVALID_RESPONSE,
        message: 'Graph did not return a draft id',
        retryable: false,
      });
    }
    return ok(created.data.id);
  }

  private async execute(
    code: IntegrationErrorCode,
    fn: () => Promise<unknown>
  ): Promise<Result<unknown, IntegrationError>> {
    const cbResult = await this.circuitBreaker.execute(async () => {
      const result = await withRetry(fn, retryPresets.mail);

      if (!result.ok) {
        throw new Error(result.error.message);
      }

      return result.value;
    });

    if (!cbResult.ok) {
      const error = cbResult.error;
      return err({
        code: isCircuitOpenError(error) ? IntegrationErrorCode.CIRCUIT_OPEN : code,
        message: error.message,
        retryable: true,
      });
    }

    return ok(cbResult.value);
  }
}
