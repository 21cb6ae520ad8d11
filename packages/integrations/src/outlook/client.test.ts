import { describe, it, expect, vi, type Mock } from 'vitest';
import { OutlookClient, mapGraphMessage, stripHtml, type GraphTransport } from './client.js';

interface TransportMock {
  get: Mock<GraphTransport['get']>;
  post: Mock<GraphTransport['post']>;
  patch: Mock<GraphTransport['patch']>;
}

function createTransport(overrides: Partial<TransportMock> = {}): TransportMock {
  return {
    get: vi.fn<GraphTransport['get']>().mockResolvedValue({ value: [] }),
    post: vi.fn<GraphTransport['post']>().mockResolvedValue({ id: 'draft-1' }),
    patch: vi.fn<GraphTransport['patch']>().mockResolvedValue({}),
    ...overrides,
  };
}

const graphMessage = {
  id: 'AAMk-1',
  conversationId: 'conv-1',
  subject: 'Opening hours',
  from: { emailAddress: { address: 'alice@example.com', name: 'Alice' } },
  toRecipients: [{ emailAddress: { address: 'inbox@example.com' } }],
  receivedDateTime: '2026-03-01T09:30:00Z',
  body: { contentType: 'text', content: 'When do you open?' },
  categories: ['Customers'],
};

describe('stripHtml', () => {
  it('drops tags, styles and entities', () => {
    const html = '<style>p{}</style><p>Hello&nbsp;there</p><br/>Bye';
    expect(stripHtml(html)).toBe('Hello there \nBye');
  });
});

describe('mapGraphMessage', () => {
  it('maps Graph fields onto an inbound message', () => {
    expect(mapGraphMessage(graphMessage)).toEqual({
      externalId: 'AAMk-1',
      threadId: 'conv-1',
      subject: 'Opening hours',
      sender: 'alice@example.com',
      recipient: 'inbox@example.com',
      body: 'When do you open?',
      receivedAt: new Date('2026-03-01T09:30:00Z'),
      labels: ['Customers'],
    });
  });

  it('fills missing optional fields with empty values', () => {
    const mapped = mapGraphMessage({
      id: 'AAMk-2',
      receivedDateTime: '2026-03-01T10:00:00Z',
      toRecipients: [],
      categories: [],
    });

    expect(mapped).toMatchObject({ threadId: null, subject: '', sender: '', recipient: '', body: '' });
  });
});

describe('OutlookClient', () => {
  it('requires credentials or a transport', () => {
    expect(() => new OutlookClient({})).toThrow('OutlookClient needs either credentials or a transport');
  });

  it('fetches unread inbox messages oldest first', async () => {
    const transport = createTransport({
      get: vi.fn<GraphTransport['get']>().mockResolvedValue({ value: [graphMessage] }),
    });
    const client = new OutlookClient({ transport, userId: 'inbox@example.com' });

    const result = await client.fetchNew(10);

    expect(result.ok && result.value.map((m) => m.externalId)).toEqual(['AAMk-1']);
    expect(transport.get).toHaveBeenCalledWith('/users/inbox@example.com/mailFolders/inbox/messages', {
      $filter: 'isRead eq false',
      $top: 10,
      $orderby: 'receivedDateTime asc',
      $select: 'id,conversationId,subject,from,toRecipients,receivedDateTime,body,categories',
    });
  });

  it('reports an unexpected page shape as INVALID_RESPONSE', async () => {
    const transport = createTransport({
      get: vi.fn<GraphTransport['get']>().mockResolvedValue({ items: [] }),
    });
    const client = new OutlookClient({ transport });

    const result = await client.fetchNew(5);

    expect(!result.ok && result.error.code).toBe('INVALID_RESPONSE');
  });

  it('maps a transport failure to FETCH_ERROR', async () => {
    const transport = createTransport({
      get: vi.fn<GraphTransport['get']>().mockRejectedValue(new Error('forbidden')),
    });
    const client = new OutlookClient({ transport });

    const result = await client.fetchNew(5);

    expect(!result.ok && result.error.code).toBe('FETCH_ERROR');
  });

  it('marks a message as read', async () => {
    const transport = createTransport();
    const client = new OutlookClient({ transport });

    const result = await client.markConsumed('AAMk-1');

    expect(result).toEqual({ ok: true, value: undefined });
    expect(transport.patch).toHaveBeenCalledWith('/me/messages/AAMk-1', { isRead: true });
  });

  it('sends a reply through a draft and returns its id', async () => {
    const transport = createTransport();
    const client = new OutlookClient({ transport });

    const result = await client.send({
      to: 'alice@example.com',
      subject: 'Re: Opening hours',
      body: 'We open at 9.',
      replyToExternalId: 'AAMk-1',
    });

    expect(result).toEqual({ ok: true, value: 'draft-1' });
    expect(transport.post).toHaveBeenNthCalledWith(1, '/me/messages/AAMk-1/createReply', {
      message: {
        subject: 'Re: Opening hours',
        body: { contentType: 'Text', content: 'We open at 9.' },
        toRecipients: [{ emailAddress: { address: 'alice@example.com' } }],
      },
    });
    expect(transport.post).toHaveBeenNthCalledWith(2, '/me/messages/draft-1/send');
  });

  it('saves a new draft without sending it', async () => {
    const transport = createTransport();
    const client = new OutlookClient({ transport });

    const result = await client.saveDraft({ to: 'bob@example.com', subject: 'Hello', body: 'Hi' });

    expect(result).toEqual({ ok: true, value: 'draft-1' });
    expect(transport.post).toHaveBeenCalledTimes(1);
    expect(transport.post.mock.calls[0]?.[0]).toBe('/me/messages');
  });

  it('reports a send failure as SEND_ERROR', async () => {
    const post = vi
      .fn<GraphTransport['post']>()
      .mockResolvedValueOnce({ id: 'draft-9' })
      .mockRejectedValueOnce(new Error('mailbox full'));
    const client = new OutlookClient({ transport: createTransport({ post }) });

    const result = await client.send({ to: 'a@example.com', subject: 's', body: 'b' });

    expect(!result.ok && result.error.code).toBe('SEND_ERROR');
  });
});
