import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';

import { createOpenAIClient } from '../openai.js';
import type { FetchLike } from '../openai.js';
import { LLMError, ResponseParseError } from '../../core/errors.js';

function reply(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

function bodyOf(fetchImpl: Mock<FetchLike>): unknown {
  const init = fetchImpl.mock.calls[0]?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('createOpenAIClient', () => {
  it('posts a chat completion and returns the message text', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => reply('[]'));
    const client = createOpenAIClient('test-key', 'gpt-test', fetchImpl);

    await expect(client.generate('system', 'user')).resolves.toBe('[]');

    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(fetchImpl.mock.calls[0]?.[1].headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
    expect(bodyOf(fetchImpl)).toEqual({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'system' },
        { role: 'user', content: 'user' },
      ],
      temperature: 0,
    });
  });

  it('sends the image as a data URI ahead of the text', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => reply('[]'));
    const client = createOpenAIClient('test-key', undefined, fetchImpl);

    await client.generateWithImage('system', 'look', 'aGVsbG8=', 'image/png');

    expect(bodyOf(fetchImpl)).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'system' },
        {
          role: 'user',
          content: [
            { type: 'image_url', image_url: { url: 'data:image/png;base64,aGVsbG8=' } },
            { type: 'text', text: 'look' },
          ],
        },
      ],
      temperature: 0,
    });
  });

  it.each([408, 429, 500, 503])('treats status %i as transient', async (status) => {
    const client = createOpenAIClient(
      'test-key',
      undefined,
      async () => new Response('busy', { status }),
    );

    const error: unknown = await client.generate('s', 'u').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(LLMError);
    expect(error instanceof LLMError ? [error.kind, error.status, error.message] : []).toEqual([
      'transient',
      status,
      `OpenAI API error (${String(status)}): busy`,
    ]);
  });

  it('treats other error statuses as permanent', async () => {
    const client = createOpenAIClient(
      'test-key',
      undefined,
      async () => new Response('bad key', { status: 401 }),
    );

    await expect(client.generate('s', 'u')).rejects.toMatchObject({
      kind: 'permanent',
      status: 401,
    });
  });

  it('treats a connection failure as transient', async () => {
    const client = createOpenAIClient('test-key', undefined, async () => {
      throw new TypeError('fetch failed');
    });

    await expect(client.generate('s', 'u')).rejects.toMatchObject({
      kind: 'transient',
      message: 'OpenAI API connection failed: fetch failed',
    });
  });

  it('raises a parse error for a body without message content', async () => {
    const client = createOpenAIClient(
      'test-key',
      undefined,
      async () => new Response('{"choices": []}', { status: 200 }),
    );

    await expect(client.generate('s', 'u')).rejects.toThrow(ResponseParseError);
  });
});
