/**
 * OpenAIEmbeddingProvider Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { OpenAIEmbeddingProvider } from '../../src/embedding/openai-provider.js';
import { ConfigurationError, InputError, ServiceUnavailableError } from '../../src/errors.js';

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createProvider(respond: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => respond());
  const provider = new OpenAIEmbeddingProvider({
    apiKey: 'test-secret',
    baseUrl: 'https://embeddings.test/v1/',
    model: 'text-embedding-3-small',
    dimensions: 2,
    fetch: fetchMock,
  });
  return { provider, fetchMock };
}

describe('OpenAIEmbeddingProvider', () => {
  it('should require an API key', () => {
    expect(
      () => new OpenAIEmbeddingProvider({ baseUrl: 'https://embeddings.test/v1', model: 'm' })
    ).toThrow(ConfigurationError);
  });

  it('should post the batch to the embeddings endpoint', async () => {
    const { provider, fetchMock } = createProvider(() =>
      jsonResponse({ data: [{ index: 0, embedding: [1, 0] }] })
    );

    await provider.embed(['Rent is due.']);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://embeddings.test/v1/embeddings');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'text-embedding-3-small',
      input: ['Rent is due.'],
      dimensions: 2,
    });
  });

  it('should order vectors by their input index', async () => {
    const { provider } = createProvider(() =>
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      })
    );

    await expect(provider.embed(['first', 'second'])).resolves.toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('should not call the service for an empty batch', async () => {
    const { provider, fetchMock } = createProvider(() => jsonResponse({ data: [] }));

    await expect(provider.embed([])).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should map authentication failures to configuration errors', async () => {
    const { provider } = createProvider(
      () => new Response('invalid key', { status: 401, statusText: 'Unauthorized' })
    );

    const promise = provider.embed(['text']);

    await expect(promise).rejects.toBeInstanceOf(ConfigurationError);
    await expect(promise).rejects.toThrow('Embedding failed: 401 Unauthorized - invalid key');
  });

  it('should map rate limits and server errors to service unavailable', async () => {
    for (const status of [429, 503]) {
      const { provider } = createProvider(() => new Response('busy', { status }));
      await expect(provider.embed(['text'])).rejects.toBeInstanceOf(ServiceUnavailableError);
    }
  });

  it('should map other client errors to input errors', async () => {
    const { provider } = createProvider(
      () => new Response('too long', { status: 400, statusText: 'Bad Request' })
    );

    await expect(provider.embed(['text'])).rejects.toBeInstanceOf(InputError);
  });

  it('should map network failures to service unavailable', async () => {
    const { provider } = createProvider(() => {
      throw new TypeError('fetch failed');
    });

    await expect(provider.embed(['text'])).rejects.toThrow(
      new ServiceUnavailableError('Embedding request failed: fetch failed')
    );
  });

  it('should reject a malformed response body', async () => {
    const { provider } = createProvider(() => jsonResponse({ vectors: [] }));

    const promise = provider.embed(['text']);

    await expect(promise).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(promise).rejects.toThrow(/^Invalid embedding response shape/);
  });

  it('should treat a non-JSON success body as a transient failure', async () => {
    const { provider } = createProvider(
      () => new Response('<html>Bad gateway</html>', { status: 200, statusText: 'OK' })
    );

    const promise = provider.embed(['text']);

    await expect(promise).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(promise).rejects.toThrow(/^Embedding response is not valid JSON: /);
  });

  it('should reject a response that skips an input', async () => {
    const { provider } = createProvider(() =>
      jsonResponse({ data: [{ index: 0, embedding: [1, 0] }] })
    );

    await expect(provider.embed(['first', 'second'])).rejects.toThrow(
      'Embedding response is missing input 1'
    );
  });
});
