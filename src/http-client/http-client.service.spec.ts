import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { Agent, fetch } from 'undici';

import { HttpClientService, HttpTimeoutError } from './http-client.service';

const mockClose = jest.fn().mockResolvedValue(undefined);

jest.mock('undici', () => ({
  fetch: jest.fn(),
  Agent: jest.fn().mockImplementation(() => ({
    close: mockClose,
  })),
}));

const mockedFetch = fetch as unknown as jest.Mock;
const MockedAgent = Agent as unknown as jest.Mock;

const jsonResponse = (status: number, body: unknown) => ({
  ok: status >= 200 && status < 300,
  status,
  headers: {
    get: (name: string) => (name === 'content-type' ? 'application/json; charset=utf-8' : null),
  },
  text: async () => JSON.stringify(body),
});

describe('HttpClientService', () => {
  let service: HttpClientService;

  beforeEach(async () => {
    mockedFetch.mockReset();
    mockClose.mockClear();
    MockedAgent.mockClear();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HttpClientService,
        {
          provide: ConfigService,
          useValue: {
            get: (key: string) => {
              switch (key) {
                case 'HTTP_CLIENT_TIMEOUT':
                  return 5000;
                case 'HTTP_CLIENT_CONNECTIONS':
                  return '8';
                default:
                  return undefined;
              }
            },
          },
        },
      ],
    }).compile();

    service = module.get<HttpClientService>(HttpClientService);
  });

  it('sizes the shared connection pool from configuration', () => {
    expect(MockedAgent).toHaveBeenCalledTimes(1);
    expect(MockedAgent).toHaveBeenCalledWith(expect.objectContaining({ connections: 8 }));
  });

  it('posts JSON bodies through the shared dispatcher', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse(200, { ok: true }));

    await expect(
      service.post('https://example.com/v1/items', { name: 'x' }, { headers: { authorization: 'Bearer t' } }),
    ).resolves.toEqual({
      status: 200,
      ok: true,
      body: { ok: true },
      contentType: 'application/json; charset=utf-8',
    });

    const [url, init] = mockedFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://example.com/v1/items');
    expect(init).toEqual(
      expect.objectContaining({
        method: 'POST',
        body: '{"name":"x"}',
        headers: { 'content-type': 'application/json', authorization: 'Bearer t' },
        dispatcher: MockedAgent.mock.results[0]?.value,
      }),
    );
  });

  it('returns non-2xx responses instead of throwing', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse(429, { error: 'slow down' }));

    await expect(service.requestRaw('GET', 'https://example.com/limited')).resolves.toEqual({
      status: 429,
      ok: false,
      body: { error: 'slow down' },
      contentType: 'application/json; charset=utf-8',
    });
  });

  it('returns text for non-json content and null for empty bodies', async () => {
    mockedFetch
      .mockResolvedValueOnce({
        ok: true,
        status: 200,
        headers: { get: (name: string) => (name === 'content-type' ? 'text/plain' : null) },
        text: async () => 'plain-text',
      })
      .mockResolvedValueOnce({
        ok: true,
        status: 204,
        headers: { get: () => null },
        text: async () => '',
      });

    await expect(service.requestRaw('GET', 'https://example.com/text')).resolves.toEqual(
      expect.objectContaining({ body: 'plain-text', contentType: 'text/plain' }),
    );
    await expect(service.requestRaw('GET', 'https://example.com/empty')).resolves.toEqual({
      status: 204,
      ok: true,
      body: null,
      contentType: null,
    });
  });

  it('falls back to raw text when a JSON body does not parse', async () => {
    mockedFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      headers: { get: () => 'application/json' },
      text: async () => '{broken',
    });

    await expect(service.requestRaw('GET', 'https://example.com/broken')).resolves.toEqual(
      expect.objectContaining({ body: '{broken' }),
    );
  });

  it('times out and aborts the request', async () => {
    jest.useFakeTimers();
    let signal: AbortSignal | undefined;
    mockedFetch.mockImplementation((_url: string, init: { signal: AbortSignal }) => {
      signal = init.signal;
      return new Promise(() => undefined);
    });

    try {
      const promise = service.requestRaw('POST', 'https://example.com/slow', {}, { timeoutMs: 10 });
      const expectation = expect(promise).rejects.toBeInstanceOf(HttpTimeoutError);

      await jest.advanceTimersByTimeAsync(20);
      await expectation;
      expect(signal?.aborted).toBe(true);
    } finally {
      jest.useRealTimers();
    }
  });

  it('times out when the headers arrive but the body stalls', async () => {
    jest.useFakeTimers();
    let signal: AbortSignal | undefined;
    mockedFetch.mockImplementation(async (_url: string, init: { signal: AbortSignal }) => {
      signal = init.signal;
      return {
        ok: true,
        status: 200,
        headers: { get: () => 'application/json' },
        text: () => new Promise<string>(() => undefined),
      };
    });

    try {
      const promise = service.post('https://example.com/slow-body', {}, { timeoutMs: 200 });
      const expectation = expect(promise).rejects.toBeInstanceOf(HttpTimeoutError);

      await jest.advanceTimersByTimeAsync(250);
      await expectation;
      expect(signal?.aborted).toBe(true);
    } finally {
      jest.useRealTimers();
    }
  });

  it('does not retry failed requests', async () => {
    mockedFetch.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(service.requestRaw('GET', 'https://example.com/flaky')).rejects.toThrow(
      'socket hang up',
    );
    expect(mockedFetch).toHaveBeenCalledTimes(1);
  });

  it('rejects relative and non-http URLs before dispatching', async () => {
    await expect(service.requestRaw('GET', '/relative')).rejects.toThrow(
      'Outbound URL must be absolute',
    );
    await expect(service.requestRaw('GET', 'ftp://example.com/file')).rejects.toThrow(
      'Unsupported outbound protocol ftp:',
    );
    expect(mockedFetch).not.toHaveBeenCalled();
  });

  it('closes the pool on shutdown', async () => {
    await service.onModuleDestroy();

    expect(mockClose).toHaveBeenCalledTimes(1);
  });
});
