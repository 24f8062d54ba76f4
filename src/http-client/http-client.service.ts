import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Response as UndiciResponse } from 'undici';
import { Agent, fetch } from 'undici';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpClientRawResponse {
  status: number;
  ok: boolean;
  body: unknown;
  contentType: string | null;
}

export class HttpTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

/**
 * Shared outbound client. One undici Agent pools connections for every
 * caller; the pool ceiling bounds concurrent sockets per origin. Requests are
 * never retried.
 */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly logger = new Logger(HttpClientService.name);
  private readonly defaultTimeoutMs: number;
  private readonly dispatcher: Agent;

  constructor(private readonly configService: ConfigService) {
    this.defaultTimeoutMs = this.normalizeTimeoutMs(
      this.configService.get('HTTP_CLIENT_TIMEOUT'),
      10000,
    );
    this.dispatcher = new Agent({
      connections: this.normalizeConnections(this.configService.get('HTTP_CLIENT_CONNECTIONS'), 20),
      pipelining: 0,
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
    });
  }

  async post(url: string, body: unknown, options?: HttpRequestOptions): Promise<HttpClientRawResponse> {
    return this.requestRaw('POST', url, body, options);
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }

  /**
   * Perform a request and return the raw status/body; non-2xx responses are
   * returned, not thrown, so callers decide how to map them. Transport
   * failures and timeouts reject.
   */
  async requestRaw(
    method: 'GET' | 'POST',
    url: string,
    body?: unknown,
    options?: HttpRequestOptions,
  ): Promise<HttpClientRawResponse> {
    const target = this.parseUrl(url);
    const timeoutMs = this.normalizeTimeoutMs(options?.timeoutMs, this.defaultTimeoutMs);
    const controller = new AbortController();

    return this.withTimeout(
      async () => {
        const response = await fetch(target, {
          method,
          headers: this.buildHeaders(options?.headers, body),
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
          dispatcher: this.dispatcher,
        });

        const contentType = response.headers.get('content-type') ?? '';
        return {
          status: response.status,
          ok: response.ok,
          body: await this.parseResponseBody(response, contentType),
          contentType: contentType.length > 0 ? contentType : null,
        };
      },
      timeoutMs,
      controller,
    );
  }

  /** The deadline covers headers and body alike; on expiry the request is aborted. */
  private async withTimeout<T>(
    exchange: () => Promise<T>,
    timeoutMs: number,
    controller: AbortController,
  ): Promise<T> {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new HttpTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([exchange(), timeoutPromise]);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private parseUrl(url: string): string {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new Error('Outbound URL must be absolute');
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`Unsupported outbound protocol ${parsed.protocol}`);
    }
    return parsed.toString();
  }

  private buildHeaders(
    headers: Record<string, string> | undefined,
    body: unknown,
  ): Record<string, string> {
    if (body === undefined) {
      return headers ?? {};
    }

    return {
      'content-type': 'application/json',
      ...(headers ?? {}),
    };
  }

  private async parseResponseBody(response: UndiciResponse, contentType: string): Promise<unknown> {
    const text = await response.text();

    if (!text) {
      return null;
    }

    if (contentType.includes('application/json')) {
      try {
        return JSON.parse(text);
      } catch (error) {
        this.logger.warn('Failed to parse JSON response, returning raw text instead.');
        return text;
      }
    }

    return text;
  }

  private normalizeTimeoutMs(value: unknown, fallback: number): number {
    const candidate = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(candidate) || candidate <= 0) {
      return fallback;
    }
    return Math.ceil(candidate);
  }

  private normalizeConnections(value: unknown, fallback: number): number {
    const candidate = typeof value === 'number' ? value : Number(value);
    if (!Number.isInteger(candidate) || candidate < 1) {
      return fallback;
    }
    return candidate;
  }
}
