import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Joi from 'joi';

import type { HttpClientRawResponse } from '../http-client/http-client.service';
import { HttpClientService, HttpTimeoutError } from '../http-client/http-client.service';
import { UpstreamError, UpstreamProtocolError, UpstreamTimeoutError } from './upstream.errors';
import {
  PERSONA_PROMPT,
  UPSTREAM_MODEL,
  UPSTREAM_TEMPERATURE,
  UPSTREAM_TITLE,
} from './upstream.constants';

export type CompletionResult = {
  reply: string;
  /** Seconds, two decimals. */
  latency: number;
};

type CompletionResponse = {
  choices: Array<{ message: { content: string } }>;
};

const completionResponseSchema = Joi.object<CompletionResponse>({
  choices: Joi.array()
    .min(1)
    .items(
      Joi.object({
        message: Joi.object({
          content: Joi.string().allow('').required(),
        })
          .unknown()
          .required(),
      }).unknown(),
    )
    .required(),
})
  .unknown()
  .required();

@Injectable()
export class UpstreamClientService {
  private readonly logger = new Logger(UpstreamClientService.name);
  private readonly apiUrl: string;
  private readonly apiKey: string;
  private readonly referer: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpClientService: HttpClientService,
    private readonly configService: ConfigService,
  ) {
    this.apiUrl = this.configService.get<string>('UPSTREAM_API_URL') ?? '';
    this.apiKey = this.configService.get<string>('UPSTREAM_API_KEY') ?? '';
    this.referer = this.configService.get<string>('PUBLIC_BASE_URL') ?? '';
    this.timeoutMs = this.parseTimeoutMs(this.configService.get<unknown>('UPSTREAM_TIMEOUT'));
  }

  async complete(prompt: string): Promise<CompletionResult> {
    const payload = {
      model: UPSTREAM_MODEL,
      messages: [
        { role: 'system', content: PERSONA_PROMPT },
        { role: 'user', content: prompt },
      ],
      temperature: UPSTREAM_TEMPERATURE,
    };

    const startedAt = Date.now();
    const response = await this.dispatch(payload);
    const latency = Math.round((Date.now() - startedAt) / 10) / 100;

    if (!response.ok) {
      this.logger.error(
        `Upstream request failed with status ${response.status}`,
        JSON.stringify({ url: this.apiUrl, status: response.status, detail: response.body }),
      );
      throw new UpstreamError(
        `Upstream request failed with status ${response.status}`,
        response.status,
        response.body,
      );
    }

    const { value, error } = completionResponseSchema.validate(response.body);
    const choice = value?.choices[0];
    if (error || !choice) {
      const detail = error?.message ?? 'No completion choice';
      this.logger.error(
        'Upstream response has an unexpected shape',
        JSON.stringify({ url: this.apiUrl, status: response.status, detail }),
      );
      throw new UpstreamProtocolError(response.status, detail);
    }

    return { reply: choice.message.content, latency };
  }

  private async dispatch(payload: unknown): Promise<HttpClientRawResponse> {
    try {
      return await this.httpClientService.post(this.apiUrl, payload, {
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          'http-referer': this.referer,
          'x-title': UPSTREAM_TITLE,
        },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      if (error instanceof HttpTimeoutError) {
        this.logger.error(
          'Upstream request timed out',
          JSON.stringify({ url: this.apiUrl, timeoutMs: this.timeoutMs }),
        );
        throw new UpstreamTimeoutError(this.timeoutMs);
      }

      const detail = error instanceof Error ? error.message : String(error);
      this.logger.error('Upstream request failed', JSON.stringify({ url: this.apiUrl, detail }));
      throw new UpstreamError('Upstream request failed', null, detail, { cause: error });
    }
  }

  private parseTimeoutMs(value: unknown): number {
    const seconds = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      this.logger.warn('UPSTREAM_TIMEOUT is invalid; using fallback 6');
      return 6000;
    }
    return Math.round(seconds * 1000);
  }
}
