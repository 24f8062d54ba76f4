import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { HttpClientRawResponse } from '../http-client/http-client.service';
import { HttpClientService } from '../http-client/http-client.service';
import { TelegramApiError } from './bot.errors';
import { ParseMode } from './telegram.types';

type BotApiEnvelope = {
  ok?: unknown;
  description?: unknown;
};

@Injectable()
export class TelegramApiService {
  private readonly logger = new Logger(TelegramApiService.name);
  private readonly baseUrl: string;
  private readonly token: string;

  constructor(
    private readonly httpClientService: HttpClientService,
    private readonly configService: ConfigService,
  ) {
    const configured =
      this.configService.get<string>('TELEGRAM_API_BASE_URL') ?? 'https://api.telegram.org';
    this.baseUrl = configured.replace(/\/+$/, '');
    this.token = this.configService.get<string>('TELEGRAM_TOKEN') ?? '';
  }

  async sendMessage(chatId: number, text: string, parseMode?: ParseMode): Promise<void> {
    const payload = {
      chat_id: chatId,
      text,
      ...(parseMode ? { parse_mode: parseMode } : {}),
    };

    let response: HttpClientRawResponse;
    try {
      response = await this.httpClientService.post(this.methodUrl('sendMessage'), payload);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.error('sendMessage failed', JSON.stringify({ chatId, detail }));
      throw new TelegramApiError(null, detail, { cause: error });
    }

    const envelope = this.readEnvelope(response.body);
    if (!response.ok || envelope.ok !== true) {
      const description =
        typeof envelope.description === 'string' ? envelope.description : `HTTP ${response.status}`;
      this.logger.error(
        'sendMessage was rejected',
        JSON.stringify({ chatId, status: response.status, description }),
      );
      throw new TelegramApiError(response.status, description);
    }
  }

  // The token is part of the path; never log this URL.
  private methodUrl(method: string): string {
    return `${this.baseUrl}/bot${this.token}/${method}`;
  }

  private readEnvelope(body: unknown): BotApiEnvelope {
    if (typeof body !== 'object' || body === null) {
      return {};
    }
    return {
      ok: 'ok' in body ? body.ok : undefined,
      description: 'description' in body ? body.description : undefined,
    };
  }
}
