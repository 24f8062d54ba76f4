import {
  Controller,
  Get,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Query,
} from '@nestjs/common';

import {
  ExpiredKeyError,
  InvalidKeyError,
  MissingCredentialError,
  StoreUnavailableError,
} from '../api-keys/api-key.errors';
import { UpstreamError, UpstreamTimeoutError } from '../upstream/upstream.errors';
import { MissingParametersError } from './proxy.errors';
import { ProxyReply, ProxyService } from './proxy.service';

type QueryValue = string | string[] | undefined;

@Controller()
export class ProxyController {
  private readonly logger = new Logger(ProxyController.name);

  constructor(private readonly proxyService: ProxyService) {}

  @Get('ai')
  async ask(
    @Query('apikey') apikey: QueryValue,
    @Query('prompt') prompt: QueryValue,
  ): Promise<ProxyReply> {
    try {
      return await this.proxyService.handleProxyRequest(firstValue(apikey), firstValue(prompt));
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  private toHttpException(error: unknown): HttpException {
    if (error instanceof MissingParametersError) {
      return new HttpException({ error: error.message }, HttpStatus.BAD_REQUEST);
    }

    if (
      error instanceof MissingCredentialError ||
      error instanceof InvalidKeyError ||
      error instanceof ExpiredKeyError
    ) {
      return new HttpException({ error: error.message }, HttpStatus.UNAUTHORIZED);
    }

    if (error instanceof UpstreamTimeoutError) {
      return new HttpException({ error: 'Upstream request timed out' }, HttpStatus.GATEWAY_TIMEOUT);
    }

    if (error instanceof UpstreamError) {
      return new HttpException({ error: 'Upstream request failed' }, HttpStatus.BAD_GATEWAY);
    }

    if (error instanceof StoreUnavailableError) {
      return new HttpException({ error: error.message }, HttpStatus.SERVICE_UNAVAILABLE);
    }

    this.logger.error(
      'Unhandled proxy failure',
      error instanceof Error ? error.stack : String(error),
    );
    return new InternalServerErrorException({ error: 'Internal server error' });
  }
}

function firstValue(value: QueryValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
