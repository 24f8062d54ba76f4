import { Injectable, Logger } from '@nestjs/common';

import { ApiKeyAccessService } from '../api-keys/api-key-access.service';
import { KeyNotFoundError } from '../api-keys/api-key.errors';
import { KeyStore } from '../api-keys/key-store';
import { UpstreamClientService } from '../upstream/upstream-client.service';
import { PROVIDER_NAME } from '../upstream/upstream.constants';
import { fingerprintToken } from '../utils/hash';
import { MissingParametersError } from './proxy.errors';

export type ProxyReply = {
  provider: string;
  reply: string;
  latency: number;
};

@Injectable()
export class ProxyService {
  private readonly logger = new Logger(ProxyService.name);

  constructor(
    private readonly accessService: ApiKeyAccessService,
    private readonly upstreamClient: UpstreamClientService,
    private readonly keyStore: KeyStore,
  ) {}

  /**
   * Usage is metered only after the upstream answered; rejected or failed
   * calls leave the counter untouched.
   */
  async handleProxyRequest(
    presentedKey: string | null | undefined,
    prompt: string | null | undefined,
  ): Promise<ProxyReply> {
    if (!presentedKey?.trim() || !prompt?.trim()) {
      throw new MissingParametersError();
    }

    const record = await this.accessService.authorize(presentedKey);
    const { reply, latency } = await this.upstreamClient.complete(prompt);
    const usage = await this.meter(record.key, record.name);

    this.logger.log(
      JSON.stringify({
        event: 'proxy_call',
        key: fingerprintToken(record.key),
        name: record.name,
        usage,
        latency,
      }),
    );

    return { provider: PROVIDER_NAME, reply, latency };
  }

  /** A key deleted while its call was in flight still gets its reply; the count is lost. */
  private async meter(key: string, name: string): Promise<number | null> {
    try {
      return await this.keyStore.incrementUsage(key);
    } catch (error) {
      if (!(error instanceof KeyNotFoundError)) {
        throw error;
      }
      this.logger.warn(
        `Key ${fingerprintToken(key)} of ${name} was deleted before its usage was recorded`,
      );
      return null;
    }
  }
}
