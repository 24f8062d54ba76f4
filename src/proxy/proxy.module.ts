import { Module } from '@nestjs/common';

import { ApiKeysModule } from '../api-keys/api-keys.module';
import { UpstreamModule } from '../upstream/upstream.module';
import { ProxyController } from './proxy.controller';
import { ProxyService } from './proxy.service';

@Module({
  imports: [ApiKeysModule, UpstreamModule],
  controllers: [ProxyController],
  providers: [ProxyService],
})
export class ProxyModule {}
