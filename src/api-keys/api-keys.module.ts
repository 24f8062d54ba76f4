import { Module } from '@nestjs/common';

import { StoreModule } from '../store/store.module';
import { ApiKeyAccessService } from './api-key-access.service';
import { ApiKeysService } from './api-keys.service';
import { KeyStore } from './key-store';
import { RedisKeyStore } from './redis-key-store';

@Module({
  imports: [StoreModule],
  providers: [
    ApiKeysService,
    ApiKeyAccessService,
    {
      provide: KeyStore,
      useClass: RedisKeyStore,
    },
  ],
  exports: [ApiKeysService, ApiKeyAccessService, KeyStore],
})
export class ApiKeysModule {}
