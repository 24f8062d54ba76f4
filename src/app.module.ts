import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { BotModule } from './bot/bot.module';
import { envValidationSchema } from './config/env.validation';
import { HealthModule } from './health/health.module';
import { HttpClientModule } from './http-client/http-client.module';
import { ProxyModule } from './proxy/proxy.module';
import { StoreModule } from './store/store.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      cache: true,
      validationSchema: envValidationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
    StoreModule,
    HttpClientModule,
    HealthModule,
    ProxyModule,
    BotModule,
  ],
})
export class AppModule {}
