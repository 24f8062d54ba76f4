import { Module } from '@nestjs/common';

import { ApiKeysModule } from '../api-keys/api-keys.module';
import { HttpClientModule } from '../http-client/http-client.module';
import { UpstreamModule } from '../upstream/upstream.module';
import { AdminGate } from './admin-gate.service';
import { BotCommandsService } from './bot-commands.service';
import { BotController } from './bot.controller';
import { TelegramApiService } from './telegram-api.service';
import { WebhookSecretGuard } from './webhook-secret.guard';

@Module({
  imports: [ApiKeysModule, UpstreamModule, HttpClientModule],
  controllers: [BotController],
  providers: [AdminGate, BotCommandsService, TelegramApiService, WebhookSecretGuard],
})
export class BotModule {}
