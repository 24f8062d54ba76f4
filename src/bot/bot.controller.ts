import { Body, Controller, HttpCode, HttpStatus, Logger, Post, UseGuards } from '@nestjs/common';

import { BotCommandsService } from './bot-commands.service';
import { telegramUpdateSchema } from './telegram.types';
import { WebhookSecretGuard } from './webhook-secret.guard';

@Controller('telegram')
@UseGuards(WebhookSecretGuard)
export class BotController {
  private readonly logger = new Logger(BotController.name);

  constructor(private readonly botCommands: BotCommandsService) {}

  /**
   * Telegram redelivers updates that are not acknowledged with a 2xx, so the
   * webhook answers OK even when validation or dispatch fails.
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async receive(@Body() body: unknown): Promise<string> {
    const validation = telegramUpdateSchema.validate(body);
    const update = validation.value;
    if (validation.error || !update) {
      this.logger.warn(
        `Ignoring malformed update: ${validation.error?.message ?? 'empty body'}`,
      );
      return 'OK';
    }

    try {
      await this.botCommands.handleUpdate(update);
    } catch (error) {
      this.logger.error(
        JSON.stringify({
          event: 'telegram_dispatch_failed',
          updateId: update.update_id,
          reason: error instanceof Error ? error.name : 'UnknownError',
        }),
        error instanceof Error ? error.stack : undefined,
      );
    }
    return 'OK';
  }
}
