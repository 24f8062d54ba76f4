import { AppError } from '../utils/app-error';

export class AdminAccessDeniedError extends AppError {
  constructor(readonly userId: number | null) {
    super('Admin access denied');
  }
}

export class TelegramApiError extends AppError {
  constructor(
    readonly status: number | null,
    readonly description: string,
    options?: { cause?: unknown },
  ) {
    super(`Telegram API request failed: ${description}`, options);
  }
}
